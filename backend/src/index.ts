/**
 * backend/src/index.ts
 *
 * WHY:
 * - Single entrypoint for the HTTP API.
 * - Keeps startup logic small: load config -> build app -> listen.
 * - Membership expiry runs as a separate scheduled process (src/jobs), not here.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    flow: 'server',
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
    currency: config.payments.currency,
  });

  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    // A second Ctrl-C while draining should not close the pool twice.
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('server.shutdown', { flow: 'server', signal });

    try {
      await close();
      process.exit(0);
    } catch (err: unknown) {
      logger.error('server.shutdown_failed', { flow: 'server', signal, err });
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { flow: 'server', err });
  process.exit(1);
});
