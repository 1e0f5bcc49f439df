/**
 * backend/src/jobs/expire-memberships.ts
 *
 * WHY:
 * - Entry point for the external scheduler (cron, k8s CronJob).
 * - Moves ACTIVE memberships past their renewal date to EXPIRED.
 *
 * HOW TO USE:
 * - npm run jobs:expire-memberships -w backend
 *
 * RULES:
 * - Same service path as POST /admin/memberships/expire; no HTTP server is started.
 */

import { buildConfig } from '../app/config';
import { buildDeps } from '../app/di';
import { logger } from '../shared/logger/logger';

async function runExpireMemberships(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);

  try {
    const { expired } = await deps.memberships.membershipService.expireDue();
    logger.info('jobs.expire_memberships.done', { flow: 'jobs.expire_memberships', expired });
  } finally {
    await deps.close();
  }
}

void runExpireMemberships().catch((err: unknown) => {
  logger.error('jobs.expire_memberships.failed', { flow: 'jobs.expire_memberships', err });
  process.exit(1);
});
