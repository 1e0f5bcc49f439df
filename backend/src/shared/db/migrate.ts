/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably (dev, CI, deploy step).
 * - Migrations come from the static registry in ./migrations/index.ts.
 *
 * HOW TO USE:
 * - npm run db:migrate -w backend
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({
    databaseUrl: config.databaseUrl,
    applicationName: `${config.serviceName}:migrate`,
  });

  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migration.failed', { error });
    process.exit(1);
  }

  logger.info('db.migration.up_to_date', { count: Object.keys(migrations).length });
}

void runMigrations();
