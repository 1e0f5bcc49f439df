/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema.ts next to the migrations that create them.
 *
 * HOW TO USE:
 * - createDb({ databaseUrl, applicationName }) in the composition root.
 * - Tests pass their own Kysely<DB> (in-process Postgres) into buildDeps instead.
 */

import pg from 'pg';
import { Kysely, PostgresDialect, sql } from 'kysely';

import type { DB } from './schema';
import { logger } from '../logger/logger';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (`trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(opts: { databaseUrl: string; applicationName: string }): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    // visible in pg_stat_activity
    application_name: opts.applicationName,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}

/**
 * Readiness probe. Resolves false instead of throwing so /health can report it.
 */
export async function pingDb(db: DbExecutor): Promise<boolean> {
  try {
    await sql`select 1 as ok`.execute(db);
    return true;
  } catch (err) {
    logger.warn('db.ping_failed', { flow: 'health', err });
    return false;
  }
}
