import { randomUUID } from 'node:crypto';
import { Kysely, PostgresDialect } from 'kysely';
import { DataType, newDb } from 'pg-mem';

import type { Db } from '../../src/shared/db/db';
import type { DB } from '../../src/shared/db/schema';
import { migrations } from '../../src/shared/db/migrations';

/**
 * WHY:
 * - In-process Postgres for DAL and E2E tests (no container needed).
 * - Applies the same migrations as production, in registry order.
 *
 * RULES:
 * - One database per call; tests never share state.
 */
export async function createMemDb(): Promise<Db> {
  const mem = newDb();

  mem.public.registerFunction({
    name: 'gen_random_uuid',
    returns: DataType.uuid,
    implementation: randomUUID,
    impure: true,
  });

  const { Pool } = mem.adapters.createPg();
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({ pool: new Pool() }),
  });

  const ordered = Object.entries(migrations).sort(([a], [b]) => a.localeCompare(b));
  for (const [, migration] of ordered) {
    await migration.up(db);
  }

  return db;
}
