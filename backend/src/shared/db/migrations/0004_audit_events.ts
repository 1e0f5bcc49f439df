/**
 * src/shared/db/migrations/0004_audit_events.ts
 *
 * WHY:
 * - Append-only billing trail (membership / invoice / placement actions).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('user_id', 'uuid')
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('audit_events_action_created_at_idx')
    .ifNotExists()
    .on('audit_events')
    .columns(['action', 'created_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex('audit_events_action_created_at_idx').ifExists().execute();
  await db.schema.dropTable('audit_events').ifExists().execute();
}
