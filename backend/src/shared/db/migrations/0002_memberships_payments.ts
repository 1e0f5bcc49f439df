/**
 * src/shared/db/migrations/0002_memberships_payments.ts
 *
 * WHY:
 * - memberships: one row per purchase attempt; PENDING until the gateway confirms.
 * - payment_intents: audit copy of every intent we created (never the source of truth).
 * - payment_events: webhook dedupe, keyed by the gateway event id.
 *
 * RULES:
 * - Money is integer cents.
 * - memberships.payment_intent_id is unique: one intent activates exactly one membership.
 * - "At most one ACTIVE membership per candidate" is enforced by the service
 *   (serialised per candidate), not by a partial index.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('memberships')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('candidate_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('plan_type', 'text', (col) => col.notNull())
    .addColumn('price_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('start_date', 'timestamptz')
    .addColumn('renewal_date', 'timestamptz')
    .addColumn('payment_intent_id', 'text', (col) => col.unique())
    .addColumn('replaces_membership_id', 'uuid')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // isActive / getCurrent: WHERE candidate_id = ? AND status = ?
  await db.schema
    .createIndex('memberships_candidate_id_status_idx')
    .ifNotExists()
    .on('memberships')
    .columns(['candidate_id', 'status'])
    .execute();

  // expiry sweep: WHERE status = 'ACTIVE' AND renewal_date < now
  await db.schema
    .createIndex('memberships_status_renewal_date_idx')
    .ifNotExists()
    .on('memberships')
    .columns(['status', 'renewal_date'])
    .execute();

  await db.schema
    .createTable('payment_intents')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('purpose', 'text', (col) => col.notNull())
    .addColumn('reference_id', 'uuid', (col) => col.notNull())
    .addColumn('amount_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('payment_events')
    .addColumn('event_id', 'text', (col) => col.primaryKey())
    .addColumn('type', 'text', (col) => col.notNull())
    .addColumn('received_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('payment_events').ifExists().execute();
  await db.schema.dropTable('payment_intents').ifExists().execute();
  await db.schema.dropIndex('memberships_status_renewal_date_idx').ifExists().execute();
  await db.schema.dropIndex('memberships_candidate_id_status_idx').ifExists().execute();
  await db.schema.dropTable('memberships').ifExists().execute();
}
