/**
 * src/shared/db/migrations/0003_vacancies_placements.ts
 *
 * WHY:
 * - vacancies: what teams publish; creation is gated on unpaid invoices.
 * - placements + invoices: every placement carries exactly one fixed-fee invoice.
 *
 * RULES:
 * - placements (vacancy_id, candidate_id) is unique (no double placement).
 * - invoices.placement_id is unique (1:1).
 * - invoices.team_id is denormalised so the vacancy gate is a single-table lookup.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('vacancies')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('team_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('location', 'text')
    .addColumn('position_type', 'text')
    .addColumn('experience_level', 'text')
    .addColumn('salary_min', 'integer')
    .addColumn('salary_max', 'integer')
    .addColumn('expiry_date', 'timestamptz')
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('vacancies_team_id_idx')
    .ifNotExists()
    .on('vacancies')
    .column('team_id')
    .execute();

  await db.schema
    .createTable('placements')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('candidate_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('team_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('vacancy_id', 'uuid', (col) => col.notNull().references('vacancies.id'))
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('placements_vacancy_id_candidate_id_key', ['vacancy_id', 'candidate_id'])
    .execute();

  await db.schema
    .createTable('invoices')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('placement_id', 'uuid', (col) =>
      col.notNull().unique().references('placements.id'),
    )
    .addColumn('team_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('amount_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('due_date', 'timestamptz', (col) => col.notNull())
    .addColumn('paid_at', 'timestamptz')
    .addColumn('paid_source', 'text')
    .addColumn('voided_at', 'timestamptz')
    .addColumn('payment_intent_id', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // vacancy gate: WHERE team_id = ? AND status = 'UNPAID'
  await db.schema
    .createIndex('invoices_team_id_status_idx')
    .ifNotExists()
    .on('invoices')
    .columns(['team_id', 'status'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex('invoices_team_id_status_idx').ifExists().execute();
  await db.schema.dropTable('invoices').ifExists().execute();
  await db.schema.dropTable('placements').ifExists().execute();
  await db.schema.dropIndex('vacancies_team_id_idx').ifExists().execute();
  await db.schema.dropTable('vacancies').ifExists().execute();
}
