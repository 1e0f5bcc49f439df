/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table interfaces for every table created in ./migrations.
 * - Queries and repos are typed against `DB`; a column rename fails the type-check.
 *
 * RULES:
 * - Keep in lockstep with the migrations (one interface per table).
 * - Timestamps are read as Date and written as Date or ISO string.
 * - Money columns are integer cents.
 * - Status columns are text in Postgres; the union lives here and in the module types.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type NullableTimestamp = ColumnType<Date | null, Date | string | null, Date | string | null>;
export type CreatedTimestamp = ColumnType<Date, Date | string | undefined, never>;
export type UpdatedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type Json = ColumnType<unknown, string, string>;

export interface UsersTable {
  id: Generated<string>;
  email: string;
  name: string;
  role: 'CANDIDATE' | 'TEAM' | 'ADMIN';
  is_approved: Generated<boolean>;
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface MembershipsTable {
  id: Generated<string>;
  candidate_id: string;
  plan_type: 'BASIC' | 'PREMIUM' | 'PROFESSIONAL';
  price_cents: number;
  currency: string;
  status: 'PENDING' | 'ACTIVE' | 'EXPIRED' | 'CANCELLED';
  start_date: NullableTimestamp;
  renewal_date: NullableTimestamp;
  payment_intent_id: string | null;
  replaces_membership_id: string | null;
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface PaymentIntentsTable {
  id: string;
  user_id: string;
  purpose: 'MEMBERSHIP' | 'PLACEMENT_INVOICE';
  reference_id: string;
  amount_cents: number;
  currency: string;
  status: 'CREATED' | 'SUCCEEDED' | 'FAILED';
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface PaymentEventsTable {
  event_id: string;
  type: string;
  received_at: CreatedTimestamp;
}

export interface VacanciesTable {
  id: Generated<string>;
  team_id: string;
  title: string;
  description: string;
  location: string | null;
  position_type: string | null;
  experience_level: string | null;
  salary_min: number | null;
  salary_max: number | null;
  expiry_date: NullableTimestamp;
  status: 'DRAFT' | 'ACTIVE' | 'CLOSED';
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface PlacementsTable {
  id: Generated<string>;
  candidate_id: string;
  team_id: string;
  vacancy_id: string;
  status: 'PENDING' | 'CONFIRMED' | 'CANCELLED';
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface InvoicesTable {
  id: Generated<string>;
  placement_id: string;
  team_id: string;
  amount_cents: number;
  currency: string;
  status: 'UNPAID' | 'PAID' | 'VOID';
  due_date: Timestamp;
  paid_at: NullableTimestamp;
  paid_source: 'GATEWAY' | 'ADMIN' | null;
  voided_at: NullableTimestamp;
  payment_intent_id: string | null;
  created_at: CreatedTimestamp;
  updated_at: UpdatedTimestamp;
}

export interface AuditEventsTable {
  id: Generated<string>;
  action: string;
  user_id: string | null;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: Json;
  created_at: CreatedTimestamp;
}

export interface DB {
  users: UsersTable;
  memberships: MembershipsTable;
  payment_intents: PaymentIntentsTable;
  payment_events: PaymentEventsTable;
  vacancies: VacanciesTable;
  placements: PlacementsTable;
  invoices: InvoicesTable;
  audit_events: AuditEventsTable;
}
