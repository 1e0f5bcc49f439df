/**
 * backend/src/modules/memberships/membership.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Membership domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../shared/db/db';
import {
  selectActiveMembershipByCandidateSql,
  selectMembershipByIdSql,
  selectMembershipByPaymentIntentSql,
  selectMembershipsByCandidateSql,
} from './dal/membership.query-sql';
import type { MembershipRow } from './dal/membership.query-sql';
import type { Membership } from './membership.types';

function toDateOrNull(value: Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function toMembership(row: MembershipRow): Membership {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    planType: row.plan_type,
    priceCents: row.price_cents,
    currency: row.currency,
    status: row.status,
    startDate: toDateOrNull(row.start_date),
    renewalDate: toDateOrNull(row.renewal_date),
    paymentIntentId: row.payment_intent_id,
    replacesMembershipId: row.replaces_membership_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export async function getMembershipById(
  db: DbExecutor,
  membershipId: string,
): Promise<Membership | undefined> {
  const row = await selectMembershipByIdSql(db, membershipId);
  if (!row) return undefined;
  return toMembership(row);
}

export async function getMembershipByPaymentIntent(
  db: DbExecutor,
  paymentIntentId: string,
): Promise<Membership | undefined> {
  const row = await selectMembershipByPaymentIntentSql(db, paymentIntentId);
  if (!row) return undefined;
  return toMembership(row);
}

export async function getActiveMembership(
  db: DbExecutor,
  candidateId: string,
): Promise<Membership | undefined> {
  const row = await selectActiveMembershipByCandidateSql(db, candidateId);
  if (!row) return undefined;
  return toMembership(row);
}

export async function listMembershipsForCandidate(
  db: DbExecutor,
  candidateId: string,
): Promise<Membership[]> {
  const rows = await selectMembershipsByCandidateSql(db, candidateId);
  return rows.map(toMembership);
}
