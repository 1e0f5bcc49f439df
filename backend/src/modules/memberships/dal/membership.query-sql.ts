/**
 * backend/src/modules/memberships/dal/membership.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for memberships.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MembershipsTable } from '../../../shared/db/schema';

export type MembershipRow = Selectable<MembershipsTable>;

export async function selectMembershipByIdSql(
  db: DbExecutor,
  membershipId: string,
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where('id', '=', membershipId)
    .executeTakeFirst();
}

export async function selectMembershipByPaymentIntentSql(
  db: DbExecutor,
  paymentIntentId: string,
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where('payment_intent_id', '=', paymentIntentId)
    .executeTakeFirst();
}

/**
 * ACTIVE by status only; callers decide whether the renewal date has passed.
 * Newest first, so a concurrent leftover never hides the current one.
 */
export async function selectActiveMembershipByCandidateSql(
  db: DbExecutor,
  candidateId: string,
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where('candidate_id', '=', candidateId)
    .where('status', '=', 'ACTIVE')
    .orderBy('start_date', 'desc')
    .executeTakeFirst();
}

export async function selectMembershipsByCandidateSql(
  db: DbExecutor,
  candidateId: string,
): Promise<MembershipRow[]> {
  return db
    .selectFrom('memberships')
    .selectAll()
    .where('candidate_id', '=', candidateId)
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .execute();
}
