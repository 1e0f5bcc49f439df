/**
 * backend/src/modules/memberships/dal/membership.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for memberships (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Every status change is guarded by the expected current status; callers
 *   learn whether they won from the returned rows.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { PlanType } from '../membership.plans';

export class MembershipRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): MembershipRepo {
    return new MembershipRepo(db);
  }

  async insertPending(params: {
    candidateId: string;
    planType: PlanType;
    priceCents: number;
    currency: string;
    paymentIntentId: string;
    replacesMembershipId: string | null;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('memberships')
      .values({
        candidate_id: params.candidateId,
        plan_type: params.planType,
        price_cents: params.priceCents,
        currency: params.currency,
        status: 'PENDING',
        start_date: null,
        renewal_date: null,
        payment_intent_id: params.paymentIntentId,
        replaces_membership_id: params.replacesMembershipId,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  /**
   * PENDING → ACTIVE. Returns true if this call activated the row.
   */
  async activate(params: {
    membershipId: string;
    startDate: Date;
    renewalDate: Date;
  }): Promise<boolean> {
    const row = await this.db
      .updateTable('memberships')
      .set({
        status: 'ACTIVE',
        start_date: params.startDate,
        renewal_date: params.renewalDate,
        updated_at: params.startDate,
      })
      .where('id', '=', params.membershipId)
      .where('status', '=', 'PENDING')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * ACTIVE → EXPIRED for the candidate's other memberships already past their
   * renewal date. Runs before cancelOtherActive so a lapsed plan is recorded
   * as expired, the same as the sweep would.
   */
  async expireLapsedForCandidate(params: {
    candidateId: string;
    keepMembershipId: string;
    now: Date;
  }): Promise<string[]> {
    const rows = await this.db
      .updateTable('memberships')
      .set({ status: 'EXPIRED', updated_at: params.now })
      .where('candidate_id', '=', params.candidateId)
      .where('status', '=', 'ACTIVE')
      .where('id', '!=', params.keepMembershipId)
      .where('renewal_date', '<', params.now)
      .returning(['id'])
      .execute();

    return rows.map((r) => r.id);
  }

  /**
   * ACTIVE → CANCELLED for every other ACTIVE membership of the candidate.
   * Keeps "at most one ACTIVE per candidate" when a new one is activated.
   */
  async cancelOtherActive(params: {
    candidateId: string;
    keepMembershipId: string;
    now: Date;
  }): Promise<string[]> {
    const rows = await this.db
      .updateTable('memberships')
      .set({ status: 'CANCELLED', updated_at: params.now })
      .where('candidate_id', '=', params.candidateId)
      .where('status', '=', 'ACTIVE')
      .where('id', '!=', params.keepMembershipId)
      .returning(['id'])
      .execute();

    return rows.map((r) => r.id);
  }

  /**
   * ACTIVE → CANCELLED (explicit cancellation). Returns true if this call changed the row.
   */
  async cancelActive(params: { membershipId: string; now: Date }): Promise<boolean> {
    const row = await this.db
      .updateTable('memberships')
      .set({ status: 'CANCELLED', updated_at: params.now })
      .where('id', '=', params.membershipId)
      .where('status', '=', 'ACTIVE')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * PENDING → CANCELLED: the gateway cancelled the intent, or a paid intent
   * was superseded by an equal or higher active tier.
   */
  async cancelPending(params: {
    membershipId: string;
    now: Date;
  }): Promise<boolean> {
    const row = await this.db
      .updateTable('memberships')
      .set({ status: 'CANCELLED', updated_at: params.now })
      .where('id', '=', params.membershipId)
      .where('status', '=', 'PENDING')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * ACTIVE → EXPIRED for every membership whose renewal date is before `now`.
   */
  async expireDue(now: Date): Promise<Array<{ id: string; candidateId: string }>> {
    const rows = await this.db
      .updateTable('memberships')
      .set({ status: 'EXPIRED', updated_at: now })
      .where('status', '=', 'ACTIVE')
      .where('renewal_date', '<', now)
      .returning(['id', 'candidate_id'])
      .execute();

    return rows.map((r) => ({ id: r.id, candidateId: r.candidate_id }));
  }
}
