/**
 * backend/src/modules/memberships/membership.service.ts
 *
 * WHY:
 * - Owns membership state per candidate: purchase, activation on payment,
 *   upgrade, cancellation, expiry.
 * - Only place allowed to start membership transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Gateway calls happen OUTSIDE transactions (no network I/O while holding locks).
 * - Activation locks the candidate's user row first so concurrent confirmations
 *   (HTTP confirm + webhook) serialise; the loser sees ACTIVE and returns it.
 * - The tier rule is re-checked under that lock: a paid plan never replaces an
 *   active plan of equal or higher tier.
 * - A failed attempt leaves the membership PENDING (the intent can be retried);
 *   only a cancelled intent ends it.
 * - Notifications are collected in an Outbox and enqueued after commit.
 * - isActive() is the only status query other modules may rely on.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import type { RequestMeta } from '../../shared/http/request-meta';
import { Outbox } from '../../shared/messaging/outbox';

import type { UserRepo } from '../users';
import type { PaymentGateway, PaymentRepo } from '../payments';

import type { MembershipRepo } from './dal/membership.repo';
import {
  getActiveMembership,
  getMembershipById,
  getMembershipByPaymentIntent,
  listMembershipsForCandidate,
} from './membership.queries';
import {
  assertCanPurchase,
  assertHasActiveMembership,
  assertIsUpgrade,
  assertMembershipExists,
  assertPaymentOwnedBy,
  assertPaymentSucceeded,
  computeRenewalDate,
  isMembershipActive,
  isSupersededByActive,
  resolvePlan,
} from './policies/membership-lifecycle.policy';
import { MembershipErrors } from './membership.errors';
import {
  auditMembershipActivated,
  auditMembershipCancelled,
  auditMembershipsExpired,
  auditMembershipIntentCreated,
  auditMembershipPaymentFailed,
  auditMembershipUpgraded,
} from './membership.audit';
import { listPlans } from './membership.plans';
import type { Plan } from './membership.plans';
import type { ActivationResult, Membership, MembershipPaymentIntent } from './membership.types';

const INTENT_RATE_LIMIT = { limit: 10, windowSeconds: 15 * 60 } as const;

export class MembershipService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      rateLimiter: RateLimiter;
      gateway: PaymentGateway;
      auditRepo: AuditRepo;
      queue: Queue;
      membershipRepo: MembershipRepo;
      userRepo: UserRepo;
      paymentRepo: PaymentRepo;
      currency: string;
    },
  ) {}

  listPlans(): Plan[] {
    return listPlans();
  }

  async createPaymentIntent(params: {
    candidateId: string;
    planType: string;
    meta: RequestMeta;
  }): Promise<MembershipPaymentIntent> {
    const now = new Date();
    const plan = resolvePlan(params.planType);

    await this.deps.rateLimiter.hitOrThrow({
      key: `memberships:intent:user:${params.candidateId}`,
      ...INTENT_RATE_LIMIT,
    });

    const active = await getActiveMembership(this.deps.db, params.candidateId);
    assertCanPurchase(active, plan, now);

    return this.startPurchase({
      candidateId: params.candidateId,
      plan,
      replaces: null,
      meta: params.meta,
      flow: 'memberships.purchase',
    });
  }

  /**
   * Pass-through upgrade: full price of the new plan, fresh period on payment.
   * The current membership stays ACTIVE until the new one is activated.
   */
  async upgrade(params: {
    candidateId: string;
    planType: string;
    meta: RequestMeta;
  }): Promise<MembershipPaymentIntent> {
    const now = new Date();

    const current = await getActiveMembership(this.deps.db, params.candidateId);
    assertHasActiveMembership(current, now);

    const plan = resolvePlan(params.planType);
    assertIsUpgrade(current, plan);

    await this.deps.rateLimiter.hitOrThrow({
      key: `memberships:intent:user:${params.candidateId}`,
      ...INTENT_RATE_LIMIT,
    });

    return this.startPurchase({
      candidateId: params.candidateId,
      plan,
      replaces: current,
      meta: params.meta,
      flow: 'memberships.upgrade',
    });
  }

  /**
   * Confirms a payment the client completed with the gateway.
   * Idempotent: an already ACTIVE membership is returned unchanged.
   */
  async confirmPayment(params: {
    intentId: string;
    candidateId: string | null;
    meta: RequestMeta;
  }): Promise<Membership> {
    const flow = 'memberships.confirm';

    const membership = await getMembershipByPaymentIntent(this.deps.db, params.intentId);
    assertMembershipExists(membership);
    assertPaymentOwnedBy(membership, params.candidateId);

    if (membership.status === 'ACTIVE') {
      this.deps.logger.info('memberships.confirm.already_active', {
        flow,
        requestId: params.meta.requestId,
        membershipId: membership.id,
      });
      return membership;
    }

    if (membership.status !== 'PENDING') {
      throw MembershipErrors.membershipNotPending({
        membershipId: membership.id,
        status: membership.status,
      });
    }

    const intent = await this.deps.gateway.retrieveIntent(params.intentId);
    assertPaymentSucceeded(intent);

    const outbox = new Outbox();
    const result = await this.deps.db.transaction().execute((trx) =>
      this.activateInTx(trx, {
        intentId: params.intentId,
        now: new Date(),
        audit: this.auditWriter(params.meta, membership.candidateId),
        outbox,
      }),
    );
    await outbox.flush(this.deps.queue);

    if (result.outcome === 'SUPERSEDED') {
      throw MembershipErrors.alreadyActive({ membershipId: result.membership.id });
    }

    return result.membership;
  }

  /**
   * Activation shared by confirmPayment and the webhook (caller owns the tx).
   */
  async activateInTx(
    trx: DbExecutor,
    params: { intentId: string; now: Date; audit: AuditWriter; outbox: Outbox },
  ): Promise<ActivationResult> {
    const flow = 'memberships.activate';

    const found = await getMembershipByPaymentIntent(trx, params.intentId);
    assertMembershipExists(found);

    await this.deps.userRepo.withDb(trx).lockUserRow(found.candidateId);

    // Re-read under the lock: a concurrent activation may have won.
    const membership = await getMembershipByPaymentIntent(trx, params.intentId);
    assertMembershipExists(membership);

    if (membership.status === 'ACTIVE') {
      return { membership, outcome: 'ALREADY_ACTIVE' };
    }
    if (membership.status !== 'PENDING') {
      throw MembershipErrors.membershipNotPending({
        membershipId: membership.id,
        status: membership.status,
      });
    }

    const membershipRepo = this.deps.membershipRepo.withDb(trx);
    const audit = params.audit.withDb(trx);

    const current = await getActiveMembership(trx, membership.candidateId);
    if (current && isSupersededByActive(current, membership, params.now)) {
      const cancelled = await membershipRepo.cancelPending({
        membershipId: membership.id,
        now: params.now,
      });
      if (!cancelled) {
        throw MembershipErrors.membershipNotPending({ membershipId: membership.id });
      }

      await this.deps.paymentRepo.withDb(trx).markIntentStatus({
        intentId: params.intentId,
        status: 'SUCCEEDED',
        now: params.now,
      });
      await auditMembershipCancelled(audit, membership, 'superseded', {
        supersededBy: current.id,
      });

      // Paid but not applied: needs a human (refund).
      this.deps.logger.warn('memberships.activate.superseded', {
        flow,
        membershipId: membership.id,
        candidateId: membership.candidateId,
        planType: membership.planType,
        intentId: params.intentId,
        activeMembershipId: current.id,
        activePlanType: current.planType,
      });

      const superseded = await getMembershipById(trx, membership.id);
      assertMembershipExists(superseded);
      return { membership: superseded, outcome: 'SUPERSEDED' };
    }

    const lapsedIds = await membershipRepo.expireLapsedForCandidate({
      candidateId: membership.candidateId,
      keepMembershipId: membership.id,
      now: params.now,
    });
    await auditMembershipsExpired(
      audit,
      lapsedIds.map((id) => ({ membershipId: id, candidateId: membership.candidateId })),
    );
    for (const id of lapsedIds) {
      params.outbox.add({
        type: 'memberships.expired',
        candidateId: membership.candidateId,
        membershipId: id,
      });
    }

    const replacedIds = await membershipRepo.cancelOtherActive({
      candidateId: membership.candidateId,
      keepMembershipId: membership.id,
      now: params.now,
    });

    const activated = await membershipRepo.activate({
      membershipId: membership.id,
      startDate: params.now,
      renewalDate: computeRenewalDate(params.now),
    });
    if (!activated) {
      throw MembershipErrors.membershipNotPending({ membershipId: membership.id });
    }

    await this.deps.paymentRepo.withDb(trx).markIntentStatus({
      intentId: params.intentId,
      status: 'SUCCEEDED',
      now: params.now,
    });

    const updated = await getMembershipById(trx, membership.id);
    assertMembershipExists(updated);

    await auditMembershipActivated(audit, updated, replacedIds);
    if (updated.replacesMembershipId) {
      await auditMembershipUpgraded(audit, updated, updated.replacesMembershipId);
    }

    params.outbox.add({
      type: 'memberships.activated',
      candidateId: updated.candidateId,
      membershipId: updated.id,
      planType: updated.planType,
      renewalDate: computeRenewalDate(params.now).toISOString(),
    });

    this.deps.logger.info('memberships.activate.success', {
      flow,
      membershipId: updated.id,
      candidateId: updated.candidateId,
      planType: updated.planType,
      replacedMembershipIds: replacedIds,
      expiredMembershipIds: lapsedIds,
    });

    return { membership: updated, outcome: 'ACTIVATED' };
  }

  /**
   * Gateway reported a failed attempt (caller owns the tx). The intent goes back
   * to requires_payment_method and can still succeed, so the membership stays
   * PENDING. Returns false when there was no pending membership.
   */
  async recordFailedAttemptInTx(
    trx: DbExecutor,
    params: { intentId: string; now: Date; audit: AuditWriter },
  ): Promise<boolean> {
    const membership = await getMembershipByPaymentIntent(trx, params.intentId);
    if (!membership || membership.status !== 'PENDING') return false;

    await this.deps.paymentRepo.withDb(trx).markIntentStatus({
      intentId: params.intentId,
      status: 'FAILED',
      now: params.now,
    });
    await auditMembershipPaymentFailed(params.audit.withDb(trx), membership);

    this.deps.logger.info('memberships.payment_failed.recorded', {
      flow: 'memberships.payment_failed',
      membershipId: membership.id,
      candidateId: membership.candidateId,
      intentId: params.intentId,
    });

    return true;
  }

  /**
   * Gateway cancelled the intent: PENDING → CANCELLED (caller owns the tx).
   * Returns false when there was nothing pending to cancel.
   */
  async cancelPendingInTx(
    trx: DbExecutor,
    params: { intentId: string; now: Date; audit: AuditWriter },
  ): Promise<boolean> {
    const membership = await getMembershipByPaymentIntent(trx, params.intentId);
    if (!membership) return false;

    const cancelled = await this.deps.membershipRepo.withDb(trx).cancelPending({
      membershipId: membership.id,
      now: params.now,
    });

    await this.deps.paymentRepo.withDb(trx).markIntentStatus({
      intentId: params.intentId,
      status: 'FAILED',
      now: params.now,
    });

    if (cancelled) {
      await auditMembershipCancelled(params.audit.withDb(trx), membership, 'payment_canceled');
      this.deps.logger.info('memberships.cancel_pending.success', {
        flow: 'memberships.payment_canceled',
        membershipId: membership.id,
        candidateId: membership.candidateId,
      });
    }

    return cancelled;
  }

  async cancel(params: { candidateId: string; meta: RequestMeta }): Promise<Membership> {
    const now = new Date();

    return this.deps.db.transaction().execute(async (trx) => {
      await this.deps.userRepo.withDb(trx).lockUserRow(params.candidateId);

      const active = await getActiveMembership(trx, params.candidateId);
      assertHasActiveMembership(active, now);

      const cancelled = await this.deps.membershipRepo
        .withDb(trx)
        .cancelActive({ membershipId: active.id, now });
      if (!cancelled) {
        throw MembershipErrors.noActiveMembership({ membershipId: active.id });
      }

      await auditMembershipCancelled(
        this.auditWriter(params.meta, params.candidateId).withDb(trx),
        active,
        'candidate_request',
      );

      this.deps.logger.info('memberships.cancel.success', {
        flow: 'memberships.cancel',
        requestId: params.meta.requestId,
        membershipId: active.id,
        candidateId: params.candidateId,
      });

      const updated = await getMembershipById(trx, active.id);
      assertMembershipExists(updated);
      return updated;
    });
  }

  async findByPaymentIntent(
    intentId: string,
    db: DbExecutor = this.deps.db,
  ): Promise<Membership | undefined> {
    return getMembershipByPaymentIntent(db, intentId);
  }

  async isActive(candidateId: string, now: Date = new Date()): Promise<boolean> {
    const active = await getActiveMembership(this.deps.db, candidateId);
    return isMembershipActive(active, now);
  }

  async getCurrent(candidateId: string): Promise<Membership | null> {
    const active = await getActiveMembership(this.deps.db, candidateId);
    return active ?? null;
  }

  async history(candidateId: string): Promise<Membership[]> {
    return listMembershipsForCandidate(this.deps.db, candidateId);
  }

  /**
   * Expiry sweep: ACTIVE memberships whose renewal date is before `now` → EXPIRED.
   * Invoked by the scheduled job and the admin endpoint.
   */
  async expireDue(params: { now?: Date; meta?: RequestMeta } = {}): Promise<{ expired: number }> {
    const now = params.now ?? new Date();
    const flow = 'memberships.expire';
    const outbox = new Outbox();

    const expired = await this.deps.db.transaction().execute(async (trx) => {
      const rows = await this.deps.membershipRepo.withDb(trx).expireDue(now);
      const audit = this.auditWriter(params.meta ?? null, null).withDb(trx);

      await auditMembershipsExpired(
        audit,
        rows.map((row) => ({ membershipId: row.id, candidateId: row.candidateId })),
      );

      for (const row of rows) {
        outbox.add({
          type: 'memberships.expired',
          candidateId: row.candidateId,
          membershipId: row.id,
        });
      }

      return rows.length;
    });
    await outbox.flush(this.deps.queue);

    this.deps.logger.info('memberships.expire.done', {
      flow,
      now: now.toISOString(),
      expired,
    });

    return { expired };
  }

  // ── internals ────────────────────────────────────────────────

  private async startPurchase(params: {
    candidateId: string;
    plan: Plan;
    replaces: Membership | null;
    meta: RequestMeta;
    flow: string;
  }): Promise<MembershipPaymentIntent> {
    const { plan, flow } = params;

    this.deps.logger.info(`${flow}.start`, {
      flow,
      requestId: params.meta.requestId,
      candidateId: params.candidateId,
      planType: plan.type,
      upgradeFrom: params.replaces?.id ?? null,
    });

    // Network call outside the transaction.
    const intent = await this.deps.gateway.createIntent({
      amountCents: plan.priceCents,
      currency: this.deps.currency,
      description: `${plan.name} membership`,
      metadata: {
        kind: 'MEMBERSHIP',
        candidateId: params.candidateId,
        planType: plan.type,
      },
    });

    const membershipId = await this.deps.db.transaction().execute(async (trx) => {
      const inserted = await this.deps.membershipRepo.withDb(trx).insertPending({
        candidateId: params.candidateId,
        planType: plan.type,
        priceCents: plan.priceCents,
        currency: this.deps.currency,
        paymentIntentId: intent.id,
        replacesMembershipId: params.replaces?.id ?? null,
      });

      await this.deps.paymentRepo.withDb(trx).insertIntent({
        id: intent.id,
        userId: params.candidateId,
        purpose: 'MEMBERSHIP',
        referenceId: inserted.id,
        amountCents: plan.priceCents,
        currency: this.deps.currency,
      });

      await auditMembershipIntentCreated(
        this.auditWriter(params.meta, params.candidateId).withDb(trx),
        {
          membershipId: inserted.id,
          intentId: intent.id,
          planType: plan.type,
          amountCents: plan.priceCents,
          upgradeFrom: params.replaces?.id ?? null,
        },
      );

      return inserted.id;
    });

    this.deps.logger.info(`${flow}.success`, {
      flow,
      requestId: params.meta.requestId,
      candidateId: params.candidateId,
      membershipId,
      intentId: intent.id,
    });

    return {
      id: intent.id,
      clientSecret: intent.clientSecret,
      amountCents: plan.priceCents,
      currency: this.deps.currency,
      planType: plan.type,
      membershipId,
    };
  }

  private auditWriter(meta: RequestMeta | null, userId: string | null): AuditWriter {
    return new AuditWriter(this.deps.auditRepo, {
      requestId: meta?.requestId ?? null,
      ip: meta?.ip ?? null,
      userAgent: meta?.userAgent ?? null,
      userId,
    });
  }
}
