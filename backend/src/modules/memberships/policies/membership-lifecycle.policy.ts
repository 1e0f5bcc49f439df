/**
 * backend/src/modules/memberships/policies/membership-lifecycle.policy.ts
 *
 * WHY:
 * - Centralizes the membership purchase / upgrade / activation rules.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level MembershipErrors.
 * - "Active" means status ACTIVE *and* renewal date in the future.
 */

import type { GatewayPaymentIntent } from '../../payments';
import { MembershipErrors } from '../membership.errors';
import { MEMBERSHIP_PERIOD_DAYS, PLANS, isPlanType } from '../membership.plans';
import type { Plan } from '../membership.plans';
import type { Membership } from '../membership.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function computeRenewalDate(startDate: Date, periodDays = MEMBERSHIP_PERIOD_DAYS): Date {
  return new Date(startDate.getTime() + periodDays * DAY_MS);
}

export function isMembershipActive(membership: Membership | undefined, now: Date): boolean {
  if (!membership || membership.status !== 'ACTIVE') return false;
  if (!membership.renewalDate) return false;
  return membership.renewalDate.getTime() > now.getTime();
}

export function resolvePlan(planType: string): Plan {
  if (!isPlanType(planType)) {
    throw MembershipErrors.invalidPlan({ planType });
  }
  return PLANS[planType];
}

/**
 * New purchase: blocked when the candidate already holds an active plan of
 * equal or higher tier. A lower active tier may buy a higher one.
 */
export function assertCanPurchase(active: Membership | undefined, plan: Plan, now: Date): void {
  if (!active || !isMembershipActive(active, now)) return;

  if (PLANS[active.planType].tier >= plan.tier) {
    throw MembershipErrors.alreadyActive({
      membershipId: active.id,
      currentPlan: active.planType,
      requestedPlan: plan.type,
    });
  }
}

/**
 * Activation-time counterpart of assertCanPurchase: a paid membership loses to
 * an active plan of equal or higher tier (a stale lower-tier intent paid after
 * a higher one was activated).
 */
export function isSupersededByActive(
  active: Membership | undefined,
  paid: Membership,
  now: Date,
): boolean {
  if (!active || active.id === paid.id || !isMembershipActive(active, now)) return false;
  return PLANS[active.planType].tier >= PLANS[paid.planType].tier;
}

export function assertHasActiveMembership(
  active: Membership | undefined,
  now: Date,
): asserts active is Membership {
  if (!active || !isMembershipActive(active, now)) {
    throw MembershipErrors.noActiveMembership();
  }
}

export function assertIsUpgrade(current: Membership, plan: Plan): void {
  if (plan.tier <= PLANS[current.planType].tier) {
    throw MembershipErrors.notAnUpgrade({
      currentPlan: current.planType,
      requestedPlan: plan.type,
    });
  }
}

export function assertMembershipExists(
  membership: Membership | undefined,
): asserts membership is Membership {
  if (!membership) {
    throw MembershipErrors.membershipNotFound();
  }
}

/**
 * A candidate may only confirm their own payment. System callers
 * (webhook) pass no candidate.
 */
export function assertPaymentOwnedBy(membership: Membership, candidateId: string | null): void {
  if (candidateId !== null && membership.candidateId !== candidateId) {
    throw MembershipErrors.notYourPayment({ membershipId: membership.id });
  }
}

export function assertPaymentSucceeded(intent: GatewayPaymentIntent): void {
  if (intent.status !== 'succeeded') {
    throw MembershipErrors.paymentNotCompleted({
      intentId: intent.id,
      gatewayStatus: intent.status,
    });
  }
}
