/**
 * backend/src/modules/memberships/membership.types.ts
 *
 * WHY:
 * - Domain types for the Memberships module.
 * - A membership is one paid period of one plan for one candidate.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - renewalDate is null until the payment is confirmed.
 */

import type { PaymentIntentView } from '../payments';
import type { PlanType } from './membership.plans';

export type MembershipStatus = 'PENDING' | 'ACTIVE' | 'EXPIRED' | 'CANCELLED';

export type Membership = {
  id: string;
  candidateId: string;
  planType: PlanType;
  priceCents: number;
  currency: string;
  status: MembershipStatus;

  startDate: Date | null;
  renewalDate: Date | null;

  paymentIntentId: string | null;
  /** Set on upgrade: the ACTIVE membership this one replaces once paid. */
  replacesMembershipId: string | null;

  createdAt: Date;
  updatedAt: Date;
};

export type MembershipPaymentIntent = PaymentIntentView & {
  planType: PlanType;
  membershipId: string;
};

/**
 * ACTIVATED: this call made it ACTIVE.
 * ALREADY_ACTIVE: an earlier confirmation won (idempotent confirm).
 * SUPERSEDED: paid, but the candidate already holds an equal or higher tier;
 * the row is CANCELLED and the payment needs a refund.
 */
export type ActivationOutcome = 'ACTIVATED' | 'ALREADY_ACTIVE' | 'SUPERSEDED';

export type ActivationResult = {
  membership: Membership;
  outcome: ActivationOutcome;
};
