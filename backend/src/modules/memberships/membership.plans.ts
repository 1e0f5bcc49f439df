/**
 * backend/src/modules/memberships/membership.plans.ts
 *
 * WHY:
 * - Single catalogue of candidate plans (price, tier, features).
 * - Tier order drives AlreadyActive / NotAnUpgrade decisions.
 *
 * RULES:
 * - Prices are integer cents.
 * - Tiers strictly increase: BASIC < PREMIUM < PROFESSIONAL.
 */

export const PLAN_TYPES = ['BASIC', 'PREMIUM', 'PROFESSIONAL'] as const;

export type PlanType = (typeof PLAN_TYPES)[number];

export type Plan = {
  type: PlanType;
  name: string;
  tier: number;
  priceCents: number;
  features: readonly string[];
};

export const MEMBERSHIP_PERIOD_DAYS = 30;

export const PLANS: Readonly<Record<PlanType, Plan>> = {
  BASIC: {
    type: 'BASIC',
    name: 'Basic',
    tier: 1,
    priceCents: 999,
    features: ['Create a candidate profile', 'Apply to up to 10 vacancies per month', 'Message teams'],
  },
  PREMIUM: {
    type: 'PREMIUM',
    name: 'Premium',
    tier: 2,
    priceCents: 1999,
    features: [
      'Everything in Basic',
      'Unlimited applications',
      'Upload highlight videos',
      'Profile shown to teams first',
    ],
  },
  PROFESSIONAL: {
    type: 'PROFESSIONAL',
    name: 'Professional',
    tier: 3,
    priceCents: 2999,
    features: [
      'Everything in Premium',
      'Verified badge',
      'Direct introductions to scouts',
      'Priority support',
    ],
  },
};

export function isPlanType(value: string): value is PlanType {
  return PLAN_TYPES.some((type) => type === value);
}

export function listPlans(): Plan[] {
  return PLAN_TYPES.map((type) => PLANS[type]);
}
