/**
 * backend/src/modules/memberships/index.ts
 *
 * WHY:
 * - Define the public surface of the memberships module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Other modules ask "is this candidate active?" through MembershipService.isActive only.
 */

export type { MembershipService } from './membership.service';
export type { Membership, MembershipStatus } from './membership.types';
export type { Plan, PlanType } from './membership.plans';
