/**
 * backend/src/modules/memberships/membership.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Memberships module.
 * - Keeps audit metadata consistent and typo-free per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No business rules (call these AFTER the action succeeds).
 * - Never include client secrets in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Membership } from './membership.types';

export function auditMembershipIntentCreated(
  writer: AuditWriter,
  params: { membershipId: string; intentId: string; planType: string; amountCents: number; upgradeFrom: string | null },
): Promise<void> {
  return writer.append('membership.payment_intent.created', params);
}

export function auditMembershipPaymentFailed(
  writer: AuditWriter,
  membership: Membership,
): Promise<void> {
  return writer.append('membership.payment_failed', {
    membershipId: membership.id,
    planType: membership.planType,
    intentId: membership.paymentIntentId,
  });
}

export function auditMembershipActivated(
  writer: AuditWriter,
  membership: Membership,
  replacedMembershipIds: string[],
): Promise<void> {
  return writer.append('membership.activated', {
    membershipId: membership.id,
    planType: membership.planType,
    intentId: membership.paymentIntentId,
    renewalDate: membership.renewalDate?.toISOString() ?? null,
    replacedMembershipIds,
  });
}

export function auditMembershipUpgraded(
  writer: AuditWriter,
  membership: Membership,
  fromMembershipId: string,
): Promise<void> {
  return writer.append('membership.upgraded', {
    membershipId: membership.id,
    fromMembershipId,
    planType: membership.planType,
  });
}

export function auditMembershipCancelled(
  writer: AuditWriter,
  membership: Membership,
  reason: 'candidate_request' | 'payment_canceled' | 'superseded',
  extra: { supersededBy?: string } = {},
): Promise<void> {
  return writer.append('membership.cancelled', {
    membershipId: membership.id,
    planType: membership.planType,
    reason,
    ...extra,
  });
}

export function auditMembershipsExpired(
  writer: AuditWriter,
  rows: ReadonlyArray<{ membershipId: string; candidateId: string }>,
): Promise<void> {
  return writer.appendMany(
    rows.map((row) => ({ action: 'membership.expired', metadata: { ...row } })),
  );
}
