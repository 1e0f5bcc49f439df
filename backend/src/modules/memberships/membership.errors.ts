/**
 * backend/src/modules/memberships/membership.errors.ts
 *
 * WHY:
 * - Memberships module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put client secrets in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MembershipErrors = {
  invalidPlan(meta?: AppErrorMeta) {
    return new AppError({ code: 'INVALID_PLAN', status: 400, message: 'Unknown plan', meta });
  },

  alreadyActive(meta?: AppErrorMeta) {
    return new AppError({
      code: 'ALREADY_ACTIVE',
      status: 409,
      message: 'You already have an active membership on this plan or a higher one.',
      meta,
    });
  },

  noActiveMembership(meta?: AppErrorMeta) {
    return new AppError({
      code: 'NO_ACTIVE_MEMBERSHIP',
      status: 409,
      message: 'You do not have an active membership.',
      meta,
    });
  },

  notAnUpgrade(meta?: AppErrorMeta) {
    return new AppError({
      code: 'NOT_AN_UPGRADE',
      status: 409,
      message: 'The selected plan is not an upgrade of your current plan.',
      meta,
    });
  },

  paymentNotCompleted(meta?: AppErrorMeta) {
    return new AppError({
      code: 'PAYMENT_NOT_COMPLETED',
      status: 402,
      message: 'Payment has not been completed.',
      meta,
    });
  },

  membershipNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Membership not found', meta);
  },

  notYourPayment(meta?: AppErrorMeta) {
    return AppError.forbidden('This payment belongs to another account.', meta);
  },

  membershipNotPending(meta?: AppErrorMeta) {
    return AppError.conflict('Membership is no longer awaiting payment.', meta);
  },
} as const;
