/**
 * backend/src/modules/payments/payment.errors.ts
 *
 * WHY:
 * - Payments module owns gateway failure semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include client secrets, signatures or raw payloads in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PaymentErrors = {
  gatewayFailure(meta?: AppErrorMeta) {
    return new AppError({
      code: 'PAYMENT_GATEWAY_ERROR',
      status: 502,
      message: 'Payment provider is unavailable. Try again later.',
      meta,
    });
  },

  intentNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Payment intent not found', meta);
  },
} as const;
