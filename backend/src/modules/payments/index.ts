/**
 * backend/src/modules/payments/index.ts
 *
 * WHY:
 * - Public surface of the payments module (gateway contract + intent audit trail).
 */

export { PaymentRepo } from './dal/payment.repo';
export { getPaymentIntentById, hasProcessedPaymentEvent } from './payment.queries';
export type { GatewayPaymentIntent, PaymentGateway } from './gateway/payment-gateway';
export type {
  PaymentIntentRecord,
  PaymentIntentView,
  WebhookOutcome,
  WebhookResult,
} from './payment.types';
