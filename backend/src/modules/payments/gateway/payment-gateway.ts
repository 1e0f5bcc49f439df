/**
 * backend/src/modules/payments/gateway/payment-gateway.ts
 *
 * WHY:
 * - Memberships and placements depend on this interface, never on the Stripe SDK.
 * - Production wires StripePaymentGateway; dev/tests wire InMemPaymentGateway.
 *
 * RULES:
 * - Adapters translate SDK failures into PaymentErrors.gatewayFailure().
 * - verifyWebhook throws WebhookSignatureError and nothing else on a bad signature.
 * - No DB access.
 */

export type GatewayIntentStatus =
  | 'requires_payment_method'
  | 'requires_confirmation'
  | 'requires_action'
  | 'processing'
  | 'requires_capture'
  | 'canceled'
  | 'succeeded';

export type GatewayPaymentIntent = {
  id: string;
  clientSecret: string | null;
  amountCents: number;
  currency: string;
  status: GatewayIntentStatus;
  metadata: Record<string, string>;
};

export type CreateIntentInput = {
  amountCents: number;
  currency: string;
  description: string;
  metadata: Record<string, string>;
};

/**
 * Verified event envelope. `object` is the event's data object, validated by
 * the webhook service before use.
 */
export type GatewayEvent = {
  id: string;
  type: string;
  object: unknown;
};

export class WebhookSignatureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebhookSignatureError';
  }
}

export interface PaymentGateway {
  createIntent(input: CreateIntentInput): Promise<GatewayPaymentIntent>;
  retrieveIntent(intentId: string): Promise<GatewayPaymentIntent>;
  verifyWebhook(rawBody: Buffer | string, signature: string): GatewayEvent;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
