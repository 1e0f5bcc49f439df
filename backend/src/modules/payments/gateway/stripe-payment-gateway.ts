/**
 * backend/src/modules/payments/gateway/stripe-payment-gateway.ts
 *
 * WHY:
 * - Stripe implementation of PaymentGateway.
 * - Signature verification uses stripe.webhooks.constructEvent over the raw body.
 *
 * RULES:
 * - The Stripe client is injected (DI builds it from STRIPE_SECRET_KEY).
 * - Never log client secrets.
 */

import type Stripe from 'stripe';

import { PaymentErrors } from '../payment.errors';
import { WebhookSignatureError, errorMessage } from './payment-gateway';
import type {
  CreateIntentInput,
  GatewayEvent,
  GatewayPaymentIntent,
  PaymentGateway,
} from './payment-gateway';

function toGatewayIntent(intent: Stripe.PaymentIntent): GatewayPaymentIntent {
  return {
    id: intent.id,
    clientSecret: intent.client_secret,
    amountCents: intent.amount,
    currency: intent.currency,
    status: intent.status,
    metadata: intent.metadata,
  };
}

export function toGatewayEvent(event: Stripe.Event): GatewayEvent {
  return { id: event.id, type: event.type, object: event.data.object };
}

export class StripePaymentGateway implements PaymentGateway {
  constructor(
    private readonly stripe: Stripe,
    private readonly webhookSecret: string,
  ) {}

  async createIntent(input: CreateIntentInput): Promise<GatewayPaymentIntent> {
    try {
      const intent = await this.stripe.paymentIntents.create({
        amount: input.amountCents,
        currency: input.currency,
        description: input.description,
        metadata: input.metadata,
        automatic_payment_methods: { enabled: true },
      });
      return toGatewayIntent(intent);
    } catch (err) {
      throw PaymentErrors.gatewayFailure({ operation: 'createIntent', reason: errorMessage(err) });
    }
  }

  async retrieveIntent(intentId: string): Promise<GatewayPaymentIntent> {
    try {
      const intent = await this.stripe.paymentIntents.retrieve(intentId);
      return toGatewayIntent(intent);
    } catch (err) {
      throw PaymentErrors.gatewayFailure({
        operation: 'retrieveIntent',
        intentId,
        reason: errorMessage(err),
      });
    }
  }

  verifyWebhook(rawBody: Buffer | string, signature: string): GatewayEvent {
    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(rawBody, signature, this.webhookSecret);
    } catch (err) {
      throw new WebhookSignatureError(errorMessage(err));
    }

    return toGatewayEvent(event);
  }
}
