/**
 * backend/src/modules/payments/gateway/inmem-payment-gateway.ts
 *
 * WHY:
 * - Local dev and tests run the full payment lifecycle without reaching Stripe.
 * - Webhooks are signed and verified by the Stripe SDK's own webhook helpers
 *   (offline, no API key used), so the webhook route is exercised end-to-end.
 *
 * HOW TO USE (tests):
 * - const intent = await gateway.createIntent(...)
 * - gateway.markSucceeded(intent.id)
 * - const { payload, signature } = gateway.buildEvent('payment_intent.succeeded', intent.id)
 * - POST payload to /payments/webhook with header `stripe-signature: signature`
 *
 * RULES:
 * - Implements PaymentGateway; the extra methods are for tests and dev tooling only.
 * - Never calls the Stripe API: only stripe.webhooks is used.
 */

import { randomBytes } from 'node:crypto';
import Stripe from 'stripe';

import { PaymentErrors } from '../payment.errors';
import { WebhookSignatureError, errorMessage } from './payment-gateway';
import type {
  CreateIntentInput,
  GatewayEvent,
  GatewayIntentStatus,
  GatewayPaymentIntent,
  PaymentGateway,
} from './payment-gateway';
import { toGatewayEvent } from './stripe-payment-gateway';

// The client is only a handle on stripe.webhooks; this key never reaches Stripe.
const OFFLINE_API_KEY = 'inmem-gateway-offline';

function randomId(prefix: string): string {
  return `${prefix}_${randomBytes(12).toString('hex')}`;
}

export class InMemPaymentGateway implements PaymentGateway {
  private readonly intents = new Map<string, GatewayPaymentIntent>();
  private readonly stripe = new Stripe(OFFLINE_API_KEY);
  private unavailable = false;

  constructor(private readonly webhookSecret: string) {}

  createIntent(input: CreateIntentInput): Promise<GatewayPaymentIntent> {
    if (this.unavailable) {
      return Promise.reject(PaymentErrors.gatewayFailure({ operation: 'createIntent' }));
    }

    const id = randomId('pi');
    const intent: GatewayPaymentIntent = {
      id,
      clientSecret: `${id}_secret_${randomBytes(8).toString('hex')}`,
      amountCents: input.amountCents,
      currency: input.currency,
      status: 'requires_payment_method',
      metadata: { ...input.metadata },
    };
    this.intents.set(id, intent);

    return Promise.resolve({ ...intent });
  }

  retrieveIntent(intentId: string): Promise<GatewayPaymentIntent> {
    if (this.unavailable) {
      return Promise.reject(PaymentErrors.gatewayFailure({ operation: 'retrieveIntent', intentId }));
    }

    const intent = this.intents.get(intentId);
    if (!intent) {
      return Promise.reject(
        PaymentErrors.gatewayFailure({ operation: 'retrieveIntent', intentId, reason: 'not_found' }),
      );
    }

    return Promise.resolve({ ...intent, metadata: { ...intent.metadata } });
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

  // ── test / dev controls ─────────────────────────────────────

  markSucceeded(intentId: string): void {
    this.setStatus(intentId, 'succeeded');
  }

  markFailed(intentId: string): void {
    this.setStatus(intentId, 'requires_payment_method');
  }

  markCanceled(intentId: string): void {
    this.setStatus(intentId, 'canceled');
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /**
   * Builds a signed event for the intent's current state.
   * Pass `eventId` to simulate a redelivery of the same event.
   */
  buildEvent(
    type: string,
    intentId: string,
    opts: { eventId?: string; nowMs?: number } = {},
  ): { eventId: string; payload: string; signature: string } {
    const intent = this.intents.get(intentId);
    if (!intent) throw new Error(`Unknown payment intent: ${intentId}`);

    const eventId = opts.eventId ?? randomId('evt');
    const payload = JSON.stringify({
      id: eventId,
      object: 'event',
      type,
      data: {
        object: {
          id: intent.id,
          object: 'payment_intent',
          amount: intent.amountCents,
          currency: intent.currency,
          status: intent.status,
          metadata: intent.metadata,
        },
      },
    });

    return { eventId, payload, signature: this.signatureHeader(payload, opts.nowMs) };
  }

  signatureHeader(payload: string, nowMs = Date.now()): string {
    return this.stripe.webhooks.generateTestHeaderString({
      payload,
      secret: this.webhookSecret,
      timestamp: Math.floor(nowMs / 1000),
    });
  }

  private setStatus(intentId: string, status: GatewayIntentStatus): void {
    const intent = this.intents.get(intentId);
    if (!intent) throw new Error(`Unknown payment intent: ${intentId}`);
    intent.status = status;
  }
}
