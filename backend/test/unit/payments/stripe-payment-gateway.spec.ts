import { describe, it, expect, vi } from 'vitest';
import Stripe from 'stripe';
import { StripePaymentGateway } from '../../../src/modules/payments/gateway/stripe-payment-gateway';
import { WebhookSignatureError } from '../../../src/modules/payments/gateway/payment-gateway';

const WEBHOOK_SECRET = 'test-secret';

function eventPayload(): string {
  return JSON.stringify({
    id: 'evt_test_1',
    object: 'event',
    type: 'payment_intent.succeeded',
    data: {
      object: {
        id: 'pi_test_1',
        object: 'payment_intent',
        status: 'succeeded',
        metadata: { kind: 'PLACEMENT_INVOICE' },
      },
    },
  });
}

describe('StripePaymentGateway', () => {
  const stripe = new Stripe('test-secret');
  const gateway = new StripePaymentGateway(stripe, WEBHOOK_SECRET);

  it('verifies a webhook signed with the endpoint secret', () => {
    const payload = eventPayload();
    const header = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

    const event = gateway.verifyWebhook(Buffer.from(payload), header);

    expect(event.id).toBe('evt_test_1');
    expect(event.type).toBe('payment_intent.succeeded');
    expect(event.object).toMatchObject({ id: 'pi_test_1', status: 'succeeded' });
  });

  it('maps SDK signature failures to WebhookSignatureError', () => {
    const payload = eventPayload();
    const header = stripe.webhooks.generateTestHeaderString({ payload, secret: 'wrong-secret' });

    expect(() => gateway.verifyWebhook(payload, header)).toThrowError(WebhookSignatureError);
  });

  it('maps SDK request failures to PAYMENT_GATEWAY_ERROR', async () => {
    vi.spyOn(stripe.paymentIntents, 'create').mockRejectedValue(new Error('connection reset'));

    await expect(
      gateway.createIntent({
        amountCents: 999,
        currency: 'usd',
        description: 'Basic membership',
        metadata: { kind: 'MEMBERSHIP' },
      }),
    ).rejects.toMatchObject({ code: 'PAYMENT_GATEWAY_ERROR', status: 502 });
  });
});
