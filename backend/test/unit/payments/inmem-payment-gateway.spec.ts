import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import { InMemPaymentGateway } from '../../../src/modules/payments/gateway/inmem-payment-gateway';
import { WebhookSignatureError } from '../../../src/modules/payments/gateway/payment-gateway';

const SECRET = 'test-secret';

async function newIntent(gateway: InMemPaymentGateway) {
  return gateway.createIntent({
    amountCents: 2999,
    currency: 'usd',
    description: 'Professional membership',
    metadata: { kind: 'MEMBERSHIP', candidateId: 'cand-1', planType: 'PROFESSIONAL' },
  });
}

describe('InMemPaymentGateway', () => {
  it('creates intents that start unpaid and carry a client secret', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    const intent = await newIntent(gateway);

    expect(intent.id).toMatch(/^pi_[0-9a-f]{24}$/);
    expect(intent.clientSecret?.startsWith(`${intent.id}_secret_`)).toBe(true);
    expect(intent.status).toBe('requires_payment_method');

    gateway.markSucceeded(intent.id);
    expect((await gateway.retrieveIntent(intent.id)).status).toBe('succeeded');
  });

  it('reports gateway failure when unavailable', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    gateway.setUnavailable(true);

    await expect(newIntent(gateway)).rejects.toBeInstanceOf(AppError);
    await expect(newIntent(gateway)).rejects.toMatchObject({
      code: 'PAYMENT_GATEWAY_ERROR',
      status: 502,
    });
  });

  it('verifies a signed event and exposes the intent object', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    const intent = await newIntent(gateway);
    gateway.markSucceeded(intent.id);

    const { eventId, payload, signature } = gateway.buildEvent(
      'payment_intent.succeeded',
      intent.id,
    );
    const event = gateway.verifyWebhook(Buffer.from(payload), signature);

    expect(event.id).toBe(eventId);
    expect(event.type).toBe('payment_intent.succeeded');
    expect(event.object).toMatchObject({
      id: intent.id,
      object: 'payment_intent',
      status: 'succeeded',
      metadata: { kind: 'MEMBERSHIP', candidateId: 'cand-1', planType: 'PROFESSIONAL' },
    });
  });

  it('rejects a tampered payload', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    const intent = await newIntent(gateway);
    const { payload, signature } = gateway.buildEvent('payment_intent.succeeded', intent.id);

    const tampered = payload.replace('"amount":2999', '"amount":1');
    expect(() => gateway.verifyWebhook(tampered, signature)).toThrowError(WebhookSignatureError);
  });

  it('rejects a signature made with another secret', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    const other = new InMemPaymentGateway('other-secret');
    const intent = await newIntent(gateway);
    const { payload } = gateway.buildEvent('payment_intent.succeeded', intent.id);

    expect(() => gateway.verifyWebhook(payload, other.signatureHeader(payload))).toThrowError(
      'No signatures found matching the expected signature',
    );
  });

  it('rejects timestamps outside the 5 minute tolerance', async () => {
    const gateway = new InMemPaymentGateway(SECRET);
    const intent = await newIntent(gateway);

    const recent = gateway.buildEvent('payment_intent.succeeded', intent.id, {
      nowMs: Date.now() - 60_000,
    });
    expect(() => gateway.verifyWebhook(recent.payload, recent.signature)).not.toThrow();

    const stale = gateway.buildEvent('payment_intent.succeeded', intent.id, {
      nowMs: Date.now() - 10 * 60_000,
    });
    expect(() => gateway.verifyWebhook(stale.payload, stale.signature)).toThrowError(
      'Timestamp outside the tolerance zone',
    );
  });

  it('rejects a malformed header', () => {
    const gateway = new InMemPaymentGateway(SECRET);
    expect(() => gateway.verifyWebhook('{}', 'not-a-signature')).toThrowError(
      WebhookSignatureError,
    );
  });
});
