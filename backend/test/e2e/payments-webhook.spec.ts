import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { User } from '../../src/modules/users';
import { InMemPaymentGateway } from '../../src/modules/payments/gateway/inmem-payment-gateway';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { readJson, seedUser, sessionCookieFor } from '../helpers/seed';
import {
  createVacancy,
  postWebhook,
  recordPlacement,
  type InvoiceBody,
  type PlacementBody,
} from '../helpers/flows';

type MembershipBody = { id: string; status: string; planType: string };

describe('POST /payments/webhook', () => {
  let t: TestApp;
  let candidate: User;
  let cookie: string;

  beforeEach(async () => {
    t = await buildTestApp();
    candidate = await seedUser(t.deps.db, 'CANDIDATE');
    cookie = await sessionCookieFor(t.deps.sessionStore, candidate);
  });

  afterEach(async () => {
    await t.close();
  });

  async function openMembershipIntent(planType = 'PREMIUM'): Promise<string> {
    const res = await t.app.inject({
      method: 'POST',
      url: '/memberships/payment-intents',
      headers: { cookie },
      payload: { planType },
    });
    expect(res.statusCode).toBe(201);
    return readJson<{ id: string }>(res).id;
  }

  async function history(): Promise<MembershipBody[]> {
    const res = await t.app.inject({
      method: 'GET',
      url: '/memberships/history',
      headers: { cookie },
    });
    return readJson<{ memberships: MembershipBody[] }>(res).memberships;
  }

  it('activates a membership on payment_intent.succeeded', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markSucceeded(intentId);

    const event = t.gateway.buildEvent('payment_intent.succeeded', intentId);
    expect(await postWebhook(t, event)).toEqual({ statusCode: 200, outcome: 'PROCESSED' });

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    const body = readJson<{ membership: MembershipBody | null; isActive: boolean }>(me);
    expect(body.isActive).toBe(true);
    expect(body.membership?.planType).toBe('PREMIUM');

    expect(t.queue.drain().map((m) => m.type)).toEqual(['memberships.activated']);
  });

  it('a redelivered event is acknowledged as DUPLICATE and not re-applied', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markSucceeded(intentId);

    const first = t.gateway.buildEvent('payment_intent.succeeded', intentId);
    await postWebhook(t, first);
    t.queue.drain();

    const redelivery = t.gateway.buildEvent('payment_intent.succeeded', intentId, {
      eventId: first.eventId,
    });
    expect(await postWebhook(t, redelivery)).toEqual({ statusCode: 200, outcome: 'DUPLICATE' });
    expect(t.queue.drain()).toEqual([]);
  });

  it('a second distinct success event for an active membership changes nothing', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markSucceeded(intentId);

    await postWebhook(t, t.gateway.buildEvent('payment_intent.succeeded', intentId));
    t.queue.drain();

    const second = await postWebhook(t, t.gateway.buildEvent('payment_intent.succeeded', intentId));
    expect(second).toEqual({ statusCode: 200, outcome: 'PROCESSED' });
    expect(t.queue.drain()).toEqual([]);
    expect((await history()).map((m) => m.status)).toEqual(['ACTIVE']);
  });

  it('rejects bad signatures without touching state', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markSucceeded(intentId);
    const event = t.gateway.buildEvent('payment_intent.succeeded', intentId);

    const forged = new InMemPaymentGateway('wrong-secret').signatureHeader(event.payload);
    expect(await postWebhook(t, { payload: event.payload, signature: forged })).toEqual({
      statusCode: 200,
      outcome: 'INVALID_SIGNATURE',
    });

    expect(await postWebhook(t, { payload: event.payload, signature: null })).toEqual({
      statusCode: 200,
      outcome: 'INVALID_SIGNATURE',
    });

    const stale = t.gateway.buildEvent('payment_intent.succeeded', intentId, {
      nowMs: Date.now() - 10 * 60 * 1000,
    });
    expect((await postWebhook(t, stale)).outcome).toBe('INVALID_SIGNATURE');

    expect((await history()).map((m) => m.status)).toEqual(['PENDING']);

    // The genuine event still applies afterwards.
    expect((await postWebhook(t, event)).outcome).toBe('PROCESSED');
  });

  it('ignores event types it does not handle', async () => {
    const intentId = await openMembershipIntent();

    const event = t.gateway.buildEvent('charge.refunded', intentId);
    expect(await postWebhook(t, event)).toEqual({ statusCode: 200, outcome: 'IGNORED' });
    expect((await history()).map((m) => m.status)).toEqual(['PENDING']);
  });

  it('a failed attempt keeps the membership pending so a retry can activate it', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markFailed(intentId);

    const failed = t.gateway.buildEvent('payment_intent.payment_failed', intentId);
    expect((await postWebhook(t, failed)).outcome).toBe('PROCESSED');
    expect((await history()).map((m) => m.status)).toEqual(['PENDING']);

    t.gateway.markSucceeded(intentId);
    const succeeded = t.gateway.buildEvent('payment_intent.succeeded', intentId);
    expect((await postWebhook(t, succeeded)).outcome).toBe('PROCESSED');

    const confirm = await t.app.inject({
      method: 'POST',
      url: '/memberships/confirm-payment',
      headers: { cookie },
      payload: { paymentIntentId: intentId },
    });
    expect(confirm.statusCode).toBe(200);
    expect(readJson<{ membership: MembershipBody }>(confirm).membership).toMatchObject({
      status: 'ACTIVE',
      planType: 'PREMIUM',
    });
    expect(t.queue.drain().map((m) => m.type)).toEqual(['memberships.activated']);
  });

  it('cancels the pending membership on payment_intent.canceled', async () => {
    const intentId = await openMembershipIntent();
    t.gateway.markCanceled(intentId);

    const event = t.gateway.buildEvent('payment_intent.canceled', intentId);
    expect((await postWebhook(t, event)).outcome).toBe('PROCESSED');

    expect((await history()).map((m) => m.status)).toEqual(['CANCELLED']);
  });

  it('a stale lower-tier payment does not replace an active higher tier', async () => {
    const basicIntent = await openMembershipIntent('BASIC');
    const proIntent = await openMembershipIntent('PROFESSIONAL');

    t.gateway.markSucceeded(proIntent);
    await postWebhook(t, t.gateway.buildEvent('payment_intent.succeeded', proIntent));
    t.queue.drain();

    t.gateway.markSucceeded(basicIntent);
    const stale = t.gateway.buildEvent('payment_intent.succeeded', basicIntent);
    expect(await postWebhook(t, stale)).toEqual({ statusCode: 200, outcome: 'PROCESSED' });

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    const body = readJson<{ membership: MembershipBody | null; isActive: boolean }>(me);
    expect(body.isActive).toBe(true);
    expect(body.membership).toMatchObject({ planType: 'PROFESSIONAL', status: 'ACTIVE' });

    const rows = await history();
    expect(rows.find((m) => m.planType === 'BASIC')?.status).toBe('CANCELLED');
    expect(t.queue.drain()).toEqual([]);
  });

  it('settles a placement invoice paid through the gateway', async () => {
    const team = await seedUser(t.deps.db, 'TEAM');
    const teamCookie = await sessionCookieFor(t.deps.sessionStore, team);

    const vacancy = await createVacancy(t, teamCookie);
    const { invoice } = await recordPlacement(t, teamCookie, {
      vacancyId: vacancy.id,
      candidateId: candidate.id,
    });
    expect(t.queue.drain().map((m) => m.type)).toEqual(['placements.invoice-issued']);

    const intentRes = await t.app.inject({
      method: 'POST',
      url: `/invoices/${invoice.id}/payment-intents`,
      headers: { cookie: teamCookie },
    });
    expect(intentRes.statusCode).toBe(201);
    const intent = readJson<{ id: string; amountCents: number; invoiceId: string }>(intentRes);
    expect(intent).toMatchObject({ amountCents: 5000, invoiceId: invoice.id });

    t.gateway.markSucceeded(intent.id);
    const event = t.gateway.buildEvent('payment_intent.succeeded', intent.id);
    expect((await postWebhook(t, event)).outcome).toBe('PROCESSED');

    const list = await t.app.inject({
      method: 'GET',
      url: '/placements',
      headers: { cookie: teamCookie },
    });
    const { placements } = readJson<{
      placements: Array<{ placement: PlacementBody; invoice: InvoiceBody }>;
    }>(list);

    expect(placements).toHaveLength(1);
    expect(placements[0]?.placement.status).toBe('CONFIRMED');
    expect(placements[0]?.invoice).toMatchObject({
      status: 'PAID',
      paidSource: 'GATEWAY',
      paymentIntentId: intent.id,
    });
    expect(t.queue.drain().map((m) => m.type)).toEqual(['placements.invoice-paid']);
  });

  it('acknowledges an event for an intent this service never opened without applying it', async () => {
    const stray = await t.gateway.createIntent({
      amountCents: 999,
      currency: 'usd',
      description: 'Created outside the API',
      metadata: { kind: 'MEMBERSHIP', candidateId: candidate.id, planType: 'BASIC' },
    });
    t.gateway.markSucceeded(stray.id);

    const event = t.gateway.buildEvent('payment_intent.succeeded', stray.id);
    expect(await postWebhook(t, event)).toEqual({ statusCode: 200, outcome: 'PROCESSED' });

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    expect(readJson<{ isActive: boolean }>(me).isActive).toBe(false);
    expect(await history()).toEqual([]);
    expect(t.queue.drain()).toEqual([]);
  });
});
