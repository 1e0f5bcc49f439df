import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { User } from '../../src/modules/users';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { readJson, seedUser, sessionCookieFor } from '../helpers/seed';

type ErrorBody = { error: { code: string; message: string } };

type IntentBody = {
  id: string;
  clientSecret: string | null;
  amountCents: number;
  currency: string;
  planType: string;
  membershipId: string;
};

type MembershipBody = {
  id: string;
  candidateId: string;
  planType: string;
  status: string;
  startDate: string | null;
  renewalDate: string | null;
  paymentIntentId: string | null;
  replacesMembershipId: string | null;
};

const DAY_MS = 24 * 60 * 60 * 1000;

describe('memberships', () => {
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

  async function openIntent(planType: string, url = '/memberships/payment-intents') {
    return t.app.inject({ method: 'POST', url, headers: { cookie }, payload: { planType } });
  }

  async function confirm(paymentIntentId: string, as = cookie) {
    return t.app.inject({
      method: 'POST',
      url: '/memberships/confirm-payment',
      headers: { cookie: as },
      payload: { paymentIntentId },
    });
  }

  async function buyAndConfirm(planType: string, url?: string): Promise<MembershipBody> {
    const intent = readJson<IntentBody>(await openIntent(planType, url));
    t.gateway.markSucceeded(intent.id);
    const res = await confirm(intent.id);
    expect(res.statusCode).toBe(200);
    return readJson<{ membership: MembershipBody }>(res).membership;
  }

  it('lists the plan catalogue without a session', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/memberships/plans' });

    expect(res.statusCode).toBe(200);
    const { plans } = readJson<{ plans: Array<{ type: string; priceCents: number }> }>(res);
    expect(plans.map((p) => [p.type, p.priceCents])).toEqual([
      ['BASIC', 999],
      ['PREMIUM', 1999],
      ['PROFESSIONAL', 2999],
    ]);
  });

  it('requires a candidate session', async () => {
    const anonymous = await t.app.inject({
      method: 'POST',
      url: '/memberships/payment-intents',
      payload: { planType: 'BASIC' },
    });
    expect(anonymous.statusCode).toBe(401);
    expect(readJson<ErrorBody>(anonymous).error.code).toBe('UNAUTHORIZED');

    const team = await seedUser(t.deps.db, 'TEAM');
    const teamCookie = await sessionCookieFor(t.deps.sessionStore, team);
    const asTeam = await t.app.inject({
      method: 'POST',
      url: '/memberships/payment-intents',
      headers: { cookie: teamCookie },
      payload: { planType: 'BASIC' },
    });
    expect(asTeam.statusCode).toBe(403);
    expect(readJson<ErrorBody>(asTeam).error.code).toBe('FORBIDDEN');
  });

  it('rejects an unknown plan', async () => {
    const res = await openIntent('GOLD');

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).error.code).toBe('INVALID_PLAN');
  });

  it('activates a 30-day membership once the payment succeeded', async () => {
    const res = await openIntent('BASIC');
    expect(res.statusCode).toBe(201);

    const intent = readJson<IntentBody>(res);
    expect(intent).toMatchObject({ amountCents: 999, currency: 'usd', planType: 'BASIC' });
    expect(intent.id.startsWith('pi_')).toBe(true);

    const early = await confirm(intent.id);
    expect(early.statusCode).toBe(402);
    expect(readJson<ErrorBody>(early).error.code).toBe('PAYMENT_NOT_COMPLETED');

    t.gateway.markSucceeded(intent.id);
    const confirmed = await confirm(intent.id);
    expect(confirmed.statusCode).toBe(200);

    const { membership } = readJson<{ membership: MembershipBody }>(confirmed);
    expect(membership.id).toBe(intent.membershipId);
    expect(membership.status).toBe('ACTIVE');
    expect(Date.parse(membership.renewalDate ?? '') - Date.parse(membership.startDate ?? '')).toBe(
      30 * DAY_MS,
    );

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    const body = readJson<{ membership: MembershipBody | null; isActive: boolean }>(me);
    expect(body.isActive).toBe(true);
    expect(body.membership?.planType).toBe('BASIC');

    expect(t.queue.drain().map((m) => m.type)).toEqual(['memberships.activated']);
  });

  it('confirming twice returns the same active membership', async () => {
    const first = await buyAndConfirm('BASIC');
    t.queue.drain();

    const again = await confirm(first.paymentIntentId ?? '');
    expect(again.statusCode).toBe(200);

    const { membership } = readJson<{ membership: MembershipBody }>(again);
    expect(membership.id).toBe(first.id);
    expect(membership.renewalDate).toBe(first.renewalDate);
    expect(t.queue.drain()).toEqual([]);
  });

  it('blocks buying the same tier twice but allows a higher tier', async () => {
    await buyAndConfirm('PREMIUM');

    const same = await openIntent('PREMIUM');
    expect(same.statusCode).toBe(409);
    expect(readJson<ErrorBody>(same).error.code).toBe('ALREADY_ACTIVE');

    const lower = await openIntent('BASIC');
    expect(lower.statusCode).toBe(409);

    const higher = await openIntent('PROFESSIONAL');
    expect(higher.statusCode).toBe(201);
  });

  it('upgrade charges the full new price and replaces the old membership', async () => {
    const basic = await buyAndConfirm('BASIC');

    const sideways = await openIntent('BASIC', '/memberships/upgrade');
    expect(sideways.statusCode).toBe(409);
    expect(readJson<ErrorBody>(sideways).error.code).toBe('NOT_AN_UPGRADE');

    const intent = readJson<IntentBody>(await openIntent('PREMIUM', '/memberships/upgrade'));
    expect(intent.amountCents).toBe(1999);

    t.gateway.markSucceeded(intent.id);
    const premium = readJson<{ membership: MembershipBody }>(await confirm(intent.id)).membership;

    expect(premium.planType).toBe('PREMIUM');
    expect(premium.replacesMembershipId).toBe(basic.id);

    const history = await t.app.inject({
      method: 'GET',
      url: '/memberships/history',
      headers: { cookie },
    });
    const { memberships } = readJson<{ memberships: MembershipBody[] }>(history);
    expect(memberships.find((m) => m.id === basic.id)?.status).toBe('CANCELLED');
    expect(memberships.find((m) => m.id === premium.id)?.status).toBe('ACTIVE');
  });

  it('a stale lower-tier payment never replaces an active higher tier', async () => {
    const basic = readJson<IntentBody>(await openIntent('BASIC'));
    const pro = readJson<IntentBody>(await openIntent('PROFESSIONAL'));
    t.gateway.markSucceeded(basic.id);
    t.gateway.markSucceeded(pro.id);

    expect((await confirm(pro.id)).statusCode).toBe(200);
    t.queue.drain();

    const stale = await confirm(basic.id);
    expect(stale.statusCode).toBe(409);
    expect(readJson<ErrorBody>(stale).error.code).toBe('ALREADY_ACTIVE');

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    const body = readJson<{ membership: MembershipBody | null; isActive: boolean }>(me);
    expect(body.isActive).toBe(true);
    expect(body.membership?.planType).toBe('PROFESSIONAL');

    const history = await t.app.inject({
      method: 'GET',
      url: '/memberships/history',
      headers: { cookie },
    });
    const { memberships } = readJson<{ memberships: MembershipBody[] }>(history);
    expect(memberships.find((m) => m.id === basic.membershipId)?.status).toBe('CANCELLED');
    expect(t.queue.drain()).toEqual([]);
  });

  it('a lapsed membership is recorded as expired when a new one activates', async () => {
    const first = await buyAndConfirm('BASIC');
    await t.deps.db
      .updateTable('memberships')
      .set({ renewal_date: new Date(Date.now() - DAY_MS) })
      .where('id', '=', first.id)
      .execute();
    t.queue.drain();

    const second = await buyAndConfirm('BASIC');

    const history = await t.app.inject({
      method: 'GET',
      url: '/memberships/history',
      headers: { cookie },
    });
    const { memberships } = readJson<{ memberships: MembershipBody[] }>(history);
    expect(memberships.find((m) => m.id === first.id)?.status).toBe('EXPIRED');
    expect(memberships.find((m) => m.id === second.id)?.status).toBe('ACTIVE');
    expect(t.queue.drain().map((m) => m.type)).toEqual([
      'memberships.expired',
      'memberships.activated',
    ]);
  });

  it('upgrade without an active membership is rejected', async () => {
    const res = await openIntent('PREMIUM', '/memberships/upgrade');

    expect(res.statusCode).toBe(409);
    expect(readJson<ErrorBody>(res).error.code).toBe('NO_ACTIVE_MEMBERSHIP');
  });

  it('cancel ends the active membership', async () => {
    await buyAndConfirm('BASIC');

    const res = await t.app.inject({ method: 'POST', url: '/memberships/cancel', headers: { cookie } });
    expect(res.statusCode).toBe(200);
    expect(readJson<{ membership: MembershipBody }>(res).membership.status).toBe('CANCELLED');

    const me = await t.app.inject({ method: 'GET', url: '/memberships/me', headers: { cookie } });
    expect(readJson<{ membership: MembershipBody | null; isActive: boolean }>(me)).toEqual({
      membership: null,
      isActive: false,
    });

    const again = await t.app.inject({
      method: 'POST',
      url: '/memberships/cancel',
      headers: { cookie },
    });
    expect(again.statusCode).toBe(409);
    expect(readJson<ErrorBody>(again).error.code).toBe('NO_ACTIVE_MEMBERSHIP');
  });

  it("a candidate cannot confirm someone else's payment", async () => {
    const intent = readJson<IntentBody>(await openIntent('BASIC'));
    t.gateway.markSucceeded(intent.id);

    const other = await seedUser(t.deps.db, 'CANDIDATE');
    const otherCookie = await sessionCookieFor(t.deps.sessionStore, other);

    const res = await confirm(intent.id, otherCookie);
    expect(res.statusCode).toBe(403);
  });
});
