import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { Db } from '../../src/shared/db/db';
import { MembershipRepo } from '../../src/modules/memberships/dal/membership.repo';
import {
  getActiveMembership,
  getMembershipByPaymentIntent,
  listMembershipsForCandidate,
} from '../../src/modules/memberships/membership.queries';
import { createMemDb } from '../helpers/mem-db';
import { seedUser } from '../helpers/seed';

const START = new Date('2026-02-01T00:00:00.000Z');
const RENEWAL = new Date('2026-03-03T00:00:00.000Z');

describe('memberships DAL', () => {
  let db: Db;
  let repo: MembershipRepo;
  let candidateId: string;

  beforeEach(async () => {
    db = await createMemDb();
    repo = new MembershipRepo(db);
    candidateId = (await seedUser(db, 'CANDIDATE')).id;
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function pending(intentId: string, planType: 'BASIC' | 'PREMIUM' = 'BASIC') {
    return repo.insertPending({
      candidateId,
      planType,
      priceCents: planType === 'BASIC' ? 999 : 1999,
      currency: 'usd',
      paymentIntentId: intentId,
      replacesMembershipId: null,
    });
  }

  it('insertPending stores a PENDING row with no dates', async () => {
    await pending('pi_a');

    const m = await getMembershipByPaymentIntent(db, 'pi_a');
    expect(m).toMatchObject({
      candidateId,
      planType: 'BASIC',
      priceCents: 999,
      status: 'PENDING',
      startDate: null,
      renewalDate: null,
    });
  });

  it('activate is guarded on PENDING', async () => {
    const { id } = await pending('pi_a');

    expect(await repo.activate({ membershipId: id, startDate: START, renewalDate: RENEWAL })).toBe(
      true,
    );
    expect(await repo.activate({ membershipId: id, startDate: START, renewalDate: RENEWAL })).toBe(
      false,
    );

    const active = await getActiveMembership(db, candidateId);
    expect(active?.id).toBe(id);
    expect(active?.renewalDate?.toISOString()).toBe(RENEWAL.toISOString());
  });

  it('cancelOtherActive cancels every other ACTIVE row of the candidate', async () => {
    const { id: oldId } = await pending('pi_old');
    await repo.activate({ membershipId: oldId, startDate: START, renewalDate: RENEWAL });
    const { id: newId } = await pending('pi_new', 'PREMIUM');

    const cancelled = await repo.cancelOtherActive({
      candidateId,
      keepMembershipId: newId,
      now: START,
    });

    expect(cancelled).toEqual([oldId]);
    expect(await getActiveMembership(db, candidateId)).toBeUndefined();
  });

  it('expireLapsedForCandidate expires only rows already past renewal', async () => {
    const { id: oldId } = await pending('pi_old');
    await repo.activate({ membershipId: oldId, startDate: START, renewalDate: RENEWAL });
    const { id: newId } = await pending('pi_new', 'PREMIUM');

    const early = await repo.expireLapsedForCandidate({
      candidateId,
      keepMembershipId: newId,
      now: new Date('2026-03-02T00:00:00.000Z'),
    });
    expect(early).toEqual([]);

    const late = await repo.expireLapsedForCandidate({
      candidateId,
      keepMembershipId: newId,
      now: new Date('2026-03-04T00:00:00.000Z'),
    });
    expect(late).toEqual([oldId]);

    const history = await listMembershipsForCandidate(db, candidateId);
    expect(history.find((m) => m.id === oldId)?.status).toBe('EXPIRED');
    expect(history.find((m) => m.id === newId)?.status).toBe('PENDING');
  });

  it('cancelPending only touches PENDING rows', async () => {
    const { id } = await pending('pi_a');
    await repo.activate({ membershipId: id, startDate: START, renewalDate: RENEWAL });

    expect(await repo.cancelPending({ membershipId: id, now: START })).toBe(false);
    expect(await repo.cancelActive({ membershipId: id, now: START })).toBe(true);
  });

  it('expireDue expires only ACTIVE rows past renewal', async () => {
    const { id: due } = await pending('pi_due');
    await repo.activate({ membershipId: due, startDate: START, renewalDate: RENEWAL });
    await pending('pi_pending');

    const beforeRenewal = await repo.expireDue(new Date('2026-03-02T23:59:59.000Z'));
    expect(beforeRenewal).toEqual([]);

    const afterRenewal = await repo.expireDue(new Date('2026-03-03T00:00:01.000Z'));
    expect(afterRenewal).toEqual([{ id: due, candidateId }]);

    const history = await listMembershipsForCandidate(db, candidateId);
    expect(history.map((m) => m.status).sort()).toEqual(['EXPIRED', 'PENDING']);
  });
});
