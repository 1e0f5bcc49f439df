import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'node:crypto';

import type { Db } from '../../src/shared/db/db';
import { PaymentRepo } from '../../src/modules/payments/dal/payment.repo';
import {
  getPaymentIntentById,
  hasProcessedPaymentEvent,
} from '../../src/modules/payments/payment.queries';
import { createMemDb } from '../helpers/mem-db';
import { seedUser } from '../helpers/seed';

describe('payments DAL', () => {
  let db: Db;
  let repo: PaymentRepo;

  beforeEach(async () => {
    db = await createMemDb();
    repo = new PaymentRepo(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('recordEvent dedupes on the gateway event id', async () => {
    expect(await hasProcessedPaymentEvent(db, 'evt_1')).toBe(false);

    expect(await repo.recordEvent({ eventId: 'evt_1', type: 'payment_intent.succeeded' })).toBe(
      true,
    );
    expect(await repo.recordEvent({ eventId: 'evt_1', type: 'payment_intent.succeeded' })).toBe(
      false,
    );

    expect(await hasProcessedPaymentEvent(db, 'evt_1')).toBe(true);
  });

  it('markIntentStatus moves CREATED to a terminal status once', async () => {
    const user = await seedUser(db, 'CANDIDATE');
    await repo.insertIntent({
      id: 'pi_1',
      userId: user.id,
      purpose: 'MEMBERSHIP',
      referenceId: randomUUID(),
      amountCents: 999,
      currency: 'usd',
    });

    const now = new Date();
    expect(await repo.markIntentStatus({ intentId: 'pi_1', status: 'SUCCEEDED', now })).toBe(true);
    expect(await repo.markIntentStatus({ intentId: 'pi_1', status: 'FAILED', now })).toBe(false);

    expect((await getPaymentIntentById(db, 'pi_1'))?.status).toBe('SUCCEEDED');
  });

  it('markIntentStatus lets a failed attempt be followed by success', async () => {
    const user = await seedUser(db, 'CANDIDATE');
    await repo.insertIntent({
      id: 'pi_2',
      userId: user.id,
      purpose: 'MEMBERSHIP',
      referenceId: randomUUID(),
      amountCents: 1999,
      currency: 'usd',
    });

    const now = new Date();
    expect(await repo.markIntentStatus({ intentId: 'pi_2', status: 'FAILED', now })).toBe(true);
    expect(await repo.markIntentStatus({ intentId: 'pi_2', status: 'FAILED', now })).toBe(false);
    expect(await repo.markIntentStatus({ intentId: 'pi_2', status: 'SUCCEEDED', now })).toBe(true);

    expect((await getPaymentIntentById(db, 'pi_2'))?.status).toBe('SUCCEEDED');
  });
});
