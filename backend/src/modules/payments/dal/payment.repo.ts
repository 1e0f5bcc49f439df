/**
 * backend/src/modules/payments/dal/payment.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for payment_intents (audit copy) and payment_events (webhook dedupe).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { PaymentIntentStatus, PaymentPurpose } from '../payment.types';

export class PaymentRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): PaymentRepo {
    return new PaymentRepo(db);
  }

  async insertIntent(params: {
    id: string;
    userId: string;
    purpose: PaymentPurpose;
    referenceId: string;
    amountCents: number;
    currency: string;
  }): Promise<void> {
    await this.db
      .insertInto('payment_intents')
      .values({
        id: params.id,
        user_id: params.userId,
        purpose: params.purpose,
        reference_id: params.referenceId,
        amount_cents: params.amountCents,
        currency: params.currency,
        status: 'CREATED',
      })
      .execute();
  }

  /**
   * CREATED → FAILED | SUCCEEDED, and FAILED → SUCCEEDED (a failed attempt can
   * be retried on the same intent). SUCCEEDED is final.
   * Returns true if this call changed the row.
   */
  async markIntentStatus(params: {
    intentId: string;
    status: Exclude<PaymentIntentStatus, 'CREATED'>;
    now: Date;
  }): Promise<boolean> {
    const from: PaymentIntentStatus[] =
      params.status === 'SUCCEEDED' ? ['CREATED', 'FAILED'] : ['CREATED'];

    const row = await this.db
      .updateTable('payment_intents')
      .set({ status: params.status, updated_at: params.now })
      .where('id', '=', params.intentId)
      .where('status', 'in', from)
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * Records a webhook event id. Returns false when the id was already recorded
   * (redelivery).
   */
  async recordEvent(params: { eventId: string; type: string }): Promise<boolean> {
    const row = await this.db
      .insertInto('payment_events')
      .values({ event_id: params.eventId, type: params.type })
      .onConflict((oc) => oc.column('event_id').doNothing())
      .returning(['event_id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
