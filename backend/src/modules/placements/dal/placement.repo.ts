/**
 * backend/src/modules/placements/dal/placement.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for placements and invoices.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Status changes are guarded by the expected current status (UNPAID / PENDING);
 *   a lost race shows up as `false`.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { InvoicePaymentSource } from '../placement.types';

export class PlacementRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): PlacementRepo {
    return new PlacementRepo(db);
  }

  async insertPlacement(params: {
    candidateId: string;
    teamId: string;
    vacancyId: string;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('placements')
      .values({
        candidate_id: params.candidateId,
        team_id: params.teamId,
        vacancy_id: params.vacancyId,
        status: 'PENDING',
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  async insertInvoice(params: {
    placementId: string;
    teamId: string;
    amountCents: number;
    currency: string;
    dueDate: Date;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('invoices')
      .values({
        placement_id: params.placementId,
        team_id: params.teamId,
        amount_cents: params.amountCents,
        currency: params.currency,
        status: 'UNPAID',
        due_date: params.dueDate,
        paid_at: null,
        paid_source: null,
        voided_at: null,
        payment_intent_id: null,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  /**
   * UNPAID → PAID.
   */
  async markInvoicePaid(params: {
    invoiceId: string;
    source: InvoicePaymentSource;
    paymentIntentId: string | null;
    now: Date;
  }): Promise<boolean> {
    const row = await this.db
      .updateTable('invoices')
      .set({
        status: 'PAID',
        paid_at: params.now,
        paid_source: params.source,
        updated_at: params.now,
        // admin overrides keep whatever intent the team last opened
        ...(params.paymentIntentId ? { payment_intent_id: params.paymentIntentId } : {}),
      })
      .where('id', '=', params.invoiceId)
      .where('status', '=', 'UNPAID')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * UNPAID → VOID.
   */
  async voidInvoice(params: { invoiceId: string; now: Date }): Promise<boolean> {
    const row = await this.db
      .updateTable('invoices')
      .set({ status: 'VOID', voided_at: params.now, updated_at: params.now })
      .where('id', '=', params.invoiceId)
      .where('status', '=', 'UNPAID')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * Remembers the latest intent the team opened for an UNPAID invoice.
   */
  async setInvoicePaymentIntent(params: {
    invoiceId: string;
    paymentIntentId: string;
    now: Date;
  }): Promise<boolean> {
    const row = await this.db
      .updateTable('invoices')
      .set({ payment_intent_id: params.paymentIntentId, updated_at: params.now })
      .where('id', '=', params.invoiceId)
      .where('status', '=', 'UNPAID')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * PENDING → CONFIRMED (invoice paid).
   */
  async confirmPlacement(params: { placementId: string; now: Date }): Promise<boolean> {
    const row = await this.db
      .updateTable('placements')
      .set({ status: 'CONFIRMED', updated_at: params.now })
      .where('id', '=', params.placementId)
      .where('status', '=', 'PENDING')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * PENDING → CANCELLED (invoice voided).
   */
  async cancelPlacement(params: { placementId: string; now: Date }): Promise<boolean> {
    const row = await this.db
      .updateTable('placements')
      .set({ status: 'CANCELLED', updated_at: params.now })
      .where('id', '=', params.placementId)
      .where('status', '=', 'PENDING')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
