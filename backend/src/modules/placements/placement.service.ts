/**
 * backend/src/modules/placements/placement.service.ts
 *
 * WHY:
 * - Records placements with their fixed-fee invoice, settles/voids invoices,
 *   and answers the vacancy gate ("does this team owe us money?").
 * - Only place allowed to start placement/invoice transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Gateway calls happen OUTSIDE transactions.
 * - Invoice writes are guarded (`WHERE status = 'UNPAID'`); a lost race is
 *   re-read and resolved, never silently overwritten.
 * - Notifications are collected in an Outbox and enqueued after commit.
 */

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation } from '../../shared/db/pg-errors';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import { Outbox } from '../../shared/messaging/outbox';
import type { RequestMeta } from '../../shared/http/request-meta';
import { AppError } from '../../shared/http/errors';

import { assertIsCandidate, getUserById } from '../users';
import { getVacancyById } from '../vacancies';
import type { PaymentGateway, PaymentRepo } from '../payments';

import type { PlacementRepo } from './dal/placement.repo';
import {
  getInvoiceById,
  getPlacementById,
  getPlacementByVacancyAndCandidate,
  getUnpaidInvoiceIdsForTeam,
  listPlacementsWithInvoicesForTeam,
  listUnpaidInvoices,
} from './placement.queries';
import {
  assertInvoiceExists,
  assertInvoiceOwnedBy,
  assertInvoicePayable,
  assertNoUnpaidInvoices,
  computeDueDate,
} from './policies/invoice.policy';
import { PlacementErrors } from './placement.errors';
import {
  auditInvoiceIntentCreated,
  auditInvoicePaid,
  auditInvoiceVoided,
  auditPlacementRecorded,
} from './placement.audit';
import { INVOICE_INTENT_RATE_LIMIT, PLACEMENT_FEE_CENTS } from './placement.constants';
import type {
  Invoice,
  InvoicePaymentIntent,
  InvoicePaymentOutcome,
  InvoicePaymentSource,
  PlacementWithInvoice,
} from './placement.types';

export class PlacementService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      rateLimiter: RateLimiter;
      gateway: PaymentGateway;
      auditRepo: AuditRepo;
      queue: Queue;
      placementRepo: PlacementRepo;
      paymentRepo: PaymentRepo;
      currency: string;
    },
  ) {}

  async recordPlacement(params: {
    teamId: string;
    candidateId: string;
    vacancyId: string;
    meta: RequestMeta;
  }): Promise<PlacementWithInvoice> {
    const flow = 'placements.record';
    const outbox = new Outbox();

    this.deps.logger.info('placements.record.start', {
      flow,
      requestId: params.meta.requestId,
      teamId: params.teamId,
      vacancyId: params.vacancyId,
      candidateId: params.candidateId,
    });

    let result: PlacementWithInvoice;
    try {
      result = await this.deps.db.transaction().execute(async (trx) => {
        const now = new Date();

        const vacancy = await getVacancyById(trx, params.vacancyId);
        if (!vacancy || vacancy.teamId !== params.teamId) {
          throw PlacementErrors.vacancyNotFound({ vacancyId: params.vacancyId });
        }

        const candidate = await getUserById(trx, params.candidateId);
        assertIsCandidate(candidate);

        const existing = await getPlacementByVacancyAndCandidate(trx, {
          vacancyId: params.vacancyId,
          candidateId: params.candidateId,
        });
        if (existing) {
          throw PlacementErrors.duplicatePlacement({ placementId: existing.id });
        }

        const placementRepo = this.deps.placementRepo.withDb(trx);

        const { id: placementId } = await placementRepo.insertPlacement({
          teamId: params.teamId,
          candidateId: params.candidateId,
          vacancyId: params.vacancyId,
        });

        const { id: invoiceId } = await placementRepo.insertInvoice({
          placementId,
          teamId: params.teamId,
          amountCents: PLACEMENT_FEE_CENTS,
          currency: this.deps.currency,
          dueDate: computeDueDate(now),
        });

        const placement = await getPlacementById(trx, placementId);
        const invoice = await getInvoiceById(trx, invoiceId);
        if (!placement || !invoice) {
          throw AppError.internal('Placement or invoice missing after insert');
        }

        await auditPlacementRecorded(
          this.auditWriter(params.meta, params.teamId).withDb(trx),
          placement,
          invoice,
        );

        outbox.add({
          type: 'placements.invoice-issued',
          teamId: params.teamId,
          invoiceId: invoice.id,
          amountCents: invoice.amountCents,
          currency: invoice.currency,
          dueDate: invoice.dueDate.toISOString(),
        });

        return { placement, invoice };
      });
    } catch (err) {
      // Concurrent insert of the same (vacancy, candidate) pair.
      if (isUniqueViolation(err)) {
        throw PlacementErrors.duplicatePlacement({
          vacancyId: params.vacancyId,
          candidateId: params.candidateId,
        });
      }
      throw err;
    }

    await outbox.flush(this.deps.queue);

    this.deps.logger.info('placements.record.success', {
      flow,
      requestId: params.meta.requestId,
      placementId: result.placement.id,
      invoiceId: result.invoice.id,
    });

    return result;
  }

  /**
   * Marks an invoice PAID and confirms its placement.
   * Idempotent on PAID; a VOID invoice cannot be paid.
   */
  async markInvoicePaid(params: {
    invoiceId: string;
    source: InvoicePaymentSource;
    actorId: string | null;
    meta: RequestMeta;
  }): Promise<Invoice> {
    const outbox = new Outbox();

    const result = await this.deps.db.transaction().execute((trx) =>
      this.markInvoicePaidInTx(trx, {
        invoiceId: params.invoiceId,
        source: params.source,
        paymentIntentId: null,
        now: new Date(),
        audit: this.auditWriter(params.meta, params.actorId),
        outbox,
      }),
    );

    if (result.outcome === 'NOT_FOUND') {
      throw PlacementErrors.invoiceNotFound({ invoiceId: params.invoiceId });
    }
    if (result.outcome === 'VOID') {
      throw PlacementErrors.invoiceVoid({ invoiceId: params.invoiceId });
    }

    await outbox.flush(this.deps.queue);
    return result.invoice;
  }

  /**
   * Shared by admin override and the webhook (caller owns the tx).
   */
  async markInvoicePaidInTx(
    trx: DbExecutor,
    params: {
      invoiceId: string;
      source: InvoicePaymentSource;
      paymentIntentId: string | null;
      now: Date;
      audit: AuditWriter;
      outbox: Outbox;
    },
  ): Promise<InvoicePaymentOutcome> {
    const flow = 'placements.invoice_paid';

    const invoice = await getInvoiceById(trx, params.invoiceId);
    if (!invoice) return { outcome: 'NOT_FOUND' };
    if (invoice.status === 'PAID') return { outcome: 'ALREADY_PAID', invoice };
    if (invoice.status === 'VOID') return { outcome: 'VOID', invoice };

    const placementRepo = this.deps.placementRepo.withDb(trx);

    const paid = await placementRepo.markInvoicePaid({
      invoiceId: invoice.id,
      source: params.source,
      paymentIntentId: params.paymentIntentId,
      now: params.now,
    });

    if (!paid) {
      // Lost the race: report whatever the winner left.
      const current = await getInvoiceById(trx, invoice.id);
      assertInvoiceExists(current);
      return current.status === 'PAID'
        ? { outcome: 'ALREADY_PAID', invoice: current }
        : { outcome: 'VOID', invoice: current };
    }

    await placementRepo.confirmPlacement({ placementId: invoice.placementId, now: params.now });

    if (params.paymentIntentId) {
      await this.deps.paymentRepo.withDb(trx).markIntentStatus({
        intentId: params.paymentIntentId,
        status: 'SUCCEEDED',
        now: params.now,
      });
    }

    const updated = await getInvoiceById(trx, invoice.id);
    assertInvoiceExists(updated);

    await auditInvoicePaid(params.audit.withDb(trx), updated, params.source);

    params.outbox.add({
      type: 'placements.invoice-paid',
      teamId: updated.teamId,
      invoiceId: updated.id,
    });

    this.deps.logger.info('placements.invoice_paid.success', {
      flow,
      invoiceId: updated.id,
      teamId: updated.teamId,
      source: params.source,
    });

    return { outcome: 'PAID', invoice: updated };
  }

  /**
   * Admin only: UNPAID → VOID, placement → CANCELLED. Idempotent on VOID.
   */
  async voidInvoice(params: {
    invoiceId: string;
    actorId: string;
    meta: RequestMeta;
  }): Promise<Invoice> {
    return this.deps.db.transaction().execute(async (trx) => {
      const now = new Date();

      const invoice = await getInvoiceById(trx, params.invoiceId);
      assertInvoiceExists(invoice);

      if (invoice.status === 'VOID') return invoice;
      if (invoice.status === 'PAID') {
        throw PlacementErrors.invoiceAlreadyPaid({ invoiceId: invoice.id });
      }

      const placementRepo = this.deps.placementRepo.withDb(trx);

      const voided = await placementRepo.voidInvoice({ invoiceId: invoice.id, now });
      if (!voided) {
        const current = await getInvoiceById(trx, invoice.id);
        assertInvoiceExists(current);
        if (current.status === 'VOID') return current;
        throw PlacementErrors.invoiceAlreadyPaid({ invoiceId: invoice.id });
      }

      await placementRepo.cancelPlacement({ placementId: invoice.placementId, now });

      const updated = await getInvoiceById(trx, invoice.id);
      assertInvoiceExists(updated);

      await auditInvoiceVoided(this.auditWriter(params.meta, params.actorId).withDb(trx), updated);

      this.deps.logger.info('placements.invoice_void.success', {
        flow: 'placements.invoice_void',
        requestId: params.meta.requestId,
        invoiceId: updated.id,
        teamId: updated.teamId,
      });

      return updated;
    });
  }

  async canCreateVacancy(teamId: string, db: DbExecutor = this.deps.db): Promise<boolean> {
    const unpaid = await getUnpaidInvoiceIdsForTeam(db, teamId);
    return unpaid.length === 0;
  }

  /**
   * Vacancy gate. Pass the caller's transaction so the check and the insert
   * see the same snapshot.
   */
  async assertCanCreateVacancy(teamId: string, db: DbExecutor = this.deps.db): Promise<void> {
    const unpaid = await getUnpaidInvoiceIdsForTeam(db, teamId);
    assertNoUnpaidInvoices(unpaid);
  }

  /**
   * Opens a gateway payment for an UNPAID invoice. Settlement arrives by webhook.
   * The intent already attached to the invoice is returned again until the
   * gateway cancels it, so one invoice never has two chargeable intents.
   */
  async createInvoicePaymentIntent(params: {
    teamId: string;
    invoiceId: string;
    meta: RequestMeta;
  }): Promise<InvoicePaymentIntent> {
    const flow = 'placements.invoice_intent';

    const invoice = await getInvoiceById(this.deps.db, params.invoiceId);
    assertInvoiceOwnedBy(invoice, params.teamId);
    assertInvoicePayable(invoice);

    await this.deps.rateLimiter.hitOrThrow({
      key: `placements:invoice-intent:user:${params.teamId}`,
      ...INVOICE_INTENT_RATE_LIMIT,
    });

    if (invoice.paymentIntentId) {
      const existing = await this.deps.gateway.retrieveIntent(invoice.paymentIntentId);
      if (existing.status !== 'canceled') {
        this.deps.logger.info('placements.invoice_intent.reused', {
          flow,
          requestId: params.meta.requestId,
          invoiceId: invoice.id,
          intentId: existing.id,
          gatewayStatus: existing.status,
        });

        return {
          id: existing.id,
          clientSecret: existing.clientSecret,
          amountCents: invoice.amountCents,
          currency: invoice.currency,
          invoiceId: invoice.id,
        };
      }
    }

    const intent = await this.deps.gateway.createIntent({
      amountCents: invoice.amountCents,
      currency: invoice.currency,
      description: `Placement fee (invoice ${invoice.id})`,
      metadata: {
        kind: 'PLACEMENT_INVOICE',
        invoiceId: invoice.id,
        teamId: params.teamId,
      },
    });

    await this.deps.db.transaction().execute(async (trx) => {
      const now = new Date();

      const attached = await this.deps.placementRepo.withDb(trx).setInvoicePaymentIntent({
        invoiceId: invoice.id,
        paymentIntentId: intent.id,
        now,
      });
      if (!attached) {
        // Paid or voided while we were talking to the gateway.
        throw PlacementErrors.invoiceAlreadyPaid({ invoiceId: invoice.id });
      }

      await this.deps.paymentRepo.withDb(trx).insertIntent({
        id: intent.id,
        userId: params.teamId,
        purpose: 'PLACEMENT_INVOICE',
        referenceId: invoice.id,
        amountCents: invoice.amountCents,
        currency: invoice.currency,
      });

      await auditInvoiceIntentCreated(this.auditWriter(params.meta, params.teamId).withDb(trx), {
        invoiceId: invoice.id,
        intentId: intent.id,
        amountCents: invoice.amountCents,
      });
    });

    this.deps.logger.info('placements.invoice_intent.success', {
      flow,
      requestId: params.meta.requestId,
      invoiceId: invoice.id,
      intentId: intent.id,
    });

    return {
      id: intent.id,
      clientSecret: intent.clientSecret,
      amountCents: invoice.amountCents,
      currency: invoice.currency,
      invoiceId: invoice.id,
    };
  }

  async listTeamPlacements(teamId: string): Promise<PlacementWithInvoice[]> {
    return listPlacementsWithInvoicesForTeam(this.deps.db, teamId);
  }

  async listUnpaidInvoices(): Promise<Invoice[]> {
    return listUnpaidInvoices(this.deps.db);
  }

  private auditWriter(meta: RequestMeta, userId: string | null): AuditWriter {
    return new AuditWriter(this.deps.auditRepo, {
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
      userId,
    });
  }
}
