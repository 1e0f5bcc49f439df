/**
 * backend/src/modules/payments/payment-webhook.service.ts
 *
 * WHY:
 * - Single entry point for gateway events.
 * - Verifies, dedupes and routes payment intent events to memberships or placements.
 *
 * RULES:
 * - A bad signature changes nothing and is acknowledged (never retried into success).
 * - Dedupe row and state change commit together; a handler error rolls both back
 *   and propagates so the gateway retries. The pre-check outside the transaction
 *   only short-cuts redeliveries; the insert conflict is the real guard.
 * - Events for intents this service did not create (no payment_intents row, or a
 *   row whose purpose/reference disagrees with the metadata) are acknowledged
 *   and logged, never applied.
 * - payment_failed is one failed attempt, not the end of the intent; only
 *   payment_intent.canceled cancels a pending membership.
 * - Notifications are enqueued after commit.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import { Outbox } from '../../shared/messaging/outbox';
import type { RequestMeta } from '../../shared/http/request-meta';

import type { MembershipService } from '../memberships';
import type { PlacementService } from '../placements';

import type { PaymentRepo } from './dal/payment.repo';
import { getPaymentIntentById, hasProcessedPaymentEvent } from './payment.queries';
import { WebhookSignatureError } from './gateway/payment-gateway';
import type { GatewayEvent, PaymentGateway } from './gateway/payment-gateway';
import { isHandledEventType, webhookIntentSchema } from './payment.schemas';
import type { HandledEventType, WebhookIntent } from './payment.schemas';
import type { WebhookResult } from './payment.types';

type RouteContext = {
  trx: DbExecutor;
  eventId: string;
  type: HandledEventType;
  intent: WebhookIntent;
  now: Date;
  audit: AuditWriter;
  outbox: Outbox;
};

export class PaymentWebhookService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      gateway: PaymentGateway;
      auditRepo: AuditRepo;
      queue: Queue;
      paymentRepo: PaymentRepo;
      membershipService: MembershipService;
      placementService: PlacementService;
    },
  ) {}

  async handleWebhook(params: {
    rawBody: Buffer | string;
    signature: string | null;
    meta: RequestMeta;
  }): Promise<WebhookResult> {
    const flow = 'payments.webhook';
    const { logger } = this.deps;

    if (!params.signature) {
      logger.warn('payments.webhook.invalid_signature', {
        flow,
        requestId: params.meta.requestId,
        reason: 'missing signature header',
      });
      return { outcome: 'INVALID_SIGNATURE', eventId: null, eventType: null };
    }

    let event: GatewayEvent;
    try {
      event = this.deps.gateway.verifyWebhook(params.rawBody, params.signature);
    } catch (err) {
      if (err instanceof WebhookSignatureError) {
        logger.warn('payments.webhook.invalid_signature', {
          flow,
          requestId: params.meta.requestId,
          reason: err.message,
        });
        return { outcome: 'INVALID_SIGNATURE', eventId: null, eventType: null };
      }
      throw err;
    }

    const base = { eventId: event.id, eventType: event.type };

    const { type } = event;
    if (!isHandledEventType(type)) {
      logger.info('payments.webhook.ignored', { flow, ...base, reason: 'unhandled event type' });
      return { outcome: 'IGNORED', ...base };
    }

    const parsed = webhookIntentSchema.safeParse(event.object);
    if (!parsed.success) {
      logger.warn('payments.webhook.ignored', {
        flow,
        ...base,
        reason: 'unexpected payload shape',
        issues: parsed.error.issues.map((i) => i.path.join('.')),
      });
      return { outcome: 'IGNORED', ...base };
    }
    const intent = parsed.data;

    if (await hasProcessedPaymentEvent(this.deps.db, event.id)) {
      logger.info('payments.webhook.duplicate', { flow, ...base });
      return { outcome: 'DUPLICATE', ...base };
    }

    const outbox = new Outbox();
    const audit = new AuditWriter(this.deps.auditRepo, {
      requestId: params.meta.requestId,
      ip: params.meta.ip,
      userAgent: params.meta.userAgent,
      userId: null,
    });

    const fresh = await this.deps.db.transaction().execute(async (trx) => {
      const recorded = await this.deps.paymentRepo
        .withDb(trx)
        .recordEvent({ eventId: event.id, type });
      if (!recorded) return false;

      await this.route({ trx, eventId: event.id, type, intent, now: new Date(), audit, outbox });
      return true;
    });

    if (!fresh) {
      logger.info('payments.webhook.duplicate', { flow, ...base });
      return { outcome: 'DUPLICATE', ...base };
    }

    await outbox.flush(this.deps.queue);

    logger.info('payments.webhook.processed', {
      flow,
      ...base,
      intentId: intent.id,
      kind: intent.metadata.kind,
    });

    return { outcome: 'PROCESSED', ...base };
  }

  private async route(ctx: RouteContext): Promise<void> {
    const { metadata } = ctx.intent;
    const record = await getPaymentIntentById(ctx.trx, ctx.intent.id);

    const matches =
      record !== undefined &&
      record.purpose === metadata.kind &&
      (metadata.kind === 'MEMBERSHIP' || record.referenceId === metadata.invoiceId);

    if (!matches) {
      this.deps.logger.warn('payments.webhook.unknown_reference', {
        flow: 'payments.webhook',
        eventId: ctx.eventId,
        intentId: ctx.intent.id,
        kind: metadata.kind,
        recordPurpose: record?.purpose ?? null,
      });
      return;
    }

    if (metadata.kind === 'MEMBERSHIP') {
      await this.routeMembership(ctx);
      return;
    }
    await this.routeInvoice(ctx, metadata.invoiceId);
  }

  private async routeMembership(ctx: RouteContext): Promise<void> {
    const { membershipService } = this.deps;
    const flow = 'payments.webhook.membership';

    const membership = await membershipService.findByPaymentIntent(ctx.intent.id, ctx.trx);
    if (!membership) {
      this.deps.logger.warn('payments.webhook.unknown_reference', {
        flow,
        eventId: ctx.eventId,
        intentId: ctx.intent.id,
      });
      return;
    }

    if (ctx.type === 'payment_intent.succeeded') {
      if (membership.status !== 'PENDING' && membership.status !== 'ACTIVE') {
        // Paid after it was cancelled/expired: needs a human (refund).
        this.deps.logger.warn('payments.webhook.membership_not_pending', {
          flow,
          eventId: ctx.eventId,
          membershipId: membership.id,
          status: membership.status,
        });
        return;
      }

      await membershipService.activateInTx(ctx.trx, {
        intentId: ctx.intent.id,
        now: ctx.now,
        audit: ctx.audit,
        outbox: ctx.outbox,
      });
      return;
    }

    if (ctx.type === 'payment_intent.payment_failed') {
      // Not final: the client may retry on the same intent.
      await membershipService.recordFailedAttemptInTx(ctx.trx, {
        intentId: ctx.intent.id,
        now: ctx.now,
        audit: ctx.audit,
      });
      return;
    }

    await membershipService.cancelPendingInTx(ctx.trx, {
      intentId: ctx.intent.id,
      now: ctx.now,
      audit: ctx.audit,
    });
  }

  private async routeInvoice(ctx: RouteContext, invoiceId: string): Promise<void> {
    const flow = 'payments.webhook.invoice';

    if (ctx.type !== 'payment_intent.succeeded') {
      // Invoice stays UNPAID; the team can open a new intent.
      await this.deps.paymentRepo.withDb(ctx.trx).markIntentStatus({
        intentId: ctx.intent.id,
        status: 'FAILED',
        now: ctx.now,
      });
      this.deps.logger.info('payments.webhook.invoice_payment_failed', {
        flow,
        eventId: ctx.eventId,
        invoiceId,
        intentId: ctx.intent.id,
      });
      return;
    }

    const result = await this.deps.placementService.markInvoicePaidInTx(ctx.trx, {
      invoiceId,
      source: 'GATEWAY',
      paymentIntentId: ctx.intent.id,
      now: ctx.now,
      audit: ctx.audit,
      outbox: ctx.outbox,
    });

    if (result.outcome === 'VOID' || result.outcome === 'NOT_FOUND') {
      this.deps.logger.warn('payments.webhook.invoice_not_payable', {
        flow,
        eventId: ctx.eventId,
        invoiceId,
        intentId: ctx.intent.id,
        outcome: result.outcome,
      });
    }
  }
}
