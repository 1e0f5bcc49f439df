/**
 * backend/src/modules/placements/placement.audit.ts
 *
 * WHY:
 * - Typed audit helpers for placements and invoices.
 *
 * RULES:
 * - Call these AFTER the action succeeds.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Invoice, InvoicePaymentSource, Placement } from './placement.types';

export function auditPlacementRecorded(
  writer: AuditWriter,
  placement: Placement,
  invoice: Invoice,
): Promise<void> {
  return writer.append('placement.recorded', {
    placementId: placement.id,
    vacancyId: placement.vacancyId,
    candidateId: placement.candidateId,
    invoiceId: invoice.id,
    amountCents: invoice.amountCents,
  });
}

export function auditInvoiceIntentCreated(
  writer: AuditWriter,
  params: { invoiceId: string; intentId: string; amountCents: number },
): Promise<void> {
  return writer.append('invoice.payment_intent.created', params);
}

export function auditInvoicePaid(
  writer: AuditWriter,
  invoice: Invoice,
  source: InvoicePaymentSource,
): Promise<void> {
  return writer.append('invoice.paid', {
    invoiceId: invoice.id,
    placementId: invoice.placementId,
    teamId: invoice.teamId,
    source,
  });
}

export function auditInvoiceVoided(writer: AuditWriter, invoice: Invoice): Promise<void> {
  return writer.append('invoice.voided', {
    invoiceId: invoice.id,
    placementId: invoice.placementId,
    teamId: invoice.teamId,
  });
}
