/**
 * backend/src/modules/placements/policies/invoice.policy.ts
 *
 * WHY:
 * - Invoice state machine and the vacancy gate, as pure rules.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level PlacementErrors.
 * - No reverse transitions: PAID and VOID are terminal.
 */

import { PlacementErrors } from '../placement.errors';
import { INVOICE_DUE_DAYS } from '../placement.constants';
import type { Invoice } from '../placement.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function computeDueDate(issuedAt: Date, dueDays = INVOICE_DUE_DAYS): Date {
  return new Date(issuedAt.getTime() + dueDays * DAY_MS);
}

export function assertInvoiceExists(invoice: Invoice | undefined): asserts invoice is Invoice {
  if (!invoice) {
    throw PlacementErrors.invoiceNotFound();
  }
}

export function assertInvoiceOwnedBy(
  invoice: Invoice | undefined,
  teamId: string,
): asserts invoice is Invoice {
  if (!invoice || invoice.teamId !== teamId) {
    throw PlacementErrors.invoiceNotFound();
  }
}

/**
 * Only UNPAID invoices can be paid through the gateway.
 */
export function assertInvoicePayable(invoice: Invoice): void {
  if (invoice.status === 'PAID') {
    throw PlacementErrors.invoiceAlreadyPaid({ invoiceId: invoice.id });
  }
  if (invoice.status === 'VOID') {
    throw PlacementErrors.invoiceVoid({ invoiceId: invoice.id });
  }
}

/**
 * Vacancy gate: a team with any UNPAID invoice cannot create a vacancy.
 */
export function assertNoUnpaidInvoices(unpaidInvoiceIds: string[]): void {
  if (unpaidInvoiceIds.length > 0) {
    throw PlacementErrors.unpaidInvoiceExists({ unpaidInvoiceIds });
  }
}
