/**
 * backend/src/modules/placements/placement.types.ts
 *
 * WHY:
 * - Domain types for placements and their fixed-fee invoices.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Invoice state machine: UNPAID → PAID (terminal), UNPAID → VOID (admin only).
 */

import type { PaymentIntentView } from '../payments';

export type PlacementStatus = 'PENDING' | 'CONFIRMED' | 'CANCELLED';

export type InvoiceStatus = 'UNPAID' | 'PAID' | 'VOID';

/** Who settled the invoice: the gateway webhook or an admin override. */
export type InvoicePaymentSource = 'GATEWAY' | 'ADMIN';

export type Placement = {
  id: string;
  candidateId: string;
  teamId: string;
  vacancyId: string;
  status: PlacementStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type Invoice = {
  id: string;
  placementId: string;
  teamId: string;
  amountCents: number;
  currency: string;
  status: InvoiceStatus;
  dueDate: Date;
  paidAt: Date | null;
  paidSource: InvoicePaymentSource | null;
  voidedAt: Date | null;
  paymentIntentId: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type PlacementWithInvoice = {
  placement: Placement;
  invoice: Invoice;
};

export type InvoicePaymentIntent = PaymentIntentView & {
  invoiceId: string;
};

/**
 * Result of applying a payment to an invoice inside a transaction.
 * VOID and NOT_FOUND leave state untouched; the caller decides whether that is an error.
 */
export type InvoicePaymentOutcome =
  | { outcome: 'PAID'; invoice: Invoice }
  | { outcome: 'ALREADY_PAID'; invoice: Invoice }
  | { outcome: 'VOID'; invoice: Invoice }
  | { outcome: 'NOT_FOUND' };
