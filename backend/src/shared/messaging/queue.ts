/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "a candidate/team must be told something" from "here is how it is sent".
 * - Billing services enqueue notifications; the transport (SQS, e-mail provider, etc.)
 *   is wired at the DI layer only. Services never change when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable (dates as ISO strings).
 * - Never put client secrets or gateway payloads in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type MembershipActivatedMessage = {
  type: 'memberships.activated';
  candidateId: string;
  membershipId: string;
  planType: string;
  renewalDate: string;
};

export type MembershipExpiredMessage = {
  type: 'memberships.expired';
  candidateId: string;
  membershipId: string;
};

export type InvoiceIssuedMessage = {
  type: 'placements.invoice-issued';
  teamId: string;
  invoiceId: string;
  amountCents: number;
  currency: string;
  dueDate: string;
};

export type InvoicePaidMessage = {
  type: 'placements.invoice-paid';
  teamId: string;
  invoiceId: string;
};

export type QueueMessage =
  | MembershipActivatedMessage
  | MembershipExpiredMessage
  | InvoiceIssuedMessage
  | InvoicePaidMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
