/**
 * backend/src/modules/payments/payment.types.ts
 *
 * WHY:
 * - Domain types for payment intents and webhook processing.
 * - Payment intent rows are an audit trail; memberships and invoices own their state.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Amounts are integer cents.
 */

export type PaymentPurpose = 'MEMBERSHIP' | 'PLACEMENT_INVOICE';

export type PaymentIntentStatus = 'CREATED' | 'SUCCEEDED' | 'FAILED';

export type PaymentIntentRecord = {
  id: string;
  userId: string;
  purpose: PaymentPurpose;
  /** Membership id or invoice id, depending on purpose. */
  referenceId: string;
  amountCents: number;
  currency: string;
  status: PaymentIntentStatus;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * What the client needs to complete payment with the gateway's SDK.
 */
export type PaymentIntentView = {
  id: string;
  clientSecret: string | null;
  amountCents: number;
  currency: string;
};

export type WebhookOutcome = 'INVALID_SIGNATURE' | 'IGNORED' | 'DUPLICATE' | 'PROCESSED';

export type WebhookResult = {
  outcome: WebhookOutcome;
  eventId: string | null;
  eventType: string | null;
};
