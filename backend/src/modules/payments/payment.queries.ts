/**
 * backend/src/modules/payments/payment.queries.ts
 *
 * WHY:
 * - Shapes payment_intents rows into domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../shared/db/db';
import { selectPaymentEventExistsSql, selectPaymentIntentByIdSql } from './dal/payment.query-sql';
import type { PaymentIntentRow } from './dal/payment.query-sql';
import type { PaymentIntentRecord } from './payment.types';

function toPaymentIntent(row: PaymentIntentRow): PaymentIntentRecord {
  return {
    id: row.id,
    userId: row.user_id,
    purpose: row.purpose,
    referenceId: row.reference_id,
    amountCents: row.amount_cents,
    currency: row.currency,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export async function getPaymentIntentById(
  db: DbExecutor,
  intentId: string,
): Promise<PaymentIntentRecord | undefined> {
  const row = await selectPaymentIntentByIdSql(db, intentId);
  if (!row) return undefined;
  return toPaymentIntent(row);
}

export async function hasProcessedPaymentEvent(db: DbExecutor, eventId: string): Promise<boolean> {
  return selectPaymentEventExistsSql(db, eventId);
}
