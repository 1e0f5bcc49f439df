/**
 * backend/src/modules/payments/dal/payment.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for payment_intents / payment_events.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PaymentIntentsTable } from '../../../shared/db/schema';

export type PaymentIntentRow = Selectable<PaymentIntentsTable>;

export async function selectPaymentIntentByIdSql(
  db: DbExecutor,
  intentId: string,
): Promise<PaymentIntentRow | undefined> {
  return db
    .selectFrom('payment_intents')
    .selectAll()
    .where('id', '=', intentId)
    .executeTakeFirst();
}

export async function selectPaymentEventExistsSql(
  db: DbExecutor,
  eventId: string,
): Promise<boolean> {
  const row = await db
    .selectFrom('payment_events')
    .select(['event_id'])
    .where('event_id', '=', eventId)
    .executeTakeFirst();

  return row !== undefined;
}
