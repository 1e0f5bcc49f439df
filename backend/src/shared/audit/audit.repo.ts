/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 * - Services call this when "someone did something billable": a payment intent,
 *   an activation, a placement fee, an admin override.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Metadata is accepted as plain object and serialized here.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.appendMany([event]);
  }

  /**
   * One multi-row INSERT (sweeps such as membership expiry write one row per item).
   */
  async appendMany(events: readonly AuditEventInsert[]): Promise<void> {
    if (events.length === 0) return;

    await this.db
      .insertInto('audit_events')
      .values(
        events.map((event) => ({
          action: event.action,
          user_id: event.userId,
          request_id: event.requestId,
          ip: event.ip,
          user_agent: event.userAgent,
          // stringify drops undefined/functions; jsonb column parses it back
          metadata: JSON.stringify(event.metadata ?? {}),
        })),
      )
      .execute();
  }
}
