/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - withContext() returns a NEW immutable writer (no mutation).
 * - withDb() rebinds the underlying repo to a transaction so audit rows commit
 *   or roll back together with the state change they describe.
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No business rules.
 * - No AppError.
 */

import type { DbExecutor } from '../db/db';
import type { AuditRepo } from './audit.repo';
import type { AuditAction, AuditContext, AuditMetadata } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  userId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly repo: AuditRepo;
  private readonly context: Readonly<AuditContext>;

  constructor(repo: AuditRepo, context?: Partial<AuditContext>) {
    this.repo = repo;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  /**
   * Returns a NEW writer with merged context.
   *
   * Usage:
   *   const audit = new AuditWriter(repo, { requestId, ip, userAgent });
   *   const withUser = audit.withContext({ userId: user.id });
   */
  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.repo, { ...this.context, ...extra });
  }

  withDb(db: DbExecutor): AuditWriter {
    return new AuditWriter(this.repo.withDb(db), this.context);
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.repo.append({
      ...this.context,
      action,
      metadata,
    });
  }

  /**
   * Same context on every row; used by batch operations.
   */
  async appendMany(
    entries: ReadonlyArray<{ action: AuditAction; metadata?: AuditMetadata }>,
  ): Promise<void> {
    await this.repo.appendMany(entries.map((entry) => ({ ...this.context, ...entry })));
  }
}
