/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRole } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint).
   */
  async insertUser(params: {
    email: string;
    name: string;
    role: UserRole;
    isApproved?: boolean;
  }): Promise<{ id: string; email: string }> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: params.email.toLowerCase(),
        name: params.name,
        role: params.role,
        is_approved: params.isApproved ?? false,
      })
      .returning(['id', 'email'])
      .executeTakeFirstOrThrow();

    return { id: row.id, email: row.email };
  }

  /**
   * Idempotency guard: only flips unapproved TEAM rows.
   * Returns true if this call approved the team.
   */
  async markApproved(userId: string): Promise<boolean> {
    const row = await this.db
      .updateTable('users')
      .set({ is_approved: true, updated_at: new Date() })
      .where('id', '=', userId)
      .where('role', '=', 'TEAM')
      .where('is_approved', '=', false)
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }

  /**
   * Takes the row lock on the user for the rest of the transaction.
   * Used to serialise per-user state transitions (membership activation).
   * Returns false if the user does not exist.
   */
  async lockUserRow(userId: string): Promise<boolean> {
    const row = await this.db
      .updateTable('users')
      .set({ updated_at: new Date() })
      .where('id', '=', userId)
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
