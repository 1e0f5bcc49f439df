/**
 * backend/src/modules/users/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../shared/db/db';
import {
  selectTeamsAwaitingApprovalSql,
  selectUserByEmailSql,
  selectUserByIdSql,
} from './dal/user.query-sql';
import type { UserRow } from './dal/user.query-sql';
import type { User } from './user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    role: row.role,
    isApproved: row.is_approved,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function listTeamsAwaitingApproval(db: DbExecutor): Promise<User[]> {
  const rows = await selectTeamsAwaitingApprovalSql(db);
  return rows.map(toUser);
}
