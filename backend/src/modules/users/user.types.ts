/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One user = one marketplace identity (candidate, team or admin).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = string;

export type UserRole = 'CANDIDATE' | 'TEAM' | 'ADMIN';

export type User = {
  id: UserId;
  email: string;
  name: string;
  role: UserRole;

  /** Teams only publish vacancies once an admin approved them. */
  isApproved: boolean;

  createdAt: Date;
  updatedAt: Date;
};
