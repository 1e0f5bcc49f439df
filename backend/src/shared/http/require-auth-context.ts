/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session/role" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserRole } from '../../modules/users/user.types';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
  role: UserRole;
}>;

export type RequireSessionOptions = Readonly<{
  role?: UserRole;
}>;

/**
 * Controller guard: requires a session, and optionally enforces role.
 *
 * Guard sequence:
 * 1) no session -> 401 "Authentication required"
 * 2) wrong role -> 403 "Insufficient role."
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  if (!ctx.sessionId || !ctx.userId || !ctx.role) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.role && ctx.role !== opts.role) {
    throw AppError.forbidden('Insufficient role.');
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    role: ctx.role,
  };
}
