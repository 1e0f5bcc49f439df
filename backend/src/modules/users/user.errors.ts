/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics (role and approval checks).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  notACandidate(meta?: AppErrorMeta) {
    return AppError.validationError('User is not a candidate', meta);
  },

  notATeam(meta?: AppErrorMeta) {
    return AppError.notFound('Team not found', meta);
  },

  teamNotApproved(meta?: AppErrorMeta) {
    return AppError.forbidden('Your team account is awaiting approval.', meta);
  },
} as const;
