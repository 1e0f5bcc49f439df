/**
 * backend/src/modules/users/policies/user-role.policy.ts
 *
 * WHY:
 * - Role/approval rules reused by placements, vacancies and admin.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level UserErrors.
 */

import type { User } from '../user.types';
import { UserErrors } from '../user.errors';

export function assertUserExists(user: User | undefined): asserts user is User {
  if (!user) {
    throw UserErrors.userNotFound();
  }
}

/**
 * Placements may only reference candidates.
 * Missing user and wrong role read the same to the caller.
 */
export function assertIsCandidate(user: User | undefined): asserts user is User {
  if (!user || user.role !== 'CANDIDATE') {
    throw UserErrors.notACandidate({ userId: user?.id ?? null });
  }
}

export function assertIsTeam(user: User | undefined): asserts user is User {
  if (!user || user.role !== 'TEAM') {
    throw UserErrors.notATeam({ userId: user?.id ?? null });
  }
}

export function assertTeamApproved(team: User): void {
  if (!team.isApproved) {
    throw UserErrors.teamNotApproved({ teamId: team.id });
  }
}
