/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { getUserByEmail, getUserById, listTeamsAwaitingApproval } from './user.queries';
export {
  assertIsCandidate,
  assertIsTeam,
  assertTeamApproved,
  assertUserExists,
} from './policies/user-role.policy';
export { UserRepo } from './dal/user.repo';
export type { User, UserId, UserRole } from './user.types';
