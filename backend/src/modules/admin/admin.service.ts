/**
 * backend/src/modules/admin/admin.service.ts
 *
 * WHY:
 * - Back-office operations that have no other owning module (team approval).
 * - Invoice and membership overrides stay in their own services; the admin
 *   controller calls them directly.
 *
 * RULES:
 * - Idempotent: approving an approved team returns it unchanged.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';

import { assertIsTeam, getUserById, listTeamsAwaitingApproval } from '../users';
import type { User, UserRepo } from '../users';

import { auditTeamApproved } from './admin.audit';

export class AdminService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      auditRepo: AuditRepo;
      userRepo: UserRepo;
    },
  ) {}

  async listTeamsAwaitingApproval(): Promise<User[]> {
    return listTeamsAwaitingApproval(this.deps.db);
  }

  async approveTeam(params: { teamId: string; actorId: string; meta: RequestMeta }): Promise<User> {
    return this.deps.db.transaction().execute(async (trx) => {
      const team = await getUserById(trx, params.teamId);
      assertIsTeam(team);

      if (team.isApproved) return team;

      const approved = await this.deps.userRepo.withDb(trx).markApproved(team.id);

      const updated = await getUserById(trx, team.id);
      assertIsTeam(updated);

      if (approved) {
        const audit = new AuditWriter(this.deps.auditRepo, {
          requestId: params.meta.requestId,
          ip: params.meta.ip,
          userAgent: params.meta.userAgent,
        }).withContext({ userId: params.actorId });

        await auditTeamApproved(audit.withDb(trx), updated);

        this.deps.logger.info('admin.team_approve.success', {
          flow: 'admin.team_approve',
          requestId: params.meta.requestId,
          teamId: team.id,
          actorId: params.actorId,
        });
      }

      return updated;
    });
  }
}
