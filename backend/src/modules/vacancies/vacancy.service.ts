/**
 * backend/src/modules/vacancies/vacancy.service.ts
 *
 * WHY:
 * - Marketplace vacancy operations for teams.
 * - Creation is gated: approved team AND no UNPAID placement invoice.
 *
 * RULES:
 * - The gate runs inside the creating transaction.
 * - No raw DB access outside queries/DAL.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';

import { assertIsTeam, assertTeamApproved, getUserById } from '../users';
import type { PlacementService } from '../placements';

import type { VacancyRepo } from './dal/vacancy.repo';
import { getVacancyById, listVacanciesForTeam } from './vacancy.queries';
import {
  assertVacancyOpen,
  assertVacancyOwnedBy,
  assertVacancyVisibleTo,
} from './policies/vacancy-access.policy';
import { VacancyErrors } from './vacancy.errors';
import { auditVacancyClosed, auditVacancyCreated } from './vacancy.audit';
import type { CreateVacancyInput } from './vacancy.schemas';
import type { Vacancy, VacancyEligibility } from './vacancy.types';

export class VacancyService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      auditRepo: AuditRepo;
      vacancyRepo: VacancyRepo;
      placementService: PlacementService;
    },
  ) {}

  async getEligibility(teamId: string): Promise<VacancyEligibility> {
    const team = await getUserById(this.deps.db, teamId);
    assertIsTeam(team);

    const noUnpaid = await this.deps.placementService.canCreateVacancy(teamId);

    return {
      canCreateVacancy: team.isApproved && noUnpaid,
      teamApproved: team.isApproved,
      hasUnpaidInvoices: !noUnpaid,
    };
  }

  async create(params: {
    teamId: string;
    input: CreateVacancyInput;
    meta: RequestMeta;
  }): Promise<Vacancy> {
    const flow = 'vacancies.create';
    const { input } = params;

    const vacancy = await this.deps.db.transaction().execute(async (trx) => {
      const team = await getUserById(trx, params.teamId);
      assertIsTeam(team);
      assertTeamApproved(team);

      await this.deps.placementService.assertCanCreateVacancy(params.teamId, trx);

      const { id } = await this.deps.vacancyRepo.withDb(trx).insertVacancy({
        teamId: params.teamId,
        title: input.title,
        description: input.description,
        location: input.location ?? null,
        positionType: input.positionType ?? null,
        experienceLevel: input.experienceLevel ?? null,
        salaryMin: input.salaryMin ?? null,
        salaryMax: input.salaryMax ?? null,
        expiryDate: input.expiryDate ? new Date(input.expiryDate) : null,
        status: input.status,
      });

      const created = await getVacancyById(trx, id);
      assertVacancyOwnedBy(created, params.teamId);

      await auditVacancyCreated(this.auditWriter(params.meta, params.teamId).withDb(trx), created);

      return created;
    });

    this.deps.logger.info('vacancies.create.success', {
      flow,
      requestId: params.meta.requestId,
      teamId: params.teamId,
      vacancyId: vacancy.id,
    });

    return vacancy;
  }

  async listMine(teamId: string): Promise<Vacancy[]> {
    return listVacanciesForTeam(this.deps.db, teamId);
  }

  async get(params: { vacancyId: string; viewerId: string }): Promise<Vacancy> {
    const vacancy = await getVacancyById(this.deps.db, params.vacancyId);
    assertVacancyVisibleTo(vacancy, params.viewerId);
    return vacancy;
  }

  async close(params: { teamId: string; vacancyId: string; meta: RequestMeta }): Promise<Vacancy> {
    return this.deps.db.transaction().execute(async (trx) => {
      const now = new Date();

      const vacancy = await getVacancyById(trx, params.vacancyId);
      assertVacancyOwnedBy(vacancy, params.teamId);
      assertVacancyOpen(vacancy);

      const closed = await this.deps.vacancyRepo
        .withDb(trx)
        .closeVacancy({ vacancyId: vacancy.id, now });
      if (!closed) {
        throw VacancyErrors.vacancyAlreadyClosed({ vacancyId: vacancy.id });
      }

      const updated = await getVacancyById(trx, vacancy.id);
      assertVacancyOwnedBy(updated, params.teamId);

      await auditVacancyClosed(this.auditWriter(params.meta, params.teamId).withDb(trx), updated);

      this.deps.logger.info('vacancies.close.success', {
        flow: 'vacancies.close',
        requestId: params.meta.requestId,
        vacancyId: updated.id,
      });

      return updated;
    });
  }

  private auditWriter(meta: RequestMeta, userId: string): AuditWriter {
    return new AuditWriter(this.deps.auditRepo, {
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
      userId,
    });
  }
}
