/**
 * backend/src/modules/vacancies/dal/vacancy.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for vacancies.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { VacancyStatus } from '../vacancy.types';

export type InsertVacancyParams = {
  teamId: string;
  title: string;
  description: string;
  location: string | null;
  positionType: string | null;
  experienceLevel: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  expiryDate: Date | null;
  status: Exclude<VacancyStatus, 'CLOSED'>;
};

export class VacancyRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): VacancyRepo {
    return new VacancyRepo(db);
  }

  async insertVacancy(params: InsertVacancyParams): Promise<{ id: string }> {
    return this.db
      .insertInto('vacancies')
      .values({
        team_id: params.teamId,
        title: params.title,
        description: params.description,
        location: params.location,
        position_type: params.positionType,
        experience_level: params.experienceLevel,
        salary_min: params.salaryMin,
        salary_max: params.salaryMax,
        expiry_date: params.expiryDate,
        status: params.status,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  /**
   * DRAFT/ACTIVE → CLOSED. Returns true if this call closed the vacancy.
   */
  async closeVacancy(params: { vacancyId: string; now: Date }): Promise<boolean> {
    const row = await this.db
      .updateTable('vacancies')
      .set({ status: 'CLOSED', updated_at: params.now })
      .where('id', '=', params.vacancyId)
      .where('status', '!=', 'CLOSED')
      .returning(['id'])
      .executeTakeFirst();

    return row !== undefined;
  }
}
