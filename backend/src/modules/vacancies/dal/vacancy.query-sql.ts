/**
 * backend/src/modules/vacancies/dal/vacancy.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for vacancies.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { VacanciesTable } from '../../../shared/db/schema';

export type VacancyRow = Selectable<VacanciesTable>;

export async function selectVacancyByIdSql(
  db: DbExecutor,
  vacancyId: string,
): Promise<VacancyRow | undefined> {
  return db.selectFrom('vacancies').selectAll().where('id', '=', vacancyId).executeTakeFirst();
}

export async function selectVacanciesByTeamSql(
  db: DbExecutor,
  teamId: string,
): Promise<VacancyRow[]> {
  return db
    .selectFrom('vacancies')
    .selectAll()
    .where('team_id', '=', teamId)
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .execute();
}
