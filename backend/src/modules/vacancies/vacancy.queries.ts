/**
 * backend/src/modules/vacancies/vacancy.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../shared/db/db';
import { selectVacanciesByTeamSql, selectVacancyByIdSql } from './dal/vacancy.query-sql';
import type { VacancyRow } from './dal/vacancy.query-sql';
import type { Vacancy } from './vacancy.types';

function toVacancy(row: VacancyRow): Vacancy {
  return {
    id: row.id,
    teamId: row.team_id,
    title: row.title,
    description: row.description,
    location: row.location,
    positionType: row.position_type,
    experienceLevel: row.experience_level,
    salaryMin: row.salary_min,
    salaryMax: row.salary_max,
    expiryDate: row.expiry_date === null ? null : new Date(row.expiry_date),
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export async function getVacancyById(
  db: DbExecutor,
  vacancyId: string,
): Promise<Vacancy | undefined> {
  const row = await selectVacancyByIdSql(db, vacancyId);
  if (!row) return undefined;
  return toVacancy(row);
}

export async function listVacanciesForTeam(db: DbExecutor, teamId: string): Promise<Vacancy[]> {
  const rows = await selectVacanciesByTeamSql(db, teamId);
  return rows.map(toVacancy);
}
