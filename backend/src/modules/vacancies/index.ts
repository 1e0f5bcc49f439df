/**
 * backend/src/modules/vacancies/index.ts
 */

export { getVacancyById } from './vacancy.queries';
export type { VacancyService } from './vacancy.service';
export type { Vacancy, VacancyEligibility, VacancyStatus } from './vacancy.types';
