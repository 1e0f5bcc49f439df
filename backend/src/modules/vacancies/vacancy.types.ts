/**
 * backend/src/modules/vacancies/vacancy.types.ts
 *
 * WHY:
 * - Domain types for vacancies published by teams.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Salaries are whole currency units per year, as entered by the team.
 */

export type VacancyStatus = 'DRAFT' | 'ACTIVE' | 'CLOSED';

export type Vacancy = {
  id: string;
  teamId: string;
  title: string;
  description: string;
  location: string | null;
  positionType: string | null;
  experienceLevel: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  expiryDate: Date | null;
  status: VacancyStatus;
  createdAt: Date;
  updatedAt: Date;
};

export type VacancyEligibility = {
  canCreateVacancy: boolean;
  teamApproved: boolean;
  hasUnpaidInvoices: boolean;
};
