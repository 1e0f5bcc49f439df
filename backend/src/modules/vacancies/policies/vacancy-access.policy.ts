/**
 * backend/src/modules/vacancies/policies/vacancy-access.policy.ts
 *
 * WHY:
 * - Who may see / change a vacancy.
 * - Pure logic (no DB / no I/O).
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level VacancyErrors.
 */

import type { Vacancy } from '../vacancy.types';
import { VacancyErrors } from '../vacancy.errors';

export function assertVacancyOwnedBy(
  vacancy: Vacancy | undefined,
  teamId: string,
): asserts vacancy is Vacancy {
  if (!vacancy || vacancy.teamId !== teamId) {
    throw VacancyErrors.vacancyNotFound();
  }
}

/**
 * Drafts are private to their team; everything else is visible to any session.
 */
export function assertVacancyVisibleTo(
  vacancy: Vacancy | undefined,
  viewerId: string,
): asserts vacancy is Vacancy {
  if (!vacancy) {
    throw VacancyErrors.vacancyNotFound();
  }
  if (vacancy.status === 'DRAFT' && vacancy.teamId !== viewerId) {
    throw VacancyErrors.vacancyNotFound({ vacancyId: vacancy.id });
  }
}

export function assertVacancyOpen(vacancy: Vacancy): void {
  if (vacancy.status === 'CLOSED') {
    throw VacancyErrors.vacancyAlreadyClosed({ vacancyId: vacancy.id });
  }
}
