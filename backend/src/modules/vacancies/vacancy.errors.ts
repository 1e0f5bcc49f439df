/**
 * backend/src/modules/vacancies/vacancy.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Another team's vacancy reads as NOT_FOUND.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const VacancyErrors = {
  vacancyNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Vacancy not found', meta);
  },

  vacancyAlreadyClosed(meta?: AppErrorMeta) {
    return AppError.conflict('Vacancy is already closed', meta);
  },
} as const;
