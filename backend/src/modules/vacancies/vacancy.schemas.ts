/**
 * backend/src/modules/vacancies/vacancy.schemas.ts
 *
 * WHY:
 * - Request validation for vacancy endpoints.
 *
 * RULES:
 * - Salary range must be ordered when both ends are given.
 */

import { z } from 'zod';

export const createVacancySchema = z
  .object({
    title: z.string().trim().min(3).max(200),
    description: z.string().trim().min(10).max(10_000),
    location: z.string().trim().min(1).max(200).optional(),
    positionType: z.string().trim().min(1).max(50).optional(),
    experienceLevel: z.string().trim().min(1).max(50).optional(),
    salaryMin: z.number().int().nonnegative().optional(),
    salaryMax: z.number().int().nonnegative().optional(),
    expiryDate: z.string().datetime().optional(),
    status: z.enum(['DRAFT', 'ACTIVE']).default('ACTIVE'),
  })
  .refine(
    (v) => v.salaryMin === undefined || v.salaryMax === undefined || v.salaryMin <= v.salaryMax,
    { message: 'salaryMin must not exceed salaryMax', path: ['salaryMax'] },
  );

export const vacancyParamsSchema = z.object({
  vacancyId: z.string().uuid(),
});

export type CreateVacancyInput = z.infer<typeof createVacancySchema>;
