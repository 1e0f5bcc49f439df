/**
 * backend/src/modules/placements/placement.schemas.ts
 *
 * WHY:
 * - Request validation for placement and invoice endpoints.
 */

import { z } from 'zod';

export const recordPlacementSchema = z.object({
  candidateId: z.string().uuid(),
  vacancyId: z.string().uuid(),
});

export const invoiceParamsSchema = z.object({
  invoiceId: z.string().uuid(),
});

export type RecordPlacementInput = z.infer<typeof recordPlacementSchema>;
