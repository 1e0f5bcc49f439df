/**
 * backend/src/modules/admin/admin.schemas.ts
 */

import { z } from 'zod';

export const teamParamsSchema = z.object({
  teamId: z.string().uuid(),
});

export const adminInvoiceParamsSchema = z.object({
  invoiceId: z.string().uuid(),
});

/**
 * `now` lets operators replay a missed sweep for a past instant.
 */
export const expireMembershipsSchema = z
  .object({
    now: z.string().datetime().optional(),
  })
  .default({});
