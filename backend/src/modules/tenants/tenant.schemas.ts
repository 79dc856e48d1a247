/**
 * backend/src/modules/tenants/tenant.schemas.ts
 *
 * WHY:
 * - Request validation for company listing + platform admin endpoints.
 */

import { z } from 'zod';

export const companyIdParamsSchema = z.object({
  id: z.string().uuid('Invalid company id'),
});

export const renameCompanySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
});

export const listCompaniesQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional(),
});

export type RenameCompanyInput = z.infer<typeof renameCompanySchema>;
