/**
 * backend/src/modules/tenants/tenant.errors.ts
 *
 * WHY:
 * - Tenants module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put the database descriptor (file path) into a client-facing message.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  tenantNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Company not found.', meta);
  },

  invalidSlug(meta?: AppErrorMeta) {
    return AppError.validationError(
      'Company slug must be lowercase letters, digits and single dashes.',
      meta,
    );
  },

  slugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A company with a similar name already exists.', meta);
  },

  provisioningFailed(meta?: AppErrorMeta) {
    return AppError.internal('Company database could not be provisioned.', meta);
  },
} as const;
