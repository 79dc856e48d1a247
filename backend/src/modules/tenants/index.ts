/**
 * backend/src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Prevent cross-module coupling via deep imports into /queries or /policies.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { TenantDirectory } from './tenant-directory';
export { TenantErrors } from './tenant.errors';
export { slugifyCompanyName, isValidTenantSlug } from './policies/tenant-slug.policy';
export type { Tenant, TenantSummary } from './tenant.types';
