/**
 * backend/src/modules/tenants/tenant.types.ts
 *
 * Tenant = Company. Owns exactly one physical database (dbDescriptor).
 * Resolved ONLY from verified token claims, never from request input.
 */

export type TenantId = string;
export type TenantSlug = string;

export type Tenant = {
  id: TenantId;
  name: string;
  slug: TenantSlug;

  /** Absolute path of the tenant's SQLite database. Unique across all tenants. */
  dbDescriptor: string;

  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
};

/** What public/admin listings expose. The descriptor never leaves the server. */
export type TenantSummary = {
  id: TenantId;
  name: string;
  slug: TenantSlug;
  isActive: boolean;
  createdAt: string;
};
