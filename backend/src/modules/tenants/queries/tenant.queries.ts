/**
 * backend/src/modules/tenants/queries/tenant.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Tenant domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Tenant, TenantSummary } from '../tenant.types';
import {
  selectTenantByIdSql,
  selectTenantBySlugSql,
  selectTenantsSql,
  type TenantRow,
} from '../dal/tenant.query-sql';

function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    dbDescriptor: row.db_descriptor,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toTenantSummary(tenant: Tenant): TenantSummary {
  return {
    id: tenant.id,
    name: tenant.name,
    slug: tenant.slug,
    isActive: tenant.isActive,
    createdAt: tenant.createdAt.toISOString(),
  };
}

export async function getTenantById(db: DbExecutor, tenantId: string): Promise<Tenant | undefined> {
  const row = await selectTenantByIdSql(db, tenantId);
  return row ? toTenant(row) : undefined;
}

export async function getTenantBySlug(db: DbExecutor, slug: string): Promise<Tenant | undefined> {
  const row = await selectTenantBySlugSql(db, slug);
  return row ? toTenant(row) : undefined;
}

export async function listTenants(
  db: DbExecutor,
  opts: { activeOnly: boolean },
): Promise<Tenant[]> {
  const rows = await selectTenantsSql(db, opts);
  return rows.map(toTenant);
}
