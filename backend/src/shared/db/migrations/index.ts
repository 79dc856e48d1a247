/**
 * backend/src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Migrations are registered statically (no directory scanning).
 *   The same list works under tsx, vitest and a compiled build.
 *
 * RULES:
 * - Names sort lexically; never rename a migration once it has shipped.
 * - Tenant migrations run against every newly provisioned tenant database.
 *   Existing tenants are not migrated in bulk.
 */

import type { Migration } from 'kysely';

import * as companiesUsers from './shared/0001_companies_users';
import * as tokenTables from './shared/0002_token_tables';
import * as products from './tenant/0001_products';
import * as productImages from './tenant/0002_product_images';

export const sharedMigrations: Record<string, Migration> = {
  '0001_companies_users': companiesUsers,
  '0002_token_tables': tokenTables,
};

export const tenantMigrations: Record<string, Migration> = {
  '0001_products': products,
  '0002_product_images': productImages,
};
