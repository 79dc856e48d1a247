/**
 * backend/src/modules/products/dal/product.query-sql.ts
 *
 * DAL READS ONLY (tenant database).
 * - No AppError
 * - No policies
 * - Takes the TenantDb explicitly: callers pass ctx.data.tenant(), never a name or path.
 */

import { sql, type Selectable, type SelectQueryBuilder } from 'kysely';

import type {
  ProductImagesTable,
  ProductsTable,
  TenantDatabase,
} from '../../../shared/db/tenant-db.types';
import type { TenantDb } from '../../../shared/tenancy/tenant-connection';
import type { ProductListFilters } from '../product.types';

export type ProductRow = Selectable<ProductsTable>;
export type ProductImageRow = Selectable<ProductImagesTable>;

function withFilters<O>(
  query: SelectQueryBuilder<TenantDatabase, 'products', O>,
  filters: ProductListFilters,
): SelectQueryBuilder<TenantDatabase, 'products', O> {
  let q = query;
  if (filters.status) q = q.where('status', '=', filters.status);
  if (filters.featured !== undefined) q = q.where('is_featured', '=', filters.featured ? 1 : 0);
  if (filters.search) {
    // case-insensitive substring; instr() needs no LIKE escaping
    q = q.where(sql<boolean>`instr(lower(name), lower(${filters.search})) > 0`);
  }
  return q;
}

export async function selectProductByIdSql(
  db: TenantDb,
  productId: string,
): Promise<ProductRow | undefined> {
  return db.selectFrom('products').selectAll().where('id', '=', productId).executeTakeFirst();
}

export async function selectProductIdBySkuSql(
  db: TenantDb,
  sku: string,
): Promise<string | undefined> {
  const row = await db
    .selectFrom('products')
    .select('id')
    .where('sku', '=', sku)
    .executeTakeFirst();
  return row?.id;
}

export async function selectProductsPageSql(
  db: TenantDb,
  filters: ProductListFilters,
  page: { limit: number; offset: number },
): Promise<ProductRow[]> {
  return withFilters(db.selectFrom('products').selectAll(), filters)
    .orderBy('created_at', 'desc')
    .orderBy('id')
    .limit(page.limit)
    .offset(page.offset)
    .execute();
}

export async function countProductsSql(
  db: TenantDb,
  filters: ProductListFilters,
): Promise<number> {
  const row = await withFilters(
    db.selectFrom('products').select((eb) => eb.fn.countAll<number>().as('count')),
    filters,
  ).executeTakeFirst();

  return Number(row?.count ?? 0);
}

/** `base` itself plus every "base-N" already in use. */
export async function selectSlugsWithBaseSql(db: TenantDb, base: string): Promise<string[]> {
  const rows = await db
    .selectFrom('products')
    .select('slug')
    .where((eb) => eb.or([eb('slug', '=', base), eb('slug', 'like', `${base}-%`)]))
    .execute();

  return rows.map((r) => r.slug);
}

export async function selectImagesByProductSql(
  db: TenantDb,
  productId: string,
): Promise<ProductImageRow[]> {
  return db
    .selectFrom('product_images')
    .selectAll()
    .where('product_id', '=', productId)
    .orderBy('sort_order')
    .orderBy('created_at', 'desc')
    .execute();
}

/** Images of several products, best primary candidate first within each product. */
export async function selectImagesForProductsSql(
  db: TenantDb,
  productIds: readonly string[],
): Promise<ProductImageRow[]> {
  if (productIds.length === 0) return [];

  return db
    .selectFrom('product_images')
    .selectAll()
    .where('product_id', 'in', productIds)
    .orderBy('product_id')
    .orderBy('is_primary', 'desc')
    .orderBy('sort_order')
    .orderBy('created_at', 'desc')
    .execute();
}

export async function selectImageByIdSql(
  db: TenantDb,
  imageId: string,
): Promise<ProductImageRow | undefined> {
  return db.selectFrom('product_images').selectAll().where('id', '=', imageId).executeTakeFirst();
}

export async function countImagesSql(db: TenantDb, productId: string): Promise<number> {
  const row = await db
    .selectFrom('product_images')
    .select((eb) => eb.fn.countAll<number>().as('count'))
    .where('product_id', '=', productId)
    .executeTakeFirst();

  return Number(row?.count ?? 0);
}
