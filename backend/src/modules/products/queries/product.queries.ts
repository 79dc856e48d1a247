/**
 * backend/src/modules/products/queries/product.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape tenant DB rows into Product domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { TenantDb } from '../../../shared/tenancy/tenant-connection';
import {
  countProductsSql,
  selectImageByIdSql,
  selectImagesByProductSql,
  selectImagesForProductsSql,
  selectProductByIdSql,
  selectProductsPageSql,
  type ProductImageRow,
  type ProductRow,
} from '../dal/product.query-sql';
import type {
  Page,
  Product,
  ProductDetail,
  ProductImage,
  ProductListFilters,
  ProductListItem,
} from '../product.types';

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    price: row.price,
    costPrice: row.cost_price,
    sku: row.sku,
    quantity: row.quantity,
    status: row.status,
    isFeatured: row.is_featured === 1,
    metaTitle: row.meta_title,
    metaDescription: row.meta_description,
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toProductImage(row: ProductImageRow): ProductImage {
  return {
    id: row.id,
    productId: row.product_id,
    image: row.image,
    altText: row.alt_text,
    isPrimary: row.is_primary === 1,
    sortOrder: row.sort_order,
    createdAt: new Date(row.created_at),
  };
}

export async function getProduct(db: TenantDb, productId: string): Promise<Product | undefined> {
  const row = await selectProductByIdSql(db, productId);
  return row ? toProduct(row) : undefined;
}

export async function getProductDetail(
  db: TenantDb,
  productId: string,
): Promise<ProductDetail | undefined> {
  const product = await getProduct(db, productId);
  if (!product) return undefined;

  const images = await listProductImages(db, productId);
  return { ...product, images };
}

export async function listProductImages(db: TenantDb, productId: string): Promise<ProductImage[]> {
  const rows = await selectImagesByProductSql(db, productId);
  return rows.map(toProductImage);
}

export async function getProductImage(
  db: TenantDb,
  imageId: string,
): Promise<ProductImage | undefined> {
  const row = await selectImageByIdSql(db, imageId);
  return row ? toProductImage(row) : undefined;
}

/**
 * Newest first. primaryImage = the flagged primary image, else the first by sort order
 * (a product whose primary image was deleted still shows a picture).
 */
export async function listProducts(
  db: TenantDb,
  filters: ProductListFilters,
  paging: { page: number; pageSize: number },
): Promise<Page<ProductListItem>> {
  const [rows, total] = await Promise.all([
    selectProductsPageSql(db, filters, {
      limit: paging.pageSize,
      offset: (paging.page - 1) * paging.pageSize,
    }),
    countProductsSql(db, filters),
  ]);

  const images = await selectImagesForProductsSql(
    db,
    rows.map((r) => r.id),
  );

  const primaryByProduct = new Map<string, string>();
  for (const image of images) {
    // rows arrive best-candidate first per product
    if (!primaryByProduct.has(image.product_id)) {
      primaryByProduct.set(image.product_id, image.image);
    }
  }

  return {
    items: rows.map((row) => ({
      id: row.id,
      name: row.name,
      slug: row.slug,
      price: row.price,
      quantity: row.quantity,
      status: row.status,
      isFeatured: row.is_featured === 1,
      primaryImage: primaryByProduct.get(row.id) ?? null,
      createdAt: new Date(row.created_at),
    })),
    page: paging.page,
    pageSize: paging.pageSize,
    total,
  };
}
