/**
 * backend/src/modules/products/product.types.ts
 *
 * WHY:
 * - Domain types for the per-tenant catalog.
 * - Products live in the tenant database; created_by/updated_by point at shared-db user ids
 *   (no cross-database foreign key).
 *
 * RULES:
 * - Keep aligned with DB schema (shared/db/tenant-db.types.ts).
 * - Prices are decimal strings with exactly two places ("19.90").
 */

import type { ProductStatus } from '../../shared/db/tenant-db.types';

export type { ProductStatus };

export const PRODUCT_STATUSES = ['draft', 'active', 'inactive', 'archived'] as const;

export type ProductImage = {
  id: string;
  productId: string;
  /** Storage path or URL. Binary storage is outside this service. */
  image: string;
  altText: string;
  isPrimary: boolean;
  sortOrder: number;
  createdAt: Date;
};

export type Product = {
  id: string;
  name: string;
  slug: string;
  description: string;
  price: string;
  costPrice: string | null;
  sku: string | null;
  quantity: number;
  status: ProductStatus;
  isFeatured: boolean;
  metaTitle: string;
  metaDescription: string;
  createdBy: string | null;
  updatedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ProductDetail = Product & { images: ProductImage[] };

/** Lightweight row for listings. */
export type ProductListItem = {
  id: string;
  name: string;
  slug: string;
  price: string;
  quantity: number;
  status: ProductStatus;
  isFeatured: boolean;
  primaryImage: string | null;
  createdAt: Date;
};

export type ProductListFilters = {
  status?: ProductStatus;
  featured?: boolean;
  search?: string;
};

export type Page<T> = {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
};
