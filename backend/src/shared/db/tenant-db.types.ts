/**
 * backend/src/shared/db/tenant-db.types.ts
 *
 * Kysely table types for a tenant (company) database.
 * Every tenant database has exactly this schema (migrations/tenant).
 */

export type ProductStatus = 'draft' | 'active' | 'inactive' | 'archived';

export interface ProductsTable {
  id: string;
  name: string;
  slug: string;
  description: string;
  // decimal kept as text ("19.99") so no float rounding creeps in
  price: string;
  cost_price: string | null;
  sku: string | null;
  quantity: number;
  status: ProductStatus;
  is_featured: number;
  meta_title: string;
  meta_description: string;
  created_by: string | null;
  updated_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface ProductImagesTable {
  id: string;
  product_id: string;
  image: string;
  alt_text: string;
  is_primary: number;
  sort_order: number;
  created_at: string;
}

export interface TenantDatabase {
  products: ProductsTable;
  product_images: ProductImagesTable;
}
