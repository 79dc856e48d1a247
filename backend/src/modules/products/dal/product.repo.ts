/**
 * backend/src/modules/products/dal/product.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for products + product_images (tenant database).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Bound to ONE tenant database per instance: the service builds it from
 *   ctx.data.tenant() on every call, never caches it across requests.
 */

import { randomUUID } from 'node:crypto';
import type { Updateable } from 'kysely';

import type { ProductStatus, ProductsTable } from '../../../shared/db/tenant-db.types';
import type { TenantDb } from '../../../shared/tenancy/tenant-connection';

export type NewProduct = {
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
  createdBy: string;
};

export type ProductPatch = Partial<Omit<NewProduct, 'createdBy'>> & { updatedBy: string };

export class ProductRepo {
  constructor(private readonly db: TenantDb) {}

  async insertProduct(params: NewProduct & { now: Date }): Promise<{ id: string }> {
    const id = randomUUID();
    const at = params.now.toISOString();

    await this.db
      .insertInto('products')
      .values({
        id,
        name: params.name,
        slug: params.slug,
        description: params.description,
        price: params.price,
        cost_price: params.costPrice,
        sku: params.sku,
        quantity: params.quantity,
        status: params.status,
        is_featured: params.isFeatured ? 1 : 0,
        meta_title: params.metaTitle,
        meta_description: params.metaDescription,
        created_by: params.createdBy,
        updated_by: params.createdBy,
        created_at: at,
        updated_at: at,
      })
      .execute();

    return { id };
  }

  /** Returns the number of rows updated (0 = no such product). */
  async updateProduct(productId: string, patch: ProductPatch, now: Date): Promise<number> {
    const set: Updateable<ProductsTable> = {
      updated_by: patch.updatedBy,
      updated_at: now.toISOString(),
    };

    if (patch.name !== undefined) set.name = patch.name;
    if (patch.slug !== undefined) set.slug = patch.slug;
    if (patch.description !== undefined) set.description = patch.description;
    if (patch.price !== undefined) set.price = patch.price;
    if (patch.costPrice !== undefined) set.cost_price = patch.costPrice;
    if (patch.sku !== undefined) set.sku = patch.sku;
    if (patch.quantity !== undefined) set.quantity = patch.quantity;
    if (patch.status !== undefined) set.status = patch.status;
    if (patch.isFeatured !== undefined) set.is_featured = patch.isFeatured ? 1 : 0;
    if (patch.metaTitle !== undefined) set.meta_title = patch.metaTitle;
    if (patch.metaDescription !== undefined) set.meta_description = patch.metaDescription;

    const result = await this.db
      .updateTable('products')
      .set(set)
      .where('id', '=', productId)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }

  /** Images go with it (ON DELETE CASCADE). */
  async deleteProduct(productId: string): Promise<number> {
    const result = await this.db
      .deleteFrom('products')
      .where('id', '=', productId)
      .executeTakeFirst();

    return Number(result.numDeletedRows);
  }

  async insertImage(params: {
    productId: string;
    image: string;
    altText: string;
    isPrimary: boolean;
    sortOrder: number;
    now: Date;
  }): Promise<{ id: string }> {
    const id = randomUUID();

    await this.db
      .insertInto('product_images')
      .values({
        id,
        product_id: params.productId,
        image: params.image,
        alt_text: params.altText,
        is_primary: params.isPrimary ? 1 : 0,
        sort_order: params.sortOrder,
        created_at: params.now.toISOString(),
      })
      .execute();

    return { id };
  }

  async updateImage(
    imageId: string,
    patch: { altText?: string; isPrimary?: boolean; sortOrder?: number },
  ): Promise<void> {
    const set: { alt_text?: string; is_primary?: number; sort_order?: number } = {};
    if (patch.altText !== undefined) set.alt_text = patch.altText;
    if (patch.isPrimary !== undefined) set.is_primary = patch.isPrimary ? 1 : 0;
    if (patch.sortOrder !== undefined) set.sort_order = patch.sortOrder;
    if (Object.keys(set).length === 0) return;

    await this.db.updateTable('product_images').set(set).where('id', '=', imageId).execute();
  }

  /** Clears the primary flag on every image of the product. */
  async clearPrimaryImage(productId: string): Promise<void> {
    await this.db
      .updateTable('product_images')
      .set({ is_primary: 0 })
      .where('product_id', '=', productId)
      .where('is_primary', '=', 1)
      .execute();
  }

  async deleteImage(imageId: string): Promise<number> {
    const result = await this.db
      .deleteFrom('product_images')
      .where('id', '=', imageId)
      .executeTakeFirst();

    return Number(result.numDeletedRows);
  }
}
