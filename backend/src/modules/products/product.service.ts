/**
 * backend/src/modules/products/product.service.ts
 *
 * WHY:
 * - Catalog use-cases for the CURRENT tenant.
 * - Every call takes the RoutingContext and reaches storage only via ctx.data.tenant().
 *   There is no way to name another tenant here, so a product id from another company
 *   is just a 404.
 *
 * RULES:
 * - Writes that touch more than one row run in one write transaction.
 * - Slugs are assigned once at creation and stay stable on rename (links keep working).
 * - Image rules:
 *   - the first image a product gets becomes primary
 *   - marking an image primary clears the flag on its siblings
 */

import { isUniqueViolation } from '../../shared/db/db-errors';
import type { Logger } from '../../shared/logger/logger';
import type { RoutingContext } from '../../shared/tenancy/routing-context';
import {
  withTenantWriteTransaction,
  type TenantDb,
} from '../../shared/tenancy/tenant-connection';

import {
  countImagesSql,
  selectProductIdBySkuSql,
  selectSlugsWithBaseSql,
} from './dal/product.query-sql';
import { ProductRepo } from './dal/product.repo';
import { pickUniqueSlug, slugifyProductName } from './policies/product-slug.policy';
import { ProductErrors } from './product.errors';
import type {
  AddImagesInput,
  CreateProductInput,
  ListProductsQuery,
  UpdateImageInput,
  UpdateProductInput,
} from './product.schemas';
import type { Page, ProductDetail, ProductImage, ProductListItem } from './product.types';
import {
  getProduct,
  getProductDetail,
  getProductImage,
  listProductImages,
  listProducts,
} from './queries/product.queries';

const MAX_SLUG_ATTEMPTS = 3;

type NewImage = { image: string; altText: string };

export class ProductService {
  private readonly now: () => Date;

  constructor(private readonly deps: { logger: Logger; now?: () => Date }) {
    this.now = deps.now ?? (() => new Date());
  }

  list(ctx: RoutingContext, query: ListProductsQuery): Promise<Page<ProductListItem>> {
    return listProducts(
      ctx.data.tenant(),
      { status: query.status, featured: query.featured, search: query.search },
      { page: query.page, pageSize: query.pageSize },
    );
  }

  async get(ctx: RoutingContext, productId: string): Promise<ProductDetail> {
    const product = await getProductDetail(ctx.data.tenant(), productId);
    if (!product) throw ProductErrors.productNotFound({ productId });
    return product;
  }

  async create(ctx: RoutingContext, input: CreateProductInput): Promise<ProductDetail> {
    const db = ctx.data.tenant();
    await this.assertSkuFree(db, input.sku);

    const productId = await this.insertWithFreeSlug(ctx, db, input);

    this.deps.logger.info('products.created', {
      flow: 'products.create',
      requestId: ctx.requestId,
      productId,
      images: input.images.length,
    });

    return this.get(ctx, productId);
  }

  async update(
    ctx: RoutingContext,
    productId: string,
    patch: UpdateProductInput,
  ): Promise<ProductDetail> {
    const db = ctx.data.tenant();

    if (patch.sku) {
      const owner = await selectProductIdBySkuSql(db, patch.sku);
      if (owner !== undefined && owner !== productId) {
        throw ProductErrors.skuTaken({ sku: patch.sku });
      }
    }

    let updated: number;
    try {
      updated = await new ProductRepo(db).updateProduct(
        productId,
        { ...patch, updatedBy: ctx.identity.userId },
        this.now(),
      );
    } catch (err) {
      if (patch.sku && isUniqueViolation(err)) throw ProductErrors.skuTaken({ sku: patch.sku });
      throw err;
    }

    if (updated === 0) throw ProductErrors.productNotFound({ productId });

    this.deps.logger.info('products.updated', {
      flow: 'products.update',
      requestId: ctx.requestId,
      productId,
      fields: Object.keys(patch),
    });

    return this.get(ctx, productId);
  }

  async remove(ctx: RoutingContext, productId: string): Promise<void> {
    const deleted = await new ProductRepo(ctx.data.tenant()).deleteProduct(productId);
    if (deleted === 0) throw ProductErrors.productNotFound({ productId });

    this.deps.logger.info('products.deleted', {
      flow: 'products.delete',
      requestId: ctx.requestId,
      productId,
    });
  }

  async listImages(ctx: RoutingContext, productId: string): Promise<ProductImage[]> {
    const db = ctx.data.tenant();
    if (!(await getProduct(db, productId))) throw ProductErrors.productNotFound({ productId });
    return listProductImages(db, productId);
  }

  async getImage(ctx: RoutingContext, imageId: string): Promise<ProductImage> {
    const image = await getProductImage(ctx.data.tenant(), imageId);
    if (!image) throw ProductErrors.imageNotFound({ imageId });
    return image;
  }

  async addImages(
    ctx: RoutingContext,
    productId: string,
    input: AddImagesInput,
  ): Promise<ProductImage[]> {
    const db = ctx.data.tenant();
    const now = this.now();

    const createdIds = await withTenantWriteTransaction(db, async (trx) => {
      if (!(await getProduct(trx, productId))) throw ProductErrors.productNotFound({ productId });

      const repo = new ProductRepo(trx);
      if (input.setPrimary !== undefined) await repo.clearPrimaryImage(productId);

      return this.insertImages(repo, productId, input.images, {
        existing: await countImagesSql(trx, productId),
        setPrimary: input.setPrimary,
        now,
      });
    });

    this.deps.logger.info('products.images_added', {
      flow: 'products.images',
      requestId: ctx.requestId,
      productId,
      count: createdIds.length,
    });

    const images = await listProductImages(db, productId);
    return images.filter((image) => createdIds.includes(image.id));
  }

  async updateImage(
    ctx: RoutingContext,
    imageId: string,
    patch: UpdateImageInput,
  ): Promise<ProductImage> {
    const db = ctx.data.tenant();

    await withTenantWriteTransaction(db, async (trx) => {
      const image = await getProductImage(trx, imageId);
      if (!image) throw ProductErrors.imageNotFound({ imageId });

      const repo = new ProductRepo(trx);
      if (patch.isPrimary === true) await repo.clearPrimaryImage(image.productId);
      await repo.updateImage(imageId, patch);
    });

    const image = await getProductImage(db, imageId);
    if (!image) throw ProductErrors.imageNotFound({ imageId });
    return image;
  }

  async deleteImage(ctx: RoutingContext, imageId: string): Promise<void> {
    const deleted = await new ProductRepo(ctx.data.tenant()).deleteImage(imageId);
    if (deleted === 0) throw ProductErrors.imageNotFound({ imageId });

    this.deps.logger.info('products.image_deleted', {
      flow: 'products.images',
      requestId: ctx.requestId,
      imageId,
    });
  }

  /**
   * The slug is picked and inserted in one write transaction. A unique violation means the
   * sku or the slug raced with another writer (another process on the same file): the sku
   * is re-checked, and otherwise the slug is picked again.
   */
  private async insertWithFreeSlug(
    ctx: RoutingContext,
    db: TenantDb,
    input: CreateProductInput,
  ): Promise<string> {
    const base = slugifyProductName(input.name);
    const now = this.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await withTenantWriteTransaction(db, async (trx) => {
          const slug = pickUniqueSlug(base, await selectSlugsWithBaseSql(trx, base));
          const repo = new ProductRepo(trx);

          const { id } = await repo.insertProduct({
            name: input.name,
            slug,
            description: input.description,
            price: input.price,
            costPrice: input.costPrice,
            sku: input.sku,
            quantity: input.quantity,
            status: input.status,
            isFeatured: input.isFeatured,
            metaTitle: input.metaTitle,
            metaDescription: input.metaDescription,
            createdBy: ctx.identity.userId,
            now,
          });

          await this.insertImages(repo, id, input.images, { existing: 0, now });
          return id;
        });
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;

        await this.assertSkuFree(db, input.sku);
        if (attempt >= MAX_SLUG_ATTEMPTS) throw err;
      }
    }
  }

  private async assertSkuFree(db: TenantDb, sku: string | null): Promise<void> {
    if (sku === null) return;
    if ((await selectProductIdBySkuSql(db, sku)) !== undefined) {
      throw ProductErrors.skuTaken({ sku });
    }
  }

  /**
   * sort_order continues after the existing images. Without an explicit pick, the first
   * image of a product that had none becomes primary.
   */
  private async insertImages(
    repo: ProductRepo,
    productId: string,
    images: readonly NewImage[],
    opts: { existing: number; setPrimary?: number; now: Date },
  ): Promise<string[]> {
    const primaryIndex = opts.setPrimary ?? (opts.existing === 0 ? 0 : -1);

    const ids: string[] = [];
    for (const [index, image] of images.entries()) {
      const { id } = await repo.insertImage({
        productId,
        image: image.image,
        altText: image.altText,
        isPrimary: index === primaryIndex,
        sortOrder: opts.existing + index,
        now: opts.now,
      });
      ids.push(id);
    }
    return ids;
  }
}
