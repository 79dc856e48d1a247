/**
 * backend/src/modules/products/product.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Products module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Prices accept "19.9" or 19.9 and come out normalized ("19.90").
 * - slug, createdBy/updatedBy and timestamps are server-owned: not accepted in bodies.
 */

import { z } from 'zod';

import { normalizePrice } from './policies/price.policy';
import { PRODUCT_STATUSES } from './product.types';

const price = z
  .union([z.string(), z.number().nonnegative()])
  .transform((value, ctx) => {
    const normalized = normalizePrice(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Price must be a non-negative amount with at most two decimals',
      });
      return z.NEVER;
    }
    return normalized;
  });

const imageInput = z.object({
  image: z.string().trim().min(1, 'Image path is required').max(500),
  altText: z.string().max(255).optional().default(''),
});

const productFields = {
  name: z.string().trim().min(1, 'Name is required').max(255),
  description: z.string().max(10_000),
  price,
  costPrice: price.nullable(),
  sku: z.string().trim().min(1).max(100).nullable(),
  quantity: z.number().int().nonnegative(),
  status: z.enum(PRODUCT_STATUSES),
  isFeatured: z.boolean(),
  metaTitle: z.string().max(255),
  metaDescription: z.string().max(2_000),
};

export const createProductSchema = z
  .object({
    name: productFields.name,
    description: productFields.description.optional().default(''),
    price: productFields.price.optional().default('0.00'),
    costPrice: productFields.costPrice.optional().default(null),
    sku: productFields.sku.optional().default(null),
    quantity: productFields.quantity.optional().default(0),
    status: productFields.status.optional().default('draft'),
    isFeatured: productFields.isFeatured.optional().default(false),
    metaTitle: productFields.metaTitle.optional().default(''),
    metaDescription: productFields.metaDescription.optional().default(''),
    images: z.array(imageInput).max(20).optional().default([]),
  })
  .strict();

export type CreateProductInput = z.infer<typeof createProductSchema>;

export const updateProductSchema = z
  .object({
    name: productFields.name.optional(),
    description: productFields.description.optional(),
    price: productFields.price.optional(),
    costPrice: productFields.costPrice.optional(),
    sku: productFields.sku.optional(),
    quantity: productFields.quantity.optional(),
    status: productFields.status.optional(),
    isFeatured: productFields.isFeatured.optional(),
    metaTitle: productFields.metaTitle.optional(),
    metaDescription: productFields.metaDescription.optional(),
  })
  .strict();

export type UpdateProductInput = z.infer<typeof updateProductSchema>;

/** PUT body: every field the create body takes except images, with the same defaults. */
export const replaceProductSchema = createProductSchema.omit({ images: true });

export type ReplaceProductInput = z.infer<typeof replaceProductSchema>;

export const listProductsQuerySchema = z.object({
  status: productFields.status.optional(),
  featured: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true')),
  search: z.string().trim().min(1).max(100).optional(),
  page: z.coerce.number().int().min(1).optional().default(1),
  pageSize: z.coerce.number().int().min(1).max(100).optional().default(20),
});

export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;

export const productIdParamsSchema = z.object({
  id: z.string().uuid('Invalid product id'),
});

export const imageIdParamsSchema = z.object({
  imageId: z.string().uuid('Invalid image id'),
});

export const addImagesSchema = z
  .object({
    images: z.array(imageInput).min(1, 'At least one image is required').max(20),
    /** 0-based index into `images` of the one to mark primary. */
    setPrimary: z.number().int().nonnegative().optional(),
  })
  .refine((v) => v.setPrimary === undefined || v.setPrimary < v.images.length, {
    message: 'setPrimary must point at one of the uploaded images',
    path: ['setPrimary'],
  });

export type AddImagesInput = z.infer<typeof addImagesSchema>;

export const updateImageSchema = z
  .object({
    altText: z.string().max(255).optional(),
    isPrimary: z.boolean().optional(),
    sortOrder: z.number().int().nonnegative().optional(),
  })
  .strict();

export type UpdateImageInput = z.infer<typeof updateImageSchema>;
