/**
 * backend/src/modules/products/product.errors.ts
 *
 * WHY:
 * - Products module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - A product of another tenant is simply "not found": the tenant database is the only
 *   one reachable from a request, so no cross-tenant check exists or is needed.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProductErrors = {
  productNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Product not found.', meta);
  },

  imageNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Product image not found.', meta);
  },

  skuTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A product with this SKU already exists.', meta);
  },

  invalidPrice(meta?: AppErrorMeta) {
    return AppError.validationError(
      'Price must be a non-negative amount with at most two decimals.',
      meta,
    );
  },
} as const;
