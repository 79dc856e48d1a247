/**
 * backend/src/modules/products/product.module.ts
 *
 * WHY:
 * - Encapsulates Products module wiring.
 *
 * RULES:
 * - No infra creation here: the tenant database arrives per request, via the router.
 */

import type { FastifyInstance } from 'fastify';

import type { TenantRouter } from '../../shared/http/tenant-router';
import type { Logger } from '../../shared/logger/logger';

import { ProductController } from './product.controller';
import { registerProductRoutes } from './product.routes';
import { ProductService } from './product.service';

export type ProductModule = ReturnType<typeof createProductModule>;

export function createProductModule(deps: { logger: Logger; now?: () => Date }) {
  const productService = new ProductService(deps);
  const controller = new ProductController(productService);

  return {
    productService,
    registerRoutes(app: FastifyInstance, router: TenantRouter) {
      registerProductRoutes(app, router, controller);
    },
  };
}
