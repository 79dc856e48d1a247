/**
 * backend/src/modules/products/product.routes.ts
 *
 * WHY:
 * - Declares catalog endpoints.
 *
 * RULES:
 * - Tenant scope only: a platform superuser has no catalog of its own.
 * - Reads: every role. Writes: admin / manager.
 * - PUT replaces every product field (omitted ones take their create defaults); PATCH
 *   touches only the fields sent. Neither changes images.
 * - /products/images/:imageId is registered next to /products/:id; Fastify's router
 *   prefers the static "images" segment, so the two never collide.
 */

import type { FastifyInstance } from 'fastify';
import type { TenantRouter } from '../../shared/http/tenant-router';
import { PRODUCT_MANAGER_ROLES } from './policies/product-access.policy';
import type { ProductController } from './product.controller';

const TENANT_READ = { scope: 'tenant' } as const;
const TENANT_WRITE = { scope: 'tenant', roles: PRODUCT_MANAGER_ROLES } as const;

export function registerProductRoutes(
  app: FastifyInstance,
  router: TenantRouter,
  controller: ProductController,
) {
  app.get('/products', router.routed(TENANT_READ, controller.list.bind(controller)));
  app.get('/products/:id', router.routed(TENANT_READ, controller.get.bind(controller)));
  app.get(
    '/products/:id/images',
    router.routed(TENANT_READ, controller.listImages.bind(controller)),
  );
  app.get(
    '/products/images/:imageId',
    router.routed(TENANT_READ, controller.getImage.bind(controller)),
  );

  app.post('/products', router.routed(TENANT_WRITE, controller.create.bind(controller)));
  app.put('/products/:id', router.routed(TENANT_WRITE, controller.replace.bind(controller)));
  app.patch('/products/:id', router.routed(TENANT_WRITE, controller.update.bind(controller)));
  app.delete('/products/:id', router.routed(TENANT_WRITE, controller.remove.bind(controller)));
  app.post(
    '/products/:id/images',
    router.routed(TENANT_WRITE, controller.addImages.bind(controller)),
  );
  app.patch(
    '/products/images/:imageId',
    router.routed(TENANT_WRITE, controller.updateImage.bind(controller)),
  );
  app.delete(
    '/products/images/:imageId',
    router.routed(TENANT_WRITE, controller.deleteImage.bind(controller)),
  );
}
