/**
 * backend/src/modules/tenants/tenant.routes.ts
 *
 * WHY:
 * - Declares company endpoints.
 *
 * RULES:
 * - /auth/companies is public (registration needs it before any token exists).
 * - /admin/* is platform-level: shared scope + admin role, i.e. a tenant-less superuser.
 */

import type { FastifyInstance } from 'fastify';
import type { TenantRouter } from '../../shared/http/tenant-router';
import type { TenantController } from './tenant.controller';

const PLATFORM_ADMIN = { scope: 'shared', roles: ['admin'] } as const;

export function registerTenantRoutes(
  app: FastifyInstance,
  router: TenantRouter,
  controller: TenantController,
) {
  app.get('/auth/companies', controller.listPublic.bind(controller));

  app.get('/admin/companies', router.routed(PLATFORM_ADMIN, controller.listAll.bind(controller)));
  app.patch(
    '/admin/companies/:id',
    router.routed(PLATFORM_ADMIN, controller.rename.bind(controller)),
  );
  app.post(
    '/admin/companies/:id/deactivate',
    router.routed(PLATFORM_ADMIN, controller.deactivate.bind(controller)),
  );
}
