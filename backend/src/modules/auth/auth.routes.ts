/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 *
 * SECURITY:
 * - Tokens only in POST body or the Authorization header (never URL/query).
 *
 * RULES:
 * - register / login / token refresh are public: they run before any token exists.
 * - Everything else goes through the tenant router with scope 'any': tenant users and
 *   platform superusers alike.
 */

import type { FastifyInstance } from 'fastify';
import type { TenantRouter } from '../../shared/http/tenant-router';
import type { AuthController } from './auth.controller';

const ANY_AUTHENTICATED = { scope: 'any' } as const;

export function registerAuthRoutes(
  app: FastifyInstance,
  router: TenantRouter,
  controller: AuthController,
) {
  app.post('/auth/register', controller.register.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/token/refresh', controller.refresh.bind(controller));

  app.post('/auth/logout', router.routed(ANY_AUTHENTICATED, controller.logout.bind(controller)));
  app.get(
    '/auth/profile',
    router.routed(ANY_AUTHENTICATED, controller.getProfile.bind(controller)),
  );
  app.patch(
    '/auth/profile',
    router.routed(ANY_AUTHENTICATED, controller.updateProfile.bind(controller)),
  );
  app.post(
    '/auth/password/change',
    router.routed(ANY_AUTHENTICATED, controller.changePassword.bind(controller)),
  );
}
