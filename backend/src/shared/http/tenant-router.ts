/**
 * backend/src/shared/http/tenant-router.ts
 *
 * WHY:
 * - Every routed endpoint runs through the same lifecycle:
 *     resolve -> access check -> handler (time-limited) -> release
 * - Centralized so no controller can forget to release its tenant connection.
 *
 * HOW TO USE:
 * - `router.routed({ scope: 'tenant', roles: ['admin'] }, controller.create.bind(controller))`
 * - The handler receives the RoutingContext as its third argument. Data access goes
 *   through `ctx.data.tenant()` / `ctx.data.shared()` only.
 *
 * RULES:
 * - release() runs in `finally`, exactly once, on every path (success, throw, 403, timeout).
 * - Scope check before role check: a tenant user calling a platform route gets the
 *   scope error, not a misleading role error.
 * - A timed-out handler is abandoned: its connection is released and its data access
 *   revoked, so any late query it attempts fails instead of touching a reused connection.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { UserRole } from '../../modules/users/user.types';
import type { Logger } from '../logger/logger';
import type { RoutingContext } from '../tenancy/routing-context';
import { RoutingErrors } from '../tenancy/tenancy.errors';
import type { ResolvedRequest } from '../tenancy/tenant-resolver';

export type RouteScope = 'tenant' | 'shared' | 'any';

export type RouteAccess = Readonly<{
  scope: RouteScope;
  /** Omitted = every role. */
  roles?: readonly UserRole[];
}>;

export type RoutedHandler = (
  req: FastifyRequest,
  reply: FastifyReply,
  ctx: RoutingContext,
) => Promise<unknown>;

export interface RequestResolver {
  resolve(input: {
    requestId: string;
    authorization: string | undefined;
  }): Promise<ResolvedRequest>;
}

declare module 'fastify' {
  interface FastifyRequest {
    /** Read-only reference for logging. Handlers get the context as an argument. */
    routingContext: RoutingContext | null;
  }
}

export function registerRoutingContext(app: FastifyInstance) {
  app.decorateRequest('routingContext', null);
}

export function assertRouteAccess(access: RouteAccess, ctx: RoutingContext): void {
  if (access.scope !== 'any' && access.scope !== ctx.target.kind) {
    throw RoutingErrors.wrongScope({ required: access.scope, actual: ctx.target.kind });
  }

  if (access.roles && !access.roles.includes(ctx.identity.role)) {
    throw RoutingErrors.insufficientRole({ required: access.roles, actual: ctx.identity.role });
  }
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  if (timeoutMs <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  // race subscribes to `work`, so a late rejection after the timeout is still handled
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export type TenantRouter = ReturnType<typeof createTenantRouter>;

export function createTenantRouter(deps: {
  resolver: RequestResolver;
  logger: Logger;
  handlerTimeoutMs: number;
}) {
  function routed(access: RouteAccess, handler: RoutedHandler) {
    return async function routedHandler(req: FastifyRequest, reply: FastifyReply) {
      const { context, release } = await deps.resolver.resolve({
        requestId: req.requestContext.requestId,
        authorization: req.headers.authorization,
      });

      req.routingContext = context;

      try {
        assertRouteAccess(access, context);

        return await withTimeout(handler(req, reply, context), deps.handlerTimeoutMs, () => {
          deps.logger.warn('tenant_router.handler_timeout', {
            flow: 'tenant_router',
            requestId: context.requestId,
            route: req.routeOptions.url,
            timeoutMs: deps.handlerTimeoutMs,
          });
          return RoutingErrors.handlerTimedOut({ timeoutMs: deps.handlerTimeoutMs });
        });
      } finally {
        release();
      }
    };
  }

  return { routed };
}
