/**
 * backend/src/shared/tenancy/tenancy.errors.ts
 *
 * WHY:
 * - Error semantics for per-request tenant routing.
 *
 * RULES:
 * - An unknown or inactive tenant is folded into the same 401 as a bad token,
 *   so a caller cannot probe which tenant ids exist. The real reason stays in meta (logs only).
 * - Pool exhaustion / unprovisioned tenant are 503 + Retry-After: transient, safe to retry.
 * - Misuse of RoutedDataAccess is a programming error (500), never a client error.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

const RETRY_AFTER_SECONDS = 1;

export const RoutingErrors = {
  unauthenticated(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required.', {
      reason: 'unauthenticated',
      ...meta,
    });
  },

  unknownOrInactiveTenant(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required.', {
      ...meta,
      reason: 'tenant_unknown_or_inactive',
    });
  },

  insufficientRole(meta?: AppErrorMeta) {
    return AppError.forbidden('Insufficient role.', meta);
  },

  wrongScope(meta?: AppErrorMeta) {
    return AppError.forbidden('This endpoint is not available for this account.', meta);
  },

  poolExhausted(meta?: AppErrorMeta) {
    return AppError.serviceUnavailable('Tenant database is busy. Try again later.', {
      ...meta,
      reason: 'pool_exhausted',
      retryAfterSeconds: RETRY_AFTER_SECONDS,
    });
  },

  tenantUnprovisioned(meta?: AppErrorMeta) {
    return AppError.serviceUnavailable('Tenant database is unavailable. Try again later.', {
      ...meta,
      reason: 'tenant_unprovisioned',
      retryAfterSeconds: RETRY_AFTER_SECONDS,
    });
  },

  poolClosed(meta?: AppErrorMeta) {
    return AppError.serviceUnavailable('Service is shutting down.', {
      ...meta,
      reason: 'pool_closed',
    });
  },

  handlerTimedOut(meta?: AppErrorMeta) {
    return AppError.serviceUnavailable('Request timed out. Try again later.', {
      ...meta,
      reason: 'handler_timeout',
      retryAfterSeconds: RETRY_AFTER_SECONDS,
    });
  },

  accessAfterRelease(meta?: AppErrorMeta) {
    return AppError.internal('Data access used after request routing was released.', meta);
  },

  noTenantBound(meta?: AppErrorMeta) {
    return AppError.internal('No tenant database is bound to this request.', meta);
  },
} as const;
