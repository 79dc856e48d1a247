/**
 * backend/src/modules/tokens/token.errors.ts
 *
 * WHY:
 * - Token failures all surface as 401, but callers (refresh endpoint, tests) need to
 *   tell invalid / expired / revoked apart. The kind travels in meta.reason.
 *
 * RULES:
 * - Never put the raw token into meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type TokenErrorReason = 'invalid' | 'expired' | 'revoked';

export const TokenErrors = {
  invalid(meta?: AppErrorMeta) {
    return AppError.unauthorized('Token is invalid.', { ...meta, reason: 'invalid' });
  },

  expired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Token has expired.', { ...meta, reason: 'expired' });
  },

  revoked(meta?: AppErrorMeta) {
    return AppError.unauthorized('Token has been revoked.', { ...meta, reason: 'revoked' });
  },
} as const;

export function tokenErrorReason(err: unknown): TokenErrorReason | null {
  if (!(err instanceof AppError) || err.code !== 'UNAUTHORIZED') return null;

  const reason = err.meta?.reason;
  return reason === 'invalid' || reason === 'expired' || reason === 'revoked' ? reason : null;
}
