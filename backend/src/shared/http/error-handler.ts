/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 *   SERVICE_UNAVAILABLE also sets Retry-After when meta.retryAfterSeconds is present.
 * - RateLimitError → 429 + Retry-After (seconds left in the window).
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad JSON, body too large) → 400 with their status.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 * - Always use withRequestContext(req) so requestId, userId, role and tenantId
 *   are automatically included in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'access',
  'refresh',
  'accessToken',
  'refreshToken',
  'authorization',
  'password',
  'passwordHash',
  'secret',
  'dbDescriptor',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function retryAfterOf(err: AppError): number | null {
  const value = err.meta?.retryAfterSeconds;
  return typeof value === 'number' && value > 0 ? Math.ceil(value) : null;
}

function clientStatusOf(err: FastifyError): number | null {
  const status = err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const meta = { flow: 'http.error', code: err.code, status: err.status };

      if (err.status >= 500) {
        log.error('app_error', { ...meta, message: err.message, meta: redactMeta(err.meta) });
      } else {
        log.warn('app_error', { ...meta, message: err.message, meta: redactMeta(err.meta) });
      }

      const retryAfter = err.code === 'SERVICE_UNAVAILABLE' ? retryAfterOf(err) : null;
      if (retryAfter !== null) void reply.header('Retry-After', String(retryAfter));

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        retryAfterSeconds: err.retryAfterSeconds,
      });

      return reply
        .status(429)
        .header('Retry-After', String(err.retryAfterSeconds))
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Validation that slipped past a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Fastify's own 4xx (malformed JSON, unsupported media type, ...)
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, code: err.code });
      return reply
        .status(clientStatus)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
