/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One winston instance, JSON lines, stable service/env metadata.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Inside request handlers prefer `withRequestContext(req)`.
 * - Pass errors as `{ err }` so stack/message survive serialization.
 * - Event names are dotted: `<area>.<event>` (e.g. `tenant_pool.created`).
 *
 * RULES:
 * - Top-level credential fields are masked before any transport sees them. This is the
 *   last line: callers still never pass raw tokens or passwords on purpose.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'tenant-catalog-backend';
const level = process.env.LOG_LEVEL ?? 'info';

const MASKED_FIELDS = [
  'password',
  'passwordHash',
  'token',
  'accessToken',
  'refreshToken',
  'authorization',
  'secret',
] as const;

const maskCredentials = winston.format((info) => {
  for (const field of MASKED_FIELDS) {
    if (info[field] !== undefined) info[field] = '[REDACTED]';
  }
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    maskCredentials(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service, env: nodeEnv },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
