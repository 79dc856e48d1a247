/**
 * backend/src/shared/http/validate.ts
 *
 * WHY:
 * - Controllers validate body/params/query with Zod and throw AppError on failure.
 *   This keeps that three-line pattern identical everywhere.
 *
 * RULES:
 * - Issues go to meta (logged), never to the client message.
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  message = 'Invalid request body',
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}
