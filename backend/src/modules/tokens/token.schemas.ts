/**
 * backend/src/modules/tokens/token.schemas.ts
 *
 * WHY:
 * - A valid signature only proves WE signed the payload, not that it has the shape we expect
 *   (older token versions, hand-crafted payloads signed with a leaked dev secret, ...).
 * - Claims are validated with Zod after jose has verified signature + expiry.
 */

import { z } from 'zod';
import { USER_ROLES } from '../users/user.types';
import { TOKEN_TYPES } from './token.types';

export const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  tenant_id: z.string().min(1).nullable(),
  role: z.enum(USER_ROLES),
  type: z.enum(TOKEN_TYPES),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;
