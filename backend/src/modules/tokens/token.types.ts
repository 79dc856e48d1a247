/**
 * backend/src/modules/tokens/token.types.ts
 *
 * WHY:
 * - Domain types for signed access/refresh tokens.
 * - Claims are exposed camelCase; the wire format (sub, tenant_id, ...) stays in token.schemas.ts.
 */

import type { UserRole } from '../users/user.types';

export const TOKEN_TYPES = ['access', 'refresh'] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

/** Who a token is issued for. tenantId is null for platform (shared-database) identities. */
export type TokenIdentity = Readonly<{
  userId: string;
  tenantId: string | null;
  role: UserRole;
}>;

export type TokenClaims = Readonly<
  TokenIdentity & {
    type: TokenType;
    jti: string;
    /** epoch seconds */
    issuedAt: number;
    /** epoch seconds */
    expiresAt: number;
  }
>;

export type IssuedTokens = {
  accessToken: string;
  refreshToken: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
};

export type RefreshedAccessToken = {
  accessToken: string;
  accessExpiresAt: Date;
  claims: TokenClaims;
};

export type PurgeResult = {
  blacklisted: number;
  outstanding: number;
};
