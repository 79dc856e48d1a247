/**
 * backend/src/modules/auth/helpers/build-auth-result.ts
 *
 * WHY:
 * - Register, login and profile all return the same user shape.
 *
 * RULES:
 * - Pure mapping. Dates go out as ISO strings.
 */

import type { IssuedTokens } from '../../tokens';
import type { Tenant } from '../../tenants';
import type { User } from '../../users';
import type { AuthResult, TokenPair, UserView } from '../auth.types';

export function toUserView(user: User, company: Tenant | null): UserView {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: `${user.firstName} ${user.lastName}`.trim(),
    role: user.role,
    isActive: user.isActive,
    isSuperuser: user.isSuperuser,
    company: company ? { id: company.id, name: company.name, slug: company.slug } : null,
    dateJoined: user.dateJoined.toISOString(),
    lastLogin: user.lastLogin ? user.lastLogin.toISOString() : null,
  };
}

export function toTokenPair(tokens: IssuedTokens): TokenPair {
  return {
    access: tokens.accessToken,
    refresh: tokens.refreshToken,
    accessExpiresAt: tokens.accessExpiresAt.toISOString(),
    refreshExpiresAt: tokens.refreshExpiresAt.toISOString(),
  };
}

export function buildAuthResult(params: {
  user: User;
  company: Tenant | null;
  tokens: IssuedTokens;
}): AuthResult {
  return {
    user: toUserView(params.user, params.company),
    tokens: toTokenPair(params.tokens),
  };
}
