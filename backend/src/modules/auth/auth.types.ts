/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for register / login / refresh / profile.
 *
 * RULES:
 * - Never include password hashes or database descriptors in response types.
 */

import type { UserRole } from '../users/user.types';

export type CompanyRef = {
  id: string;
  name: string;
  slug: string;
};

export type UserView = {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  role: UserRole;
  isActive: boolean;
  isSuperuser: boolean;
  company: CompanyRef | null;
  dateJoined: string;
  lastLogin: string | null;
};

export type TokenPair = {
  access: string;
  refresh: string;
  accessExpiresAt: string;
  refreshExpiresAt: string;
};

export type AuthResult = {
  user: UserView;
  tokens: TokenPair;
};

export type RefreshResult = {
  access: string;
  accessExpiresAt: string;
};

/** Common request metadata every auth flow logs and rate-limits on. */
export type AuthRequestMeta = {
  ip: string;
  requestId: string;
};
