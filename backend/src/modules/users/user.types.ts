/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users live in the shared database. A user belongs to at most one company (tenant);
 *   platform superusers have no company and route to the shared database only.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export const USER_ROLES = ['admin', 'manager', 'user'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  firstName: string;
  lastName: string;
  companyId: string | null;
  role: UserRole;

  isActive: boolean;
  isSuperuser: boolean;

  dateJoined: Date;
  lastLogin: Date | null;
};

/** Only for credential checks inside auth flows. Never returned from an endpoint. */
export type UserWithPasswordHash = User & { passwordHash: string };
