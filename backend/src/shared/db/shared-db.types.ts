/**
 * backend/src/shared/db/shared-db.types.ts
 *
 * WHY:
 * - Kysely table types for the shared (platform) database.
 * - Kept by hand alongside migrations/shared: the schema is small and fixed.
 *
 * RULES:
 * - Portable column types only (Postgres + SQLite):
 *   ids are UUID text, booleans are 0/1 integers, timestamps are ISO-8601 text.
 * - snake_case stays inside DAL/queries; modules map rows to domain types.
 */

import type { UserRole } from '../../modules/users/user.types';

export interface CompaniesTable {
  id: string;
  name: string;
  slug: string;
  db_descriptor: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface UsersTable {
  id: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  company_id: string | null;
  role: UserRole;
  is_active: number;
  is_superuser: number;
  date_joined: string;
  last_login: string | null;
}

export interface OutstandingTokensTable {
  jti: string;
  user_id: string;
  token_hash: string;
  created_at: string;
  expires_at: string;
}

export interface BlacklistedTokensTable {
  jti: string;
  blacklisted_at: string;
  expires_at: string;
}

export interface SharedDatabase {
  companies: CompaniesTable;
  users: UsersTable;
  outstanding_tokens: OutstandingTokensTable;
  blacklisted_tokens: BlacklistedTokensTable;
}
