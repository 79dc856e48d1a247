/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByEmailSql, selectUserByIdSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserWithPasswordHash } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    companyId: row.company_id,
    role: row.role,
    isActive: row.is_active === 1,
    isSuperuser: row.is_superuser === 1,
    dateJoined: new Date(row.date_joined),
    lastLogin: row.last_login ? new Date(row.last_login) : null,
  };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserWithPasswordHashByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserWithPasswordHash | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return { ...toUser(row), passwordHash: row.password_hash };
}

export async function getUserWithPasswordHashById(
  db: DbExecutor,
  userId: string,
): Promise<UserWithPasswordHash | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return { ...toUser(row), passwordHash: row.password_hash };
}
