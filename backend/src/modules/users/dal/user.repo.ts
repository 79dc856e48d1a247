/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations, shared database).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserRole } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint).
   * Callers should catch unique-violation if doing find-or-create patterns.
   */
  async insertUser(params: {
    email: string;
    passwordHash: string;
    firstName: string;
    lastName: string;
    companyId: string | null;
    role: UserRole;
    isSuperuser?: boolean;
    now: Date;
  }): Promise<{ id: string; email: string }> {
    const id = randomUUID();
    const email = params.email.toLowerCase();

    await this.db
      .insertInto('users')
      .values({
        id,
        email,
        password_hash: params.passwordHash,
        first_name: params.firstName,
        last_name: params.lastName,
        company_id: params.companyId,
        role: params.role,
        is_active: 1,
        is_superuser: params.isSuperuser ? 1 : 0,
        date_joined: params.now.toISOString(),
        last_login: null,
      })
      .execute();

    return { id, email };
  }

  async updateLastLogin(userId: string, at: Date): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ last_login: at.toISOString() })
      .where('id', '=', userId)
      .execute();
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ password_hash: passwordHash })
      .where('id', '=', userId)
      .execute();
  }

  async updateProfile(
    userId: string,
    patch: { firstName?: string; lastName?: string },
  ): Promise<void> {
    const set: { first_name?: string; last_name?: string } = {};
    if (patch.firstName !== undefined) set.first_name = patch.firstName;
    if (patch.lastName !== undefined) set.last_name = patch.lastName;
    if (Object.keys(set).length === 0) return;

    await this.db.updateTable('users').set(set).where('id', '=', userId).execute();
  }
}
