/**
 * backend/src/modules/users/user.module.ts
 *
 * Support module (no routes of its own): auth consumes the repo for
 * registration, login bookkeeping and profile/password changes.
 */

import type { DbExecutor } from '../../shared/db/db';
import { UserRepo } from './dal/user.repo';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor }) {
  return {
    userRepo: new UserRepo(deps.db),
  };
}
