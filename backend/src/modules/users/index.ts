/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export {
  getUserByEmail,
  getUserById,
  getUserWithPasswordHashByEmail,
  getUserWithPasswordHashById,
} from './queries/user.queries';
export { UserRepo } from './dal/user.repo';
export { USER_ROLES } from './user.types';
export type { User, UserRole, UserWithPasswordHash } from './user.types';
