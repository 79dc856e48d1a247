/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Auth flows (register, login, password change) depend on this, not on bcrypt.
 * - Tests can swap in a cheaper cost without touching services.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
