/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - Tests run with BCRYPT_COST=4 so the e2e suite stays fast.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const DEFAULT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_COST;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    // a malformed stored hash is a failed login, not a 500
    if (!hash.startsWith('$2')) return false;
    return bcrypt.compare(plain, hash);
  }
}
