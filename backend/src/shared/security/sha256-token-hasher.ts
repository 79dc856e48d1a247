/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Unsalted SHA-256: refresh tokens are high-entropy signed strings, compared by hash.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
