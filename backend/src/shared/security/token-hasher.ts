/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Refresh tokens are recorded as outstanding (modules/tokens), but never in raw form.
 *   A leaked shared database must not hand out usable refresh tokens.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
