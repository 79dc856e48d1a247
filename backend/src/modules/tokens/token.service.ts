/**
 * src/modules/tokens/token.service.ts
 *
 * WHY:
 * - Issues and verifies signed (HS256) access/refresh tokens carrying identity + tenant claims.
 * - Keeps the refresh-token revocation list (blacklist) so logout works before natural expiry.
 *
 * RULES:
 * - verify() never consults the tenant directory. Tenant liveness is checked at issuance
 *   (login/refresh) and at resolution (TenantResolver), not here.
 * - Side effects only touch the shared database (outstanding_tokens, blacklisted_tokens).
 * - Raw refresh tokens are never stored: outstanding_tokens keeps a SHA-256 hash.
 *
 * CLOCK:
 * - `now` is injectable so expiry can be tested without sleeping.
 *   The same clock drives jose's exp check (currentDate).
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';

import { TokenRepo } from './dal/token.repo';
import { isTokenBlacklistedSql, selectOutstandingTokenSql } from './dal/token.query-sql';
import { TokenErrors, tokenErrorReason } from './token.errors';
import { TokenPayloadSchema } from './token.schemas';
import type {
  IssuedTokens,
  PurgeResult,
  RefreshedAccessToken,
  TokenClaims,
  TokenIdentity,
  TokenType,
} from './token.types';

const ALGORITHM = 'HS256';

export type TokenServiceOptions = {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  now?: () => Date;
};

type SignedToken = { token: string; jti: string; expiresAt: number };

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function epochToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export class TokenService {
  private readonly key: Uint8Array;
  private readonly now: () => Date;
  private readonly tokenRepo: TokenRepo;

  constructor(
    private readonly deps: { db: DbExecutor; tokenHasher: TokenHasher; logger: Logger },
    private readonly opts: TokenServiceOptions,
  ) {
    this.key = new TextEncoder().encode(opts.secret);
    this.now = opts.now ?? (() => new Date());
    this.tokenRepo = new TokenRepo(deps.db);
  }

  async issue(identity: TokenIdentity): Promise<IssuedTokens> {
    const issuedAt = toEpochSeconds(this.now());

    const access = await this.sign(identity, 'access', issuedAt, this.opts.accessTtlSeconds);
    const refresh = await this.sign(identity, 'refresh', issuedAt, this.opts.refreshTtlSeconds);

    await this.tokenRepo.insertOutstanding({
      jti: refresh.jti,
      userId: identity.userId,
      tokenHash: this.deps.tokenHasher.hash(refresh.token),
      createdAt: epochToIso(issuedAt),
      expiresAt: epochToIso(refresh.expiresAt),
    });

    this.deps.logger.debug('tokens.issued', {
      flow: 'tokens.issue',
      userId: identity.userId,
      tenantId: identity.tenantId,
      refreshJti: refresh.jti,
    });

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessExpiresAt: new Date(access.expiresAt * 1000),
      refreshExpiresAt: new Date(refresh.expiresAt * 1000),
    };
  }

  /**
   * Signature + expiry + claim shape. Fails with TokenErrors.invalid / TokenErrors.expired.
   * Accepts both token types; callers check `type`.
   */
  async verify(token: string): Promise<TokenClaims> {
    let payload: JWTPayload;

    try {
      const verified = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: this.now(),
      });
      payload = verified.payload;
    } catch (err) {
      if (err instanceof joseErrors.JWTExpired) {
        throw TokenErrors.expired();
      }
      throw TokenErrors.invalid({
        cause: err instanceof joseErrors.JOSEError ? err.code : 'unknown',
      });
    }

    const parsed = TokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw TokenErrors.invalid({ cause: 'malformed_claims' });
    }

    return {
      userId: parsed.data.sub,
      tenantId: parsed.data.tenant_id,
      role: parsed.data.role,
      type: parsed.data.type,
      jti: parsed.data.jti,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
    };
  }

  /**
   * Exchanges a refresh token for a new access token.
   * Fails: Revoked (blacklisted jti) | Expired | Invalid (bad signature, wrong type,
   * or not a token we recorded as outstanding).
   */
  async refresh(refreshToken: string): Promise<RefreshedAccessToken> {
    const claims = await this.verifyRefreshToken(refreshToken);

    if (await isTokenBlacklistedSql(this.deps.db, claims.jti)) {
      throw TokenErrors.revoked({ jti: claims.jti });
    }

    const outstanding = await selectOutstandingTokenSql(this.deps.db, claims.jti);
    if (!outstanding || outstanding.token_hash !== this.deps.tokenHasher.hash(refreshToken)) {
      throw TokenErrors.invalid({ cause: 'not_outstanding', jti: claims.jti });
    }

    const access = await this.sign(
      claims,
      'access',
      toEpochSeconds(this.now()),
      this.opts.accessTtlSeconds,
    );

    return {
      accessToken: access.token,
      accessExpiresAt: new Date(access.expiresAt * 1000),
      claims,
    };
  }

  /**
   * Idempotent. Blacklists the refresh token's jti until the token's own expiry.
   * An already-expired token is left alone: it can no longer be refreshed anyway.
   * With `ownerId`, a token issued to another user fails Invalid and is NOT revoked.
   */
  async revoke(refreshToken: string, opts: { ownerId?: string } = {}): Promise<void> {
    let claims: TokenClaims;
    try {
      claims = await this.verifyRefreshToken(refreshToken);
    } catch (err) {
      if (tokenErrorReason(err) === 'expired') return;
      throw err;
    }

    if (opts.ownerId !== undefined && claims.userId !== opts.ownerId) {
      throw TokenErrors.invalid({ cause: 'not_owner', jti: claims.jti });
    }

    const inserted = await this.tokenRepo.insertBlacklisted({
      jti: claims.jti,
      blacklistedAt: this.now().toISOString(),
      expiresAt: epochToIso(claims.expiresAt),
    });

    this.deps.logger.info('tokens.revoked', {
      flow: 'tokens.revoke',
      userId: claims.userId,
      jti: claims.jti,
      alreadyRevoked: !inserted,
    });
  }

  /** Garbage-collects blacklist + outstanding rows whose token has expired. */
  async purgeExpired(): Promise<PurgeResult> {
    const result = await this.tokenRepo.deleteExpired(this.now().toISOString());

    if (result.blacklisted > 0 || result.outstanding > 0) {
      this.deps.logger.info('tokens.purged', { flow: 'tokens.purge', ...result });
    }

    return result;
  }

  /**
   * Starts the background purge. Returns a stop function.
   * The timer is unref'd so it never keeps the process alive on its own.
   */
  startSweeper(intervalMs: number): () => void {
    if (intervalMs <= 0) return () => undefined;

    const timer = setInterval(() => {
      this.purgeExpired().catch((err: unknown) => {
        this.deps.logger.error('tokens.purge_failed', { flow: 'tokens.purge', err });
      });
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
  }

  private async verifyRefreshToken(token: string): Promise<TokenClaims> {
    const claims = await this.verify(token);
    if (claims.type !== 'refresh') {
      throw TokenErrors.invalid({ cause: 'wrong_token_type', jti: claims.jti });
    }
    return claims;
  }

  private async sign(
    identity: TokenIdentity,
    type: TokenType,
    issuedAt: number,
    ttlSeconds: number,
  ): Promise<SignedToken> {
    const jti = randomUUID();
    const expiresAt = issuedAt + ttlSeconds;

    const token = await new SignJWT({
      tenant_id: identity.tenantId,
      role: identity.role,
      type,
    })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(identity.userId)
      .setJti(jti)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return { token, jti, expiresAt };
  }
}
