/**
 * backend/src/modules/tokens/dal/token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for outstanding + blacklisted refresh tokens.
 *
 * RULES:
 * - Single-statement writes; nothing here needs a transaction.
 * - No AppError.
 * - Only token hashes are stored, never raw tokens.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class TokenRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertOutstanding(params: {
    jti: string;
    userId: string;
    tokenHash: string;
    createdAt: string;
    expiresAt: string;
  }): Promise<void> {
    await this.db
      .insertInto('outstanding_tokens')
      .values({
        jti: params.jti,
        user_id: params.userId,
        token_hash: params.tokenHash,
        created_at: params.createdAt,
        expires_at: params.expiresAt,
      })
      .execute();
  }

  /**
   * Idempotent: blacklisting an already blacklisted jti is a no-op.
   * Returns true only when a new row was written.
   */
  async insertBlacklisted(params: {
    jti: string;
    blacklistedAt: string;
    expiresAt: string;
  }): Promise<boolean> {
    const result = await this.db
      .insertInto('blacklisted_tokens')
      .values({
        jti: params.jti,
        blacklisted_at: params.blacklistedAt,
        expires_at: params.expiresAt,
      })
      .onConflict((oc) => oc.column('jti').doNothing())
      .executeTakeFirst();

    return Number(result.numInsertedOrUpdatedRows ?? 0n) > 0;
  }

  async deleteExpired(nowIso: string): Promise<{ blacklisted: number; outstanding: number }> {
    const blacklisted = await this.db
      .deleteFrom('blacklisted_tokens')
      .where('expires_at', '<=', nowIso)
      .executeTakeFirst();

    const outstanding = await this.db
      .deleteFrom('outstanding_tokens')
      .where('expires_at', '<=', nowIso)
      .executeTakeFirst();

    return {
      blacklisted: Number(blacklisted.numDeletedRows),
      outstanding: Number(outstanding.numDeletedRows),
    };
  }
}
