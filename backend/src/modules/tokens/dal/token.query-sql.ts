/**
 * backend/src/modules/tokens/dal/token.query-sql.ts
 *
 * DAL READS ONLY (shared database).
 * - No AppError
 * - No policies
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { OutstandingTokensTable } from '../../../shared/db/shared-db.types';

export type OutstandingTokenRow = Selectable<OutstandingTokensTable>;

export async function selectOutstandingTokenSql(
  db: DbExecutor,
  jti: string,
): Promise<OutstandingTokenRow | undefined> {
  return db.selectFrom('outstanding_tokens').selectAll().where('jti', '=', jti).executeTakeFirst();
}

export async function isTokenBlacklistedSql(db: DbExecutor, jti: string): Promise<boolean> {
  const row = await db
    .selectFrom('blacklisted_tokens')
    .select('jti')
    .where('jti', '=', jti)
    .executeTakeFirst();

  return row !== undefined;
}
