/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely connection for the SHARED database
 *   (companies, users, token tables).
 * - Tenant databases are never opened here; see shared/tenancy.
 *
 * HOW TO USE:
 * - DATABASE_URL=postgres://...  -> pg.Pool + PostgresDialect
 * - DATABASE_URL=<file path>     -> better-sqlite3 + SqliteDialect
 * - DATABASE_URL=:memory:        -> throwaway SQLite (tests)
 */

import pg from 'pg';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';

import type { SharedDatabase } from './shared-db.types';
import { openSqlite } from './sqlite';

export type Db = Kysely<SharedDatabase>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<SharedDatabase>;

export function isPostgresUrl(databaseUrl: string): boolean {
  return /^postgres(ql)?:\/\//i.test(databaseUrl);
}

export function createDb(databaseUrl: string): Db {
  if (isPostgresUrl(databaseUrl)) {
    const pool = new pg.Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 10_000,
    });

    return new Kysely<SharedDatabase>({
      dialect: new PostgresDialect({ pool }),
    });
  }

  return new Kysely<SharedDatabase>({
    dialect: new SqliteDialect({ database: openSqlite(databaseUrl) }),
  });
}
