/**
 * backend/src/shared/tenancy/tenant-connection.ts
 *
 * WHY:
 * - ConnectionPool depends on this abstraction, not on better-sqlite3 directly (DIP).
 *   Unit tests plug in a fake factory to count opens/closes and simulate dropped connections.
 *
 * HOW IT WORKS:
 * - One TenantConnection = one physical handle to one tenant database, wrapped in its
 *   own Kysely instance.
 * - ensureProvisioned() runs once per pool creation. A missing database file is
 *   TenantUnprovisioned (503), never silently created.
 */

import { access } from 'node:fs/promises';
import { Kysely, SqliteDialect, sql } from 'kysely';
import type { Database } from 'better-sqlite3';

import type { TenantDatabase } from '../db/tenant-db.types';
import { openSqlite } from '../db/sqlite';
import { RoutingErrors } from './tenancy.errors';

export type TenantDb = Kysely<TenantDatabase>;

export interface TenantConnection {
  readonly db: TenantDb;
  /** false once closed, or if the underlying handle was dropped. */
  isOpen(): boolean;
  close(): Promise<void>;
}

export interface TenantConnectionFactory {
  ensureProvisioned(tenantId: string, descriptor: string): Promise<void>;
  open(tenantId: string, descriptor: string): Promise<TenantConnection>;
}

class SqliteTenantConnection implements TenantConnection {
  readonly db: TenantDb;
  private closed = false;

  constructor(private readonly database: Database) {
    this.db = new Kysely<TenantDatabase>({ dialect: new SqliteDialect({ database }) });
  }

  isOpen(): boolean {
    return !this.closed && this.database.open;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    // SqliteDialect closes the better-sqlite3 handle on destroy
    await this.db.destroy();
  }
}

export class SqliteTenantConnectionFactory implements TenantConnectionFactory {
  async ensureProvisioned(tenantId: string, descriptor: string): Promise<void> {
    try {
      await access(descriptor);
    } catch {
      throw RoutingErrors.tenantUnprovisioned({ tenantId });
    }
  }

  // async so a failed open always surfaces as a rejection
  async open(_tenantId: string, descriptor: string): Promise<TenantConnection> {
    const database = openSqlite(descriptor, { fileMustExist: true });
    return new SqliteTenantConnection(database);
  }
}

/**
 * Runs `fn` in a write transaction on one connection (BEGIN IMMEDIATE).
 * A deferred transaction that reads before writing can fail with SQLITE_BUSY when another
 * pooled connection to the same file commits in between; IMMEDIATE takes the write lock
 * up front and waits for it under busy_timeout.
 */
export async function withTenantWriteTransaction<T>(
  db: TenantDb,
  fn: (trx: TenantDb) => Promise<T>,
): Promise<T> {
  return db.connection().execute(async (conn) => {
    await sql`begin immediate`.execute(conn);
    try {
      const result = await fn(conn);
      await sql`commit`.execute(conn);
      return result;
    } catch (err) {
      await sql`rollback`.execute(conn);
      throw err;
    }
  });
}
