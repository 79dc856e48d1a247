/**
 * backend/src/shared/tenancy/tenant-provisioner.ts
 *
 * WHY:
 * - Creating a tenant database = new SQLite file + tenant schema migrations.
 * - TenantDirectory sequences this with the shared-db insert; the provisioner only
 *   knows about files.
 *
 * RULES:
 * - provision() never touches an existing file.
 * - discard() removes the file and its WAL/SHM side files; missing files are fine.
 */

import { access, rm } from 'node:fs/promises';
import path from 'node:path';
import { Kysely, SqliteDialect } from 'kysely';

import type { TenantDatabase } from '../db/tenant-db.types';
import { openSqlite } from '../db/sqlite';
import { migrateTenantDb } from '../db/migrator';

export interface TenantProvisioner {
  /** Deterministic descriptor for a slug. attempt > 1 is used on collision. */
  descriptorFor(slug: string, attempt: number): string;
  exists(descriptor: string): Promise<boolean>;
  provision(descriptor: string): Promise<void>;
  discard(descriptor: string): Promise<void>;
}

export class SqliteTenantProvisioner implements TenantProvisioner {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  descriptorFor(slug: string, attempt: number): string {
    const stem = attempt <= 1 ? slug : `${slug}-${attempt}`;
    return path.join(this.dir, `${stem}_db.sqlite3`);
  }

  async exists(descriptor: string): Promise<boolean> {
    try {
      await access(descriptor);
      return true;
    } catch {
      return false;
    }
  }

  async provision(descriptor: string): Promise<void> {
    if (await this.exists(descriptor)) {
      throw new Error(`Tenant database already exists: ${path.basename(descriptor)}`);
    }

    const db = new Kysely<TenantDatabase>({
      dialect: new SqliteDialect({ database: openSqlite(descriptor) }),
    });

    try {
      await migrateTenantDb(db, { database: path.basename(descriptor) });
    } finally {
      await db.destroy();
    }
  }

  async discard(descriptor: string): Promise<void> {
    await Promise.all(
      [descriptor, `${descriptor}-wal`, `${descriptor}-shm`].map((file) => rm(file, { force: true })),
    );
  }
}
