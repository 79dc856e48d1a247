/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - Both schemas (shared + tenant) migrate through the same Kysely Migrator path.
 * - Used by the migrate CLI, by DB_MIGRATE_ON_START, and by tenant provisioning.
 *
 * RULES:
 * - Throws on the first failed migration. Callers decide whether that is fatal
 *   (CLI exits, provisioning rolls back the tenant record).
 */

import { Migrator } from 'kysely';
import type { Kysely, Migration, MigrationProvider } from 'kysely';

import { sharedMigrations, tenantMigrations } from './migrations';
import { logger } from '../logger/logger';

class StaticMigrationProvider implements MigrationProvider {
  constructor(private readonly migrations: Record<string, Migration>) {}

  getMigrations(): Promise<Record<string, Migration>> {
    return Promise.resolve(this.migrations);
  }
}

async function migrateToLatest<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>,
  meta: Record<string, unknown>,
): Promise<string[]> {
  const migrator = new Migrator({ db, provider: new StaticMigrationProvider(migrations) });
  const { error, results } = await migrator.migrateToLatest();

  const applied: string[] = [];
  for (const r of results ?? []) {
    if (r.status === 'Success') {
      applied.push(r.migrationName);
      logger.debug('db.migration.success', { ...meta, migration: r.migrationName });
    }
    if (r.status === 'Error') {
      logger.error('db.migration.error', { ...meta, migration: r.migrationName });
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }

  return applied;
}

export function migrateSharedDb<T>(db: Kysely<T>): Promise<string[]> {
  return migrateToLatest(db, sharedMigrations, { flow: 'db.migrate', schema: 'shared' });
}

export function migrateTenantDb<T>(
  db: Kysely<T>,
  meta: Record<string, unknown> = {},
): Promise<string[]> {
  return migrateToLatest(db, tenantMigrations, { flow: 'db.migrate', schema: 'tenant', ...meta });
}
