/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run shared-database migrations from the command line.
 * - Tenant databases are migrated when they are provisioned (see TenantDirectory.register).
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { createDb } from './db';
import { migrateSharedDb } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    const applied = await migrateSharedDb(db);
    logger.info('db.migrate.done', { flow: 'db.migrate', applied });
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.failed', { flow: 'db.migrate', err });
  process.exit(1);
});
