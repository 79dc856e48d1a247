/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig) {
  const deps = await buildDeps(config);
  const app = await buildServer({ config });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow, companyName: config.seed.companyName });

      await runDevSeed({
        db: deps.db,
        directory: deps.tenants.directory,
        userRepo: deps.users.userRepo,
        passwordHasher: deps.passwordHasher,
        options: {
          companyName: config.seed.companyName,
          adminEmail: config.seed.adminEmail,
          adminPassword: config.seed.adminPassword,
          superuserEmail: config.seed.superuserEmail,
        },
      });

      logger.info('seed.done', { flow });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
