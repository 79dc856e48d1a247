/**
 * backend/src/index.ts
 *
 * Entrypoint: config -> app -> listen.
 * On SIGINT/SIGTERM the server stops accepting requests first, then the connection pool,
 * token sweeper and shared database are closed (deps.close). A second signal during
 * shutdown is ignored.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, deps, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    tenantDbDir: config.tenancy.dbDir,
    poolMax: config.tenancy.poolMax,
  });

  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('server.shutdown', { signal, pool: deps.pool.stats() });

    try {
      await close();
      process.exit(0);
    } catch (err) {
      logger.error('server.shutdown_failed', { signal, err });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
