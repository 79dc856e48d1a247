/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (shared db, rate-limit counters, connection pool) and shares them.
 * - Keeps modules testable (tests build the same graph from a test config).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - The directory, the pool and the resolver are process-wide singletons created here
 *   and nowhere else.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import { migrateSharedDb } from '../shared/db/migrator';

import type { CounterStore } from '../shared/cache/counter-store';
import { InMemCounterStore } from '../shared/cache/inmem-counter-store';
import { RedisCounterStore } from '../shared/cache/redis-counter-store';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createTenantRouter, type TenantRouter } from '../shared/http/tenant-router';
import { ConnectionPool } from '../shared/tenancy/connection-pool';
import { SqliteTenantConnectionFactory } from '../shared/tenancy/tenant-connection';
import { SqliteTenantProvisioner } from '../shared/tenancy/tenant-provisioner';
import { TenantResolver } from '../shared/tenancy/tenant-resolver';

import { createTenantModule } from '../modules/tenants/tenant.module';
import type { TenantModule } from '../modules/tenants/tenant.module';

import { createTokenModule } from '../modules/tokens/token.module';
import type { TokenModule } from '../modules/tokens/token.module';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createProductModule } from '../modules/products/product.module';
import type { ProductModule } from '../modules/products/product.module';

export type AppDeps = {
  db: ReturnType<typeof createDb>;
  counters: CounterStore;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  // routing
  pool: ConnectionPool;
  resolver: TenantResolver;
  router: TenantRouter;

  // modules
  tokens: TokenModule;
  users: UserModule;
  tenants: TenantModule;
  auth: AuthModule;
  products: ProductModule;

  // lifecycle
  close: () => Promise<void>;
};

async function createCounterStore(config: AppConfig): Promise<CounterStore> {
  // Without REDIS_URL, counters live in process memory (single-instance / dev / tests).
  if (!config.redisUrl) return new InMemCounterStore();
  return RedisCounterStore.connect(config.redisUrl);
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  const db = createDb(config.databaseUrl);

  if (config.migrateOnStart) {
    await migrateSharedDb(db);
  }

  const counters = await createCounterStore(config);

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(counters, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const tokens = createTokenModule({
    db,
    tokenHasher,
    logger,
    options: {
      secret: config.tokens.secret,
      accessTtlSeconds: config.tokens.accessTtlSeconds,
      refreshTtlSeconds: config.tokens.refreshTtlSeconds,
      sweepIntervalMs: config.tokens.sweepIntervalMs,
    },
  });

  const users = createUserModule({ db });

  const tenants = createTenantModule({
    db,
    provisioner: new SqliteTenantProvisioner(config.tenancy.dbDir),
    logger,
    options: { cacheTtlSeconds: config.tenancy.directoryCacheTtlSeconds },
  });

  // routing: token -> tenant -> pooled connection
  const pool = new ConnectionPool(
    {
      factory: new SqliteTenantConnectionFactory(),
      resolveDescriptor: (tenantId) => tenants.directory.descriptorOf(tenantId),
      logger,
    },
    {
      max: config.tenancy.poolMax,
      idleCeiling: config.tenancy.poolIdleCeiling,
      acquireTimeoutMs: config.tenancy.acquireTimeoutMs,
      idleTimeoutMs: config.tenancy.idleTimeoutMs,
      sweepIntervalMs: config.tenancy.sweepIntervalMs,
    },
  );

  const resolver = new TenantResolver({
    tokens: tokens.tokenService,
    directory: tenants.directory,
    pool,
    sharedDb: db,
    logger,
  });

  const router = createTenantRouter({
    resolver,
    logger,
    handlerTimeoutMs: config.tenancy.handlerTimeoutMs,
  });

  const auth = createAuthModule({
    db,
    tokenHasher,
    passwordHasher,
    logger,
    rateLimiter,
    userRepo: users.userRepo,
    directory: tenants.directory,
    tokenService: tokens.tokenService,
  });

  const products = createProductModule({ logger });

  return {
    db,
    counters,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    pool,
    resolver,
    router,
    tokens,
    users,
    tenants,
    auth,
    products,
    close: async () => {
      tokens.close();
      await pool.close();
      await counters.close();
      await db.destroy();
    },
  };
}
