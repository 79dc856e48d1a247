/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Boolean flags accept only true/false/1/0. z.coerce.boolean() would read "false" as true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  // postgres://... or a SQLite file path (":memory:" for throwaway runs)
  DATABASE_URL: z.string().min(1).default('./data/shared.sqlite3'),
  DB_MIGRATE_ON_START: BooleanFlag,

  // Optional: without it, rate-limit counters live in process memory.
  REDIS_URL: z.string().min(1).optional(),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('tenant-catalog-backend'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Tokens
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(60)
    .max(60 * 60)
    .default(30 * 60),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(60 * 60)
    .max(60 * 60 * 24 * 30)
    .default(60 * 60 * 24 * 7),
  TOKEN_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),

  // Tenant databases + connection routing
  TENANT_DB_DIR: z.string().min(1).default('./data/tenants'),
  TENANT_POOL_MAX: z.coerce.number().int().min(1).max(100).default(5),
  TENANT_POOL_IDLE_CEILING: z.coerce.number().int().min(0).max(100).default(2),
  TENANT_POOL_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  TENANT_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
  TENANT_POOL_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60 * 1000),
  TENANT_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlag,
  SEED_COMPANY_NAME: z.string().min(1).default('Demo Company'),
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_ADMIN_PASSWORD: z.string().min(8).default('change-me-please'),
  SEED_SUPERUSER_EMAIL: z.string().email().default('platform@example.com'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  migrateOnStart: boolean;
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  tokens: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
    sweepIntervalMs: number;
  };

  tenancy: {
    dbDir: string;
    poolMax: number;
    poolIdleCeiling: number;
    acquireTimeoutMs: number;
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    directoryCacheTtlSeconds: number;
    handlerTimeoutMs: number;
  };

  seed: {
    enabled: boolean;
    companyName: string;
    adminEmail: string;
    adminPassword: string;
    superuserEmail: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    migrateOnStart: parsed.DB_MIGRATE_ON_START,
    redisUrl: parsed.REDIS_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    tokens: {
      secret: parsed.JWT_SECRET,
      accessTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
      refreshTtlSeconds: parsed.REFRESH_TOKEN_TTL_SECONDS,
      sweepIntervalMs: parsed.TOKEN_SWEEP_INTERVAL_MS,
    },

    tenancy: {
      dbDir: parsed.TENANT_DB_DIR,
      poolMax: parsed.TENANT_POOL_MAX,
      poolIdleCeiling: parsed.TENANT_POOL_IDLE_CEILING,
      acquireTimeoutMs: parsed.TENANT_POOL_ACQUIRE_TIMEOUT_MS,
      idleTimeoutMs: parsed.TENANT_POOL_IDLE_TIMEOUT_MS,
      sweepIntervalMs: parsed.TENANT_POOL_SWEEP_INTERVAL_MS,
      directoryCacheTtlSeconds: parsed.TENANT_CACHE_TTL_SECONDS,
      handlerTimeoutMs: parsed.HANDLER_TIMEOUT_MS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      companyName: parsed.SEED_COMPANY_NAME,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
      superuserEmail: parsed.SEED_SUPERUSER_EMAIL,
    },
  };
}
