/**
 * backend/src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Encapsulates Tenants module wiring.
 * - The directory is a process-wide singleton: TenantResolver, ConnectionPool and
 *   auth all use the instance created here.
 *
 * RULES:
 * - No infra creation here (DI passes deps in, including the provisioner).
 */

import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import type { TenantRouter } from '../../shared/http/tenant-router';
import type { Logger } from '../../shared/logger/logger';
import type { TenantProvisioner } from '../../shared/tenancy/tenant-provisioner';

import { TenantController } from './tenant.controller';
import { TenantDirectory, type TenantDirectoryOptions } from './tenant-directory';
import { registerTenantRoutes } from './tenant.routes';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: {
  db: DbExecutor;
  provisioner: TenantProvisioner;
  logger: Logger;
  options: TenantDirectoryOptions;
}) {
  const directory = new TenantDirectory(
    { db: deps.db, provisioner: deps.provisioner, logger: deps.logger },
    deps.options,
  );

  const controller = new TenantController(directory);

  return {
    directory,
    registerRoutes(app: FastifyInstance, router: TenantRouter) {
      registerTenantRoutes(app, router, controller);
    },
  };
}
