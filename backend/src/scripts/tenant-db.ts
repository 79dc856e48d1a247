/**
 * backend/src/scripts/tenant-db.ts
 *
 * WHY:
 * - Operator tooling for tenant databases.
 *
 * HOW TO USE:
 * - npm run tenant-db --workspace backend -- list
 * - npm run tenant-db --workspace backend -- provision --slug acme
 *
 * RULES:
 * - `provision` only recreates a MISSING database for an existing company (empty schema).
 *   An existing file is never touched.
 * - New companies are created through registration, not here.
 */

import path from 'node:path';
import { parseArgs } from 'node:util';

import { buildConfig } from '../app/config';
import { createDb } from '../shared/db/db';
import { logger } from '../shared/logger/logger';
import { SqliteTenantProvisioner } from '../shared/tenancy/tenant-provisioner';
import { TenantDirectory } from '../modules/tenants';

const USAGE = 'usage: tenant-db <list | provision --slug <slug>>';

async function run(): Promise<void> {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: { slug: { type: 'string', short: 's' } },
  });

  const command = positionals[0];
  const config = buildConfig();
  const db = createDb(config.databaseUrl);
  const provisioner = new SqliteTenantProvisioner(config.tenancy.dbDir);
  const directory = new TenantDirectory(
    { db, provisioner, logger },
    { cacheTtlSeconds: 0 },
  );

  try {
    if (command === 'list') {
      for (const tenant of await directory.listAll()) {
        logger.info('tenant_db.entry', {
          flow: 'tenant_db.list',
          tenantId: tenant.id,
          slug: tenant.slug,
          active: tenant.isActive,
          file: path.basename(tenant.dbDescriptor),
          provisioned: await provisioner.exists(tenant.dbDescriptor),
        });
      }
      return;
    }

    if (command === 'provision' && values.slug) {
      const tenant = await directory.lookupBySlug(values.slug);

      if (await provisioner.exists(tenant.dbDescriptor)) {
        logger.info('tenant_db.already_provisioned', {
          flow: 'tenant_db.provision',
          slug: tenant.slug,
        });
        return;
      }

      await provisioner.provision(tenant.dbDescriptor);
      logger.info('tenant_db.provisioned', { flow: 'tenant_db.provision', slug: tenant.slug });
      return;
    }

    throw new Error(USAGE);
  } finally {
    await db.destroy();
  }
}

run().catch((err: unknown) => {
  logger.error('tenant_db.failed', { flow: 'tenant_db', err });
  process.exit(1);
});
