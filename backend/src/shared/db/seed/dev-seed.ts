/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a demo company with its own provisioned database and an admin user (if missing)
 * - a platform superuser without a company (if missing): routes to the shared database
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Passwords come from config and are stored hashed only. Never logged.
 */

import { AppError } from '../../http/errors';
import { logger } from '../../logger/logger';
import type { PasswordHasher } from '../../security/password-hasher';
import type { DbExecutor } from '../db';

import { slugifyCompanyName, type Tenant, type TenantDirectory } from '../../../modules/tenants';
import { getUserByEmail, type UserRepo } from '../../../modules/users';

type DevSeedOptions = {
  companyName: string;
  adminEmail: string;
  adminPassword: string;
  superuserEmail: string;
};

async function findCompanyBySlug(
  directory: TenantDirectory,
  slug: string,
): Promise<Tenant | undefined> {
  try {
    return await directory.lookupBySlug(slug);
  } catch (err) {
    if (err instanceof AppError && err.code === 'NOT_FOUND') return undefined;
    throw err;
  }
}

export async function runDevSeed(opts: {
  db: DbExecutor;
  directory: TenantDirectory;
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<void> {
  const { db, directory, userRepo, passwordHasher, options } = opts;

  const flow = 'seed.dev';
  const slug = slugifyCompanyName(options.companyName);
  const passwordHash = await passwordHasher.hash(options.adminPassword);

  // 1) Ensure company + its admin exist
  const existingCompany = await findCompanyBySlug(directory, slug);

  if (existingCompany) {
    logger.info('seed.company.exists', { flow, companyId: existingCompany.id, slug });
  } else if (await getUserByEmail(db, options.adminEmail)) {
    // admin email already belongs to someone else: do not create an orphan company
    logger.warn('seed.company.skipped_email_taken', { flow, slug });
  } else {
    const company = await directory.register(
      { name: options.companyName, slug },
      {
        within: async (trx, tenant) => {
          await userRepo.withDb(trx).insertUser({
            email: options.adminEmail,
            passwordHash,
            firstName: 'Demo',
            lastName: 'Admin',
            companyId: tenant.id,
            role: 'admin',
            now: new Date(),
          });
        },
      },
    );

    logger.info('seed.company.created', {
      flow,
      companyId: company.id,
      slug,
      adminEmail: options.adminEmail,
    });
  }

  // 2) Ensure the platform superuser exists
  const existingSuperuser = await getUserByEmail(db, options.superuserEmail);
  if (existingSuperuser) {
    logger.info('seed.superuser.exists', { flow, userId: existingSuperuser.id });
    return;
  }

  const created = await userRepo.insertUser({
    email: options.superuserEmail,
    passwordHash,
    firstName: 'Platform',
    lastName: 'Admin',
    companyId: null,
    role: 'admin',
    isSuperuser: true,
    now: new Date(),
  });

  logger.info('seed.superuser.created', { flow, userId: created.id, email: created.email });
}
