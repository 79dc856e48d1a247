/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case kept out of AuthService.
 * - Two shapes of registration:
 *   - companyName: creates a company (+ its database), first user becomes admin
 *   - companyId: joins an ACTIVE company as a plain user
 *
 * RULES:
 * - New company: the company record, its provisioned database and the first user
 *   commit together (TenantDirectory.register `within`). A failed user insert rolls
 *   back the company and discards the database file.
 * - Email uniqueness is checked before anything is provisioned; the DB constraint is
 *   the final word under concurrency.
 * - Tokens are issued only after the commit.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { isUniqueViolation } from '../../../../shared/db/db-errors';
import { AppError } from '../../../../shared/http/errors';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';

import type { Tenant, TenantDirectory } from '../../../tenants';
import { slugifyCompanyName } from '../../../tenants';
import type { TokenService } from '../../../tokens';
import { getUserById, getUserByEmail, type UserRepo, type UserRole } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import type { AuthRequestMeta, AuthResult } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain } from '../../helpers/email-domain';

const REGISTER_LIMIT_PER_IP = { limit: 10, windowSeconds: 3600 };

export type RegisterParams = AuthRequestMeta & {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  companyName?: string;
  companyId?: string;
};

type NewUser = {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
};

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    userRepo: UserRepo;
    directory: TenantDirectory;
    tokenService: TokenService;
  },
  params: RegisterParams,
): Promise<AuthResult> {
  const email = params.email.toLowerCase();

  deps.logger.info('auth.register.start', {
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    mode: params.companyId ? 'join' : 'create',
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${params.ip}`,
    ...REGISTER_LIMIT_PER_IP,
  });

  if (await getUserByEmail(deps.db, email)) {
    throw AuthErrors.emailTaken();
  }

  const newUser: NewUser = {
    email,
    passwordHash: await deps.passwordHasher.hash(params.password),
    firstName: params.firstName,
    lastName: params.lastName,
  };

  const { userId, company } = params.companyId
    ? await joinCompany(deps, params.companyId, newUser)
    : await createCompany(deps, params.companyName ?? '', newUser);

  const user = await getUserById(deps.db, userId);
  if (!user) {
    throw new Error('auth.register: user missing after commit');
  }

  const tokens = await deps.tokenService.issue({
    userId: user.id,
    tenantId: company.id,
    role: user.role,
  });

  deps.logger.info('auth.register.success', {
    flow: 'auth.register',
    requestId: params.requestId,
    tenantId: company.id,
    userId: user.id,
    role: user.role,
  });

  return buildAuthResult({ user, company, tokens });
}

async function joinCompany(
  deps: { db: DbExecutor; userRepo: UserRepo; directory: TenantDirectory },
  companyId: string,
  newUser: NewUser,
): Promise<{ userId: string; company: Tenant }> {
  let company: Tenant;
  try {
    company = await deps.directory.lookup(companyId);
  } catch (err) {
    if (err instanceof AppError && err.code === 'NOT_FOUND') {
      throw AuthErrors.companyUnavailable({ companyId });
    }
    throw err;
  }
  if (!company.isActive) throw AuthErrors.companyUnavailable({ companyId });

  const userId = await insertUser(deps.db, deps.userRepo, newUser, company.id, 'user');
  return { userId, company };
}

async function createCompany(
  deps: { userRepo: UserRepo; directory: TenantDirectory },
  companyName: string,
  newUser: NewUser,
): Promise<{ userId: string; company: Tenant }> {
  const slug = slugifyCompanyName(companyName);
  if (!slug) throw AuthErrors.invalidCompanyName();

  let userId = '';
  const company = await deps.directory.register(
    { name: companyName, slug },
    {
      within: async (trx, tenant) => {
        userId = await insertUser(trx, deps.userRepo, newUser, tenant.id, 'admin');
      },
    },
  );

  return { userId, company };
}

async function insertUser(
  db: DbExecutor,
  userRepo: UserRepo,
  newUser: NewUser,
  companyId: string,
  role: UserRole,
): Promise<string> {
  try {
    const { id } = await userRepo.withDb(db).insertUser({
      ...newUser,
      companyId,
      role,
      now: new Date(),
    });
    return id;
  } catch (err) {
    // lost a race with a concurrent registration of the same email
    if (isUniqueViolation(err)) throw AuthErrors.emailTaken();
    throw err;
  }
}
