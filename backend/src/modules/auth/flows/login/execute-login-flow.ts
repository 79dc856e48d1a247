/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating credential + gating checks.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit first (before any DB work), per email key and per IP.
 * - Unknown email and wrong password produce the same error.
 * - Gating (disabled user, inactive company) runs only after the password matched.
 * - The issued tokens carry the user's company as tenant; superusers without a
 *   company get tenant-less (shared database) tokens.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { AppError } from '../../../../shared/http/errors';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import type { Tenant, TenantDirectory } from '../../../tenants';
import type { TokenService } from '../../../tokens';
import { getUserWithPasswordHashByEmail, type UserRepo } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import type { AuthRequestMeta, AuthResult } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain } from '../../helpers/email-domain';
import { getLoginGatingFailure } from '../../policies/login-gating.policy';

const LOGIN_LIMIT_PER_EMAIL = { limit: 5, windowSeconds: 900 };
const LOGIN_LIMIT_PER_IP = { limit: 20, windowSeconds: 900 };

export type LoginParams = AuthRequestMeta & {
  email: string;
  password: string;
};

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    userRepo: UserRepo;
    directory: TenantDirectory;
    tokenService: TokenService;
  },
  params: LoginParams,
): Promise<AuthResult> {
  const email = params.email.toLowerCase();
  // raw emails never go into cache keys
  const emailKey = deps.tokenHasher.hash(email);
  const emailLimitKey = `login:email:${emailKey}`;

  deps.logger.info('auth.login.start', {
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
  });

  await deps.rateLimiter.hitOrThrow({ key: emailLimitKey, ...LOGIN_LIMIT_PER_EMAIL });
  await deps.rateLimiter.hitOrThrow({ key: `login:ip:${params.ip}`, ...LOGIN_LIMIT_PER_IP });

  const fail = (reason: string, error: Error, userId?: string): Error => {
    deps.logger.warn('auth.login.failed', {
      flow: 'auth.login',
      requestId: params.requestId,
      userId: userId ?? null,
      reason,
    });
    return error;
  };

  const user = await getUserWithPasswordHashByEmail(deps.db, email);
  if (!user) {
    throw fail('user_not_found', AuthErrors.invalidCredentials());
  }

  const passwordValid = await deps.passwordHasher.verify(params.password, user.passwordHash);
  if (!passwordValid) {
    throw fail('wrong_password', AuthErrors.invalidCredentials(), user.id);
  }

  const company = user.companyId ? await findCompany(deps.directory, user.companyId) : undefined;

  const gatingFailure = getLoginGatingFailure(user, company);
  if (gatingFailure) {
    throw fail(gatingFailure.reason, gatingFailure.error, user.id);
  }

  const now = new Date();
  await deps.userRepo.updateLastLogin(user.id, now);
  await deps.rateLimiter.reset(emailLimitKey);

  const tokens = await deps.tokenService.issue({
    userId: user.id,
    tenantId: company?.id ?? null,
    role: user.role,
  });

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: params.requestId,
    tenantId: company?.id ?? null,
    userId: user.id,
  });

  const { passwordHash: _passwordHash, ...safeUser } = user;

  return buildAuthResult({
    user: { ...safeUser, lastLogin: now },
    company: company ?? null,
    tokens,
  });
}

async function findCompany(
  directory: TenantDirectory,
  companyId: string,
): Promise<Tenant | undefined> {
  try {
    return await directory.lookup(companyId);
  } catch (err) {
    if (err instanceof AppError && err.code === 'NOT_FOUND') return undefined;
    throw err;
  }
}
