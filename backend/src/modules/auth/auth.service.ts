/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates registration, login, token refresh/logout, profile and password change.
 * - register/login are delegated to flows; the short use-cases stay inline.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of each public flow (before any DB work).
 * - Routed use-cases (logout, profile, password) receive the RoutingContext and read
 *   the shared database ONLY through ctx.data.shared().
 */

import type { DbExecutor } from '../../shared/db/db';
import { AppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { RoutingContext } from '../../shared/tenancy/routing-context';
import { RoutingErrors } from '../../shared/tenancy/tenancy.errors';

import type { Tenant, TenantDirectory } from '../tenants';
import { TokenErrors, type TokenService } from '../tokens';
import {
  getUserById,
  getUserWithPasswordHashById,
  type User,
  type UserRepo,
} from '../users';

import { AuthErrors } from './auth.errors';
import type { AuthRequestMeta, AuthResult, RefreshResult, UserView } from './auth.types';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { toUserView } from './helpers/build-auth-result';

const REFRESH_LIMIT_PER_IP = { limit: 30, windowSeconds: 900 };

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      tokenHasher: TokenHasher;
      passwordHasher: PasswordHasher;
      logger: Logger;
      rateLimiter: RateLimiter;
      userRepo: UserRepo;
      directory: TenantDirectory;
      tokenService: TokenService;
    },
  ) {}

  async register(params: RegisterParams): Promise<AuthResult> {
    return executeRegisterFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<AuthResult> {
    return executeLoginFlow(this.deps, params);
  }

  /**
   * Refresh token -> new access token.
   * The company is re-checked here: a deactivated tenant cannot mint new access tokens
   * even with a still-valid refresh token.
   */
  async refresh(params: AuthRequestMeta & { refresh: string }): Promise<RefreshResult> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `refresh:ip:${params.ip}`,
      ...REFRESH_LIMIT_PER_IP,
    });

    const claims = await this.deps.tokenService.verify(params.refresh);
    if (claims.type !== 'refresh') {
      throw TokenErrors.invalid({ cause: 'wrong_token_type' });
    }

    const user = await getUserById(this.deps.db, claims.userId);
    if (!user || !user.isActive) {
      throw TokenErrors.invalid({ cause: 'user_unavailable', userId: claims.userId });
    }

    if (claims.tenantId !== null) {
      await this.assertTenantActive(claims.tenantId);
    }

    const refreshed = await this.deps.tokenService.refresh(params.refresh);

    this.deps.logger.info('auth.refresh.success', {
      flow: 'auth.refresh',
      requestId: params.requestId,
      userId: claims.userId,
      tenantId: claims.tenantId,
    });

    return {
      access: refreshed.accessToken,
      accessExpiresAt: refreshed.accessExpiresAt.toISOString(),
    };
  }

  /** Blacklists the caller's refresh token. A token issued to someone else is rejected. */
  async logout(ctx: RoutingContext, params: { refresh: string }): Promise<void> {
    await this.deps.tokenService.revoke(params.refresh, { ownerId: ctx.identity.userId });

    this.deps.logger.info('auth.logout.success', {
      flow: 'auth.logout',
      requestId: ctx.requestId,
      userId: ctx.identity.userId,
    });
  }

  async getProfile(ctx: RoutingContext): Promise<UserView> {
    const user = await this.requireUser(ctx);
    return toUserView(user, await this.companyOf(user));
  }

  async updateProfile(
    ctx: RoutingContext,
    patch: { firstName?: string; lastName?: string },
  ): Promise<UserView> {
    const user = await this.requireUser(ctx);

    await this.deps.userRepo.withDb(ctx.data.shared()).updateProfile(user.id, patch);

    const updated = await this.requireUser(ctx);
    return toUserView(updated, await this.companyOf(updated));
  }

  async changePassword(
    ctx: RoutingContext,
    params: { oldPassword: string; newPassword: string },
  ): Promise<void> {
    const user = await getUserWithPasswordHashById(ctx.data.shared(), ctx.identity.userId);
    if (!user || !user.isActive) {
      throw AuthErrors.userUnavailable({ userId: ctx.identity.userId });
    }

    const ok = await this.deps.passwordHasher.verify(params.oldPassword, user.passwordHash);
    if (!ok) throw AuthErrors.wrongOldPassword();

    const passwordHash = await this.deps.passwordHasher.hash(params.newPassword);
    await this.deps.userRepo.withDb(ctx.data.shared()).updatePasswordHash(user.id, passwordHash);

    this.deps.logger.info('auth.password_changed', {
      flow: 'auth.password.change',
      requestId: ctx.requestId,
      userId: user.id,
    });
  }

  private async requireUser(ctx: RoutingContext): Promise<User> {
    const user = await getUserById(ctx.data.shared(), ctx.identity.userId);
    if (!user || !user.isActive) {
      throw AuthErrors.userUnavailable({ userId: ctx.identity.userId });
    }
    return user;
  }

  private async companyOf(user: User): Promise<Tenant | null> {
    if (!user.companyId) return null;

    try {
      return await this.deps.directory.lookup(user.companyId);
    } catch (err) {
      if (err instanceof AppError && err.code === 'NOT_FOUND') return null;
      throw err;
    }
  }

  private async assertTenantActive(tenantId: string): Promise<void> {
    let tenant: Tenant;
    try {
      tenant = await this.deps.directory.lookup(tenantId);
    } catch (err) {
      if (err instanceof AppError && err.code === 'NOT_FOUND') {
        throw RoutingErrors.unknownOrInactiveTenant({ tenantId, cause: 'unknown' });
      }
      throw err;
    }

    if (!tenant.isActive) {
      throw RoutingErrors.unknownOrInactiveTenant({ tenantId, cause: 'inactive' });
    }
  }
}
