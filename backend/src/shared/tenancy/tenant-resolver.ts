/**
 * backend/src/shared/tenancy/tenant-resolver.ts
 *
 * WHY:
 * - Turns "a request with a bearer token" into a bound RoutingContext.
 * - The tenant comes ONLY from the verified token claims. Host, path, query and body
 *   never take part in choosing a database.
 *
 * STATE MACHINE (per request):
 *   UNAUTHENTICATED -> TOKEN_VERIFIED -> TENANT_RESOLVED -> CONNECTION_BOUND
 *   any failure -> REJECTED (error thrown, nothing left acquired)
 *
 * RULES:
 * - Only `access` tokens are accepted here.
 * - The tenant record is looked up on EVERY request (directory cache-backed), so a
 *   deactivation is honored on the very next request, not at token expiry.
 * - Unknown or inactive tenant is folded into 401 (see RoutingErrors).
 * - A token without a tenant claim routes to the shared database (no pool involved).
 * - release() is idempotent: revokes the data capability, then returns the handle once.
 */

import type { DbExecutor } from '../db/db';
import { AppError } from '../http/errors';
import type { Logger } from '../logger/logger';
import type { TokenClaims } from '../../modules/tokens/token.types';
import type { Tenant } from '../../modules/tenants/tenant.types';
import type { ConnectionHandle } from './connection-pool';
import { RoutedDataAccess } from './routed-data-access';
import type {
  ResolutionState,
  RoutingContext,
  RoutingIdentity,
  RoutingTarget,
} from './routing-context';
import { RoutingErrors } from './tenancy.errors';

export interface AccessTokenVerifier {
  verify(token: string): Promise<TokenClaims>;
}

export interface TenantLookup {
  /** Fails with a NOT_FOUND AppError for an unknown tenant id. */
  lookup(tenantId: string): Promise<Tenant>;
}

export interface ConnectionLeaser {
  acquire(tenantId: string): Promise<ConnectionHandle>;
  release(handle: ConnectionHandle): void;
}

export type ResolvedRequest = {
  context: RoutingContext;
  release: () => void;
};

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export class TenantResolver {
  constructor(
    private readonly deps: {
      tokens: AccessTokenVerifier;
      directory: TenantLookup;
      pool: ConnectionLeaser;
      sharedDb: DbExecutor;
      logger: Logger;
    },
  ) {}

  async resolve(input: {
    requestId: string;
    authorization: string | undefined;
  }): Promise<ResolvedRequest> {
    let state: ResolutionState = 'UNAUTHENTICATED';

    try {
      const claims = await this.verifyAccessToken(input.authorization);
      state = 'TOKEN_VERIFIED';

      const identity: RoutingIdentity = Object.freeze({
        userId: claims.userId,
        role: claims.role,
      });

      if (claims.tenantId === null) {
        state = 'CONNECTION_BOUND';
        return this.bind(input.requestId, identity, Object.freeze({ kind: 'shared' }), null);
      }

      const tenant = await this.lookupActiveTenant(claims.tenantId);
      state = 'TENANT_RESOLVED';

      const handle = await this.deps.pool.acquire(tenant.id);
      state = 'CONNECTION_BOUND';

      return this.bind(
        input.requestId,
        identity,
        Object.freeze({ kind: 'tenant', tenantId: tenant.id, tenantSlug: tenant.slug }),
        handle,
      );
    } catch (err) {
      this.deps.logger.debug('tenant_resolver.rejected', {
        flow: 'tenant_resolver',
        requestId: input.requestId,
        failedAfter: state,
        code: err instanceof AppError ? err.code : 'INTERNAL',
      });
      throw err;
    }
  }

  private async verifyAccessToken(authorization: string | undefined): Promise<TokenClaims> {
    const token = parseBearerToken(authorization);
    if (!token) throw RoutingErrors.unauthenticated({ cause: 'missing_bearer_token' });

    const claims = await this.deps.tokens.verify(token);
    if (claims.type !== 'access') {
      throw RoutingErrors.unauthenticated({ cause: 'wrong_token_type' });
    }

    return claims;
  }

  private async lookupActiveTenant(tenantId: string): Promise<Tenant> {
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

    return tenant;
  }

  private bind(
    requestId: string,
    identity: RoutingIdentity,
    target: RoutingTarget,
    handle: ConnectionHandle | null,
  ): ResolvedRequest {
    const data = new RoutedDataAccess(this.deps.sharedDb, handle);
    const context: RoutingContext = Object.freeze({ requestId, identity, target, handle, data });

    let released = false;
    const release = () => {
      if (released) return;
      released = true;

      data.revoke();
      if (handle) this.deps.pool.release(handle);
    };

    return { context, release };
  }
}
