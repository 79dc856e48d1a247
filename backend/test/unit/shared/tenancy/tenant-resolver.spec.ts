import { sql } from 'kysely';
import { describe, it, expect, vi } from 'vitest';

import type { Tenant } from '../../../../src/modules/tenants';
import { TenantErrors } from '../../../../src/modules/tenants';
import type { TokenClaims } from '../../../../src/modules/tokens';
import { TokenErrors } from '../../../../src/modules/tokens';
import type { TenantDatabase } from '../../../../src/shared/db/tenant-db.types';
import { logger } from '../../../../src/shared/logger/logger';
import type { ConnectionHandle } from '../../../../src/shared/tenancy/connection-pool';
import {
  TenantResolver,
  parseBearerToken,
} from '../../../../src/shared/tenancy/tenant-resolver';
import { coldDb, coldSharedDb } from '../../../helpers/tenancy-fakes';

const NOW = new Date('2030-01-01T00:00:00.000Z');

function tenant(id: string, isActive = true): Tenant {
  return {
    id,
    name: `Company ${id}`,
    slug: id,
    dbDescriptor: `/data/${id}_db.sqlite3`,
    isActive,
    createdAt: NOW,
    updatedAt: NOW,
  };
}

function claims(overrides: Partial<TokenClaims>): TokenClaims {
  return {
    userId: 'u1',
    tenantId: 'acme',
    role: 'user',
    type: 'access',
    jti: 'jti-1',
    issuedAt: 0,
    expiresAt: 1,
    ...overrides,
  };
}

function setup(opts: { tokens: Record<string, TokenClaims>; tenants: Tenant[] }) {
  const sharedDb = coldSharedDb();

  const tokens = {
    verify: vi.fn(async (token: string) => {
      const found = opts.tokens[token];
      if (!found) throw TokenErrors.invalid();
      return found;
    }),
  };

  const directory = {
    lookup: vi.fn(async (tenantId: string) => {
      const found = opts.tenants.find((t) => t.id === tenantId);
      if (!found) throw TenantErrors.tenantNotFound({ tenantId });
      return found;
    }),
  };

  const pool = {
    acquire: vi.fn(
      async (tenantId: string): Promise<ConnectionHandle> => ({
        leaseId: `lease-${tenantId}`,
        tenantId,
        db: coldDb<TenantDatabase>(),
      }),
    ),
    release: vi.fn((_handle: ConnectionHandle) => undefined),
  };

  const resolver = new TenantResolver({ tokens, directory, pool, sharedDb, logger });
  return { resolver, tokens, directory, pool, sharedDb };
}

describe('parseBearerToken', () => {
  it('extracts the token from a bearer header', () => {
    expect(parseBearerToken('Bearer abc.def')).toBe('abc.def');
    expect(parseBearerToken('bearer   abc')).toBe('abc');
  });

  it('returns null for anything else', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('Basic abc')).toBeNull();
    expect(parseBearerToken('Bearer')).toBeNull();
    expect(parseBearerToken('Bearer a b')).toBeNull();
  });
});

describe('TenantResolver', () => {
  it('binds a connection of the tenant named in the token', async () => {
    const { resolver, pool } = setup({
      tokens: { t: claims({ tenantId: 'acme', role: 'manager' }) },
      tenants: [tenant('acme'), tenant('globex')],
    });

    const { context, release } = await resolver.resolve({
      requestId: 'req-1',
      authorization: 'Bearer t',
    });

    expect(context.target).toEqual({ kind: 'tenant', tenantId: 'acme', tenantSlug: 'acme' });
    expect(context.identity).toEqual({ userId: 'u1', role: 'manager' });
    expect(context.handle?.tenantId).toBe('acme');
    await expect(context.data.tenant().selectFrom('products').selectAll().execute()).resolves.toEqual(
      [],
    );
    expect(Object.isFrozen(context)).toBe(true);
    expect(pool.acquire).toHaveBeenCalledWith('acme');

    release();
  });

  it('releases exactly once and revokes data access', async () => {
    const { resolver, pool } = setup({
      tokens: { t: claims({}) },
      tenants: [tenant('acme')],
    });

    const { context, release } = await resolver.resolve({
      requestId: 'req-1',
      authorization: 'Bearer t',
    });

    release();
    release();

    expect(pool.release).toHaveBeenCalledTimes(1);
    expect(context.data.isRevoked).toBe(true);
    expect(() => context.data.tenant()).toThrow(
      'Data access used after request routing was released.',
    );
  });

  it('rejects queries from a db captured before release', async () => {
    const { resolver } = setup({
      tokens: { t: claims({}) },
      tenants: [tenant('acme')],
    });

    const { context, release } = await resolver.resolve({
      requestId: 'req-1',
      authorization: 'Bearer t',
    });
    const db = context.data.tenant();
    const shared = context.data.shared();

    release();

    await expect(db.selectFrom('products').selectAll().execute()).rejects.toThrow(
      'Data access used after request routing was released.',
    );
    await expect(
      db.updateTable('products').set({ name: 'late' }).where('id', '=', 'p1').execute(),
    ).rejects.toMatchObject({ status: 500, meta: { tenantId: 'acme' } });
    await expect(shared.selectFrom('companies').selectAll().execute()).rejects.toThrow(
      'Data access used after request routing was released.',
    );
    await expect(sql`begin immediate`.execute(db)).rejects.toThrow(
      'Data access used after request routing was released.',
    );
    // an abandoned write transaction can still roll back
    await expect(sql`rollback`.execute(db)).resolves.toMatchObject({ rows: [] });
  });

  it('routes a token without a tenant to the shared database', async () => {
    const { resolver, pool } = setup({
      tokens: { t: claims({ tenantId: null, role: 'admin' }) },
      tenants: [],
    });

    const { context, release } = await resolver.resolve({
      requestId: 'req-1',
      authorization: 'Bearer t',
    });

    expect(context.target).toEqual({ kind: 'shared' });
    expect(context.handle).toBeNull();
    await expect(context.data.shared().selectFrom('companies').selectAll().execute()).resolves.toEqual(
      [],
    );
    expect(() => context.data.tenant()).toThrow('No tenant database is bound to this request.');
    expect(pool.acquire).not.toHaveBeenCalled();

    release();
    expect(pool.release).not.toHaveBeenCalled();
  });

  it('rejects a missing header without touching the directory or pool', async () => {
    const { resolver, directory, pool } = setup({ tokens: {}, tenants: [] });

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: undefined }),
    ).rejects.toMatchObject({ status: 401, meta: { reason: 'unauthenticated' } });

    expect(directory.lookup).not.toHaveBeenCalled();
    expect(pool.acquire).not.toHaveBeenCalled();
  });

  it('rejects a refresh token used as a bearer token', async () => {
    const { resolver, pool } = setup({
      tokens: { r: claims({ type: 'refresh' }) },
      tenants: [tenant('acme')],
    });

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: 'Bearer r' }),
    ).rejects.toMatchObject({ status: 401, meta: { cause: 'wrong_token_type' } });
    expect(pool.acquire).not.toHaveBeenCalled();
  });

  it('propagates token verification failures', async () => {
    const { resolver } = setup({ tokens: {}, tenants: [tenant('acme')] });

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: 'Bearer unknown' }),
    ).rejects.toMatchObject({ status: 401, meta: { reason: 'invalid' } });
  });

  it('folds an inactive tenant into 401 without acquiring a connection', async () => {
    const { resolver, pool } = setup({
      tokens: { t: claims({ tenantId: 'acme' }) },
      tenants: [tenant('acme', false)],
    });

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: 'Bearer t' }),
    ).rejects.toMatchObject({
      status: 401,
      message: 'Authentication required.',
      meta: { reason: 'tenant_unknown_or_inactive', cause: 'inactive' },
    });
    expect(pool.acquire).not.toHaveBeenCalled();
  });

  it('folds an unknown tenant into the same 401', async () => {
    const { resolver } = setup({
      tokens: { t: claims({ tenantId: 'ghost' }) },
      tenants: [tenant('acme')],
    });

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: 'Bearer t' }),
    ).rejects.toMatchObject({
      status: 401,
      message: 'Authentication required.',
      meta: { reason: 'tenant_unknown_or_inactive', cause: 'unknown' },
    });
  });

  it('checks the directory on every request', async () => {
    const { resolver, directory } = setup({
      tokens: { t: claims({ tenantId: 'acme' }) },
      tenants: [tenant('acme')],
    });

    (await resolver.resolve({ requestId: 'a', authorization: 'Bearer t' })).release();
    (await resolver.resolve({ requestId: 'b', authorization: 'Bearer t' })).release();

    expect(directory.lookup).toHaveBeenCalledTimes(2);
  });

  it('propagates a pool failure with nothing left to release', async () => {
    const { resolver, pool } = setup({
      tokens: { t: claims({ tenantId: 'acme' }) },
      tenants: [tenant('acme')],
    });
    pool.acquire.mockRejectedValueOnce(new Error('pool down'));

    await expect(
      resolver.resolve({ requestId: 'req-1', authorization: 'Bearer t' }),
    ).rejects.toThrow('pool down');
    expect(pool.release).not.toHaveBeenCalled();
  });
});
