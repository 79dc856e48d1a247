import { describe, it, expect, vi, afterEach } from 'vitest';

import { logger } from '../../../../src/shared/logger/logger';
import {
  ConnectionPool,
  type ConnectionPoolOptions,
} from '../../../../src/shared/tenancy/connection-pool';
import { FakeConnectionFactory } from '../../../helpers/tenancy-fakes';

const BASE_OPTIONS: ConnectionPoolOptions = {
  max: 5,
  idleCeiling: 2,
  acquireTimeoutMs: 1000,
  idleTimeoutMs: 100,
  sweepIntervalMs: 0,
};

describe('ConnectionPool', () => {
  let pool: ConnectionPool | undefined;

  afterEach(async () => {
    await pool?.close();
    pool = undefined;
  });

  function build(opts: Partial<ConnectionPoolOptions> = {}, now?: () => number) {
    const factory = new FakeConnectionFactory();
    const resolveDescriptor = vi.fn(async (tenantId: string) => `/data/${tenantId}_db.sqlite3`);
    const created = new ConnectionPool(
      { factory, resolveDescriptor, logger, now },
      { ...BASE_OPTIONS, ...opts },
    );
    pool = created;
    return { pool: created, factory, resolveDescriptor };
  }

  it('creates exactly one tenant pool under concurrent first acquisition', async () => {
    const { pool, factory, resolveDescriptor } = build({ max: 50 });

    const handles = await Promise.all(Array.from({ length: 20 }, () => pool.acquire('t1')));

    expect(handles.every((h) => h.tenantId === 't1')).toBe(true);
    expect(resolveDescriptor).toHaveBeenCalledTimes(1);
    expect(factory.ensureCalls).toBe(1);
    expect(pool.stats()).toMatchObject({ tenantPools: 1, poolsCreated: 1, leased: 20 });
  });

  it('keeps tenants apart: each handle carries its own tenant and connection', async () => {
    const { pool } = build();

    const a = await pool.acquire('tenant-a');
    const b = await pool.acquire('tenant-b');

    expect(a.tenantId).toBe('tenant-a');
    expect(b.tenantId).toBe('tenant-b');
    expect(a.db).not.toBe(b.db);
    expect(pool.stats().tenantPools).toBe(2);
  });

  it('reuses a released connection', async () => {
    const { pool, factory } = build();

    const first = await pool.acquire('t1');
    pool.release(first);
    const second = await pool.acquire('t1');

    expect(second.db).toBe(first.db);
    expect(second.leaseId).not.toBe(first.leaseId);
    expect(factory.opened).toHaveLength(1);
  });

  it('ignores a second release of the same handle', async () => {
    const { pool } = build();

    const handle = await pool.acquire('t1');
    pool.release(handle);
    pool.release(handle);

    expect(pool.stats()).toMatchObject({ leased: 0, idle: 1 });
  });

  it('hands a released connection to the next waiter once the bound is reached', async () => {
    const { pool, factory } = build({ max: 1 });

    const first = await pool.acquire('t1');
    const waiting = pool.acquire('t1');
    await new Promise((resolve) => setImmediate(resolve));
    expect(pool.stats().waiting).toBe(1);

    pool.release(first);
    const second = await waiting;

    expect(second.db).toBe(first.db);
    expect(factory.opened).toHaveLength(1);
  });

  it('fails with a retryable 503 when the bound stays exhausted', async () => {
    const { pool } = build({ max: 1, acquireTimeoutMs: 20 });

    await pool.acquire('t1');

    await expect(pool.acquire('t1')).rejects.toMatchObject({
      status: 503,
      code: 'SERVICE_UNAVAILABLE',
      meta: { reason: 'pool_exhausted', retryAfterSeconds: 1 },
    });
    expect(pool.stats().waiting).toBe(0);
  });

  it('rejects an unprovisioned tenant and retries creation on the next acquire', async () => {
    const { pool, factory } = build();
    factory.missing.add('t1');

    await expect(pool.acquire('t1')).rejects.toMatchObject({
      status: 503,
      meta: { reason: 'tenant_unprovisioned' },
    });
    expect(pool.stats().tenantPools).toBe(0);

    factory.missing.delete('t1');
    const handle = await pool.acquire('t1');

    expect(handle.tenantId).toBe('t1');
    expect(factory.ensureCalls).toBe(2);
  });

  it('replaces an idle connection that was dropped', async () => {
    const { pool, factory } = build();

    const handle = await pool.acquire('t1');
    pool.release(handle);
    const dropped = factory.opened[0];
    if (dropped) dropped.open = false;

    const next = await pool.acquire('t1');

    expect(factory.opened).toHaveLength(2);
    expect(next.db).toBe(factory.opened[1]?.db);
  });

  it('closes connections above the idle ceiling', async () => {
    const { pool, factory } = build({ idleCeiling: 1 });

    const handles = await Promise.all([pool.acquire('t1'), pool.acquire('t1'), pool.acquire('t1')]);
    handles.forEach((h) => pool.release(h));

    expect(pool.stats().idle).toBe(1);
    expect(factory.opened.filter((c) => !c.open)).toHaveLength(2);
  });

  it('evicts idle connections and then the unused tenant pool', async () => {
    let now = 1_000;
    const { pool, factory } = build({ idleTimeoutMs: 100 }, () => now);

    pool.release(await pool.acquire('t1'));

    now = 1_050;
    expect(await pool.evictIdle()).toEqual({ connections: 0, pools: 0 });

    now = 1_200;
    expect(await pool.evictIdle()).toEqual({ connections: 1, pools: 1 });
    expect(factory.opened[0]?.open).toBe(false);
    expect(pool.stats().tenantPools).toBe(0);
  });

  it('refuses new acquisitions after close and closes leased connections', async () => {
    const { pool, factory } = build();

    await pool.acquire('t1');
    await pool.close();

    expect(factory.opened[0]?.open).toBe(false);
    await expect(pool.acquire('t1')).rejects.toMatchObject({
      status: 503,
      meta: { reason: 'pool_closed' },
    });
  });
});
