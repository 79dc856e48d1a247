/**
 * backend/src/shared/tenancy/connection-pool.ts
 *
 * WHY:
 * - Process-wide registry of per-tenant pools (one TenantPool per tenant id).
 * - Tenant count is unbounded and grows at runtime, so pools are created lazily
 *   and evicted when unused.
 *
 * RULES:
 * - Pools are keyed strictly by tenant id. A handle acquired for tenant A is never
 *   returned by an acquisition for tenant B.
 * - Lazy creation is exactly-once: the creation PROMISE is stored in the map synchronously,
 *   before the first await, so concurrent first acquisitions for a brand-new tenant
 *   all share it. A failed creation is removed so the next request retries.
 * - Every acquisition gets its own lease id. release() of an unknown or already released
 *   lease is a logged no-op, so a double release can never return a connection twice.
 *
 * LIFECYCLE:
 * - Created once in app/di.ts, closed in deps.close().
 * - Background sweep (unref'd timer) evicts idle connections, then empty pools.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../logger/logger';
import type { TenantConnection, TenantConnectionFactory, TenantDb } from './tenant-connection';
import { TenantPool, type TenantPoolOptions } from './tenant-pool';
import { RoutingErrors } from './tenancy.errors';

export type ConnectionHandle = Readonly<{
  leaseId: string;
  tenantId: string;
  db: TenantDb;
}>;

export type ConnectionPoolOptions = TenantPoolOptions & {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
};

export type ConnectionPoolStats = {
  tenantPools: number;
  poolsCreated: number;
  leased: number;
  idle: number;
  waiting: number;
};

type Lease = { pool: TenantPool; conn: TenantConnection };

export class ConnectionPool {
  private readonly pools = new Map<string, Promise<TenantPool>>();
  private readonly ready = new Map<string, TenantPool>();
  private readonly leases = new Map<string, Lease>();
  private readonly now: () => number;
  private poolsCreated = 0;
  private sweepTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private readonly deps: {
      factory: TenantConnectionFactory;
      /** Tenant id -> physical database descriptor (from TenantDirectory). */
      resolveDescriptor: (tenantId: string) => Promise<string>;
      logger: Logger;
      now?: () => number;
    },
    private readonly opts: ConnectionPoolOptions,
  ) {
    this.now = deps.now ?? Date.now;

    if (opts.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.evictIdle().catch((err: unknown) => {
          this.deps.logger.error('tenant_pool.sweep_failed', { flow: 'tenant_pool', err });
        });
      }, opts.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /**
   * Fails: PoolExhausted (bound reached, timed out waiting) | TenantUnprovisioned.
   * Both are 503 and retryable.
   */
  async acquire(tenantId: string): Promise<ConnectionHandle> {
    if (this.closed) throw RoutingErrors.poolClosed({ tenantId });

    const pool = await this.getOrCreatePool(tenantId);
    const conn = await pool.acquire();

    const leaseId = randomUUID();
    this.leases.set(leaseId, { pool, conn });

    return Object.freeze({ leaseId, tenantId: pool.tenantId, db: conn.db });
  }

  release(handle: ConnectionHandle): void {
    const lease = this.leases.get(handle.leaseId);

    if (!lease) {
      this.deps.logger.warn('tenant_pool.release_unknown_lease', {
        flow: 'tenant_pool',
        tenantId: handle.tenantId,
        leaseId: handle.leaseId,
      });
      return;
    }

    this.leases.delete(handle.leaseId);
    lease.pool.release(lease.conn);
  }

  /**
   * Closes connections idle longer than idleTimeoutMs, then drops pools that have
   * nothing open and were not used within the same interval.
   */
  async evictIdle(): Promise<{ connections: number; pools: number }> {
    const cutoff = this.now() - this.opts.idleTimeoutMs;
    let connections = 0;
    const emptied: TenantPool[] = [];

    for (const [tenantId, pool] of this.ready) {
      connections += pool.evictIdle(this.opts.idleTimeoutMs);

      if (pool.isUnusedSince(cutoff)) {
        this.ready.delete(tenantId);
        this.pools.delete(tenantId);
        emptied.push(pool);
      }
    }

    await Promise.all(emptied.map((pool) => pool.close()));

    if (connections > 0 || emptied.length > 0) {
      this.deps.logger.info('tenant_pool.evicted', {
        flow: 'tenant_pool',
        connections,
        pools: emptied.length,
      });
    }

    return { connections, pools: emptied.length };
  }

  stats(): ConnectionPoolStats {
    let idle = 0;
    let waiting = 0;
    for (const pool of this.ready.values()) {
      const s = pool.stats();
      idle += s.idle;
      waiting += s.waiting;
    }

    return {
      tenantPools: this.ready.size,
      poolsCreated: this.poolsCreated,
      leased: this.leases.size,
      idle,
      waiting,
    };
  }

  async close(): Promise<void> {
    this.closed = true;

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const pools = [...this.ready.values()];
    this.ready.clear();
    this.pools.clear();

    await Promise.all(pools.map((pool) => pool.close()));

    // leased connections are no longer returned to a pool: close them directly
    const leased = [...this.leases.values()];
    this.leases.clear();
    await Promise.all(leased.map((lease) => lease.conn.close()));
  }

  private getOrCreatePool(tenantId: string): Promise<TenantPool> {
    const existing = this.pools.get(tenantId);
    if (existing) return existing;

    const created = this.createPool(tenantId);
    this.pools.set(tenantId, created);
    return created;
  }

  private async createPool(tenantId: string): Promise<TenantPool> {
    try {
      const descriptor = await this.deps.resolveDescriptor(tenantId);
      await this.deps.factory.ensureProvisioned(tenantId, descriptor);
      if (this.closed) throw RoutingErrors.poolClosed({ tenantId });

      const pool = new TenantPool(
        tenantId,
        descriptor,
        { factory: this.deps.factory, logger: this.deps.logger, now: this.now },
        {
          max: this.opts.max,
          idleCeiling: this.opts.idleCeiling,
          acquireTimeoutMs: this.opts.acquireTimeoutMs,
        },
      );

      this.ready.set(tenantId, pool);
      this.poolsCreated++;

      this.deps.logger.info('tenant_pool.created', {
        flow: 'tenant_pool',
        tenantId,
        max: this.opts.max,
      });

      return pool;
    } catch (err) {
      this.pools.delete(tenantId);
      this.deps.logger.warn('tenant_pool.create_failed', { flow: 'tenant_pool', tenantId, err });
      throw err;
    }
  }
}
