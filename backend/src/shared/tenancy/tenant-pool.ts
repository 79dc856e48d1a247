/**
 * backend/src/shared/tenancy/tenant-pool.ts
 *
 * WHY:
 * - Bounded set of reusable connections to ONE tenant database.
 * - ConnectionPool owns one TenantPool per tenant id; nothing else creates these.
 *
 * RULES:
 * - At most `max` connections are leased or being opened at any time.
 * - Beyond the bound, acquire() waits FIFO up to `acquireTimeoutMs`, then fails PoolExhausted.
 * - release() hands the connection to the next waiter, or parks it idle, and only closes it
 *   when the idle list is already at `idleCeiling`.
 * - A dropped connection (isOpen() === false) is discarded and replaced transparently.
 *
 * CONCURRENCY:
 * - All counters are mutated synchronously between awaits (single event loop).
 *   `opening` counts connections being opened so two concurrent acquires cannot both
 *   pass the capacity check for the last slot.
 */

import type { Logger } from '../logger/logger';
import type { TenantConnection, TenantConnectionFactory } from './tenant-connection';
import { RoutingErrors } from './tenancy.errors';

export type TenantPoolOptions = {
  max: number;
  idleCeiling: number;
  acquireTimeoutMs: number;
};

export type TenantPoolStats = {
  tenantId: string;
  inUse: number;
  idle: number;
  opening: number;
  waiting: number;
};

type IdleEntry = { conn: TenantConnection; idleSince: number };

type Waiter = {
  resolve: (conn: TenantConnection) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class TenantPool {
  private readonly idle: IdleEntry[] = [];
  private readonly waiters: Waiter[] = [];
  private inUse = 0;
  private opening = 0;
  private closed = false;
  private lastUsedAt: number;

  constructor(
    readonly tenantId: string,
    private readonly descriptor: string,
    private readonly deps: {
      factory: TenantConnectionFactory;
      logger: Logger;
      now: () => number;
    },
    private readonly opts: TenantPoolOptions,
  ) {
    this.lastUsedAt = deps.now();
  }

  async acquire(): Promise<TenantConnection> {
    if (this.closed) throw RoutingErrors.poolClosed({ tenantId: this.tenantId });
    this.lastUsedAt = this.deps.now();

    const reused = this.takeIdle();
    if (reused) {
      this.inUse++;
      return reused;
    }

    if (this.hasCapacity()) {
      return this.openConnection();
    }

    return this.waitForConnection();
  }

  release(conn: TenantConnection): void {
    this.inUse = Math.max(0, this.inUse - 1);
    this.lastUsedAt = this.deps.now();

    if (this.closed || !conn.isOpen()) {
      this.closeQuietly(conn);
      this.serveWaiters();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.inUse++;
      waiter.resolve(conn);
      return;
    }

    if (this.idle.length >= this.opts.idleCeiling) {
      this.deps.logger.debug('tenant_pool.closed_above_idle_ceiling', {
        flow: 'tenant_pool',
        tenantId: this.tenantId,
        idleCeiling: this.opts.idleCeiling,
      });
      this.closeQuietly(conn);
      return;
    }

    this.idle.push({ conn, idleSince: this.deps.now() });
  }

  /** Closes idle connections parked for at least `idleTimeoutMs`. Returns how many. */
  evictIdle(idleTimeoutMs: number): number {
    const cutoff = this.deps.now() - idleTimeoutMs;
    let evicted = 0;

    for (let i = this.idle.length - 1; i >= 0; i--) {
      const entry = this.idle[i];
      if (entry && entry.idleSince <= cutoff) {
        this.idle.splice(i, 1);
        this.closeQuietly(entry.conn);
        evicted++;
      }
    }

    return evicted;
  }

  /** True when nothing is open, leased, opening or waiting, and the pool was last used before `cutoff`. */
  isUnusedSince(cutoff: number): boolean {
    return (
      this.inUse === 0 &&
      this.opening === 0 &&
      this.waiters.length === 0 &&
      this.idle.length === 0 &&
      this.lastUsedAt <= cutoff
    );
  }

  stats(): TenantPoolStats {
    return {
      tenantId: this.tenantId,
      inUse: this.inUse,
      idle: this.idle.length,
      opening: this.opening,
      waiting: this.waiters.length,
    };
  }

  /**
   * Rejects waiters and closes idle connections.
   * Leased connections are closed when they come back through release().
   */
  async close(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(RoutingErrors.poolClosed({ tenantId: this.tenantId }));
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map((entry) => entry.conn.close()));
  }

  private hasCapacity(): boolean {
    return this.inUse + this.opening < this.opts.max;
  }

  private takeIdle(): TenantConnection | null {
    let entry = this.idle.pop();

    while (entry) {
      if (entry.conn.isOpen()) return entry.conn;

      this.deps.logger.warn('tenant_pool.connection_dropped', {
        flow: 'tenant_pool',
        tenantId: this.tenantId,
      });
      this.closeQuietly(entry.conn);
      entry = this.idle.pop();
    }

    return null;
  }

  private async openConnection(): Promise<TenantConnection> {
    this.opening++;

    let conn: TenantConnection;
    try {
      conn = await this.deps.factory.open(this.tenantId, this.descriptor);
    } catch (err) {
      this.opening--;
      this.deps.logger.error('tenant_pool.open_failed', {
        flow: 'tenant_pool',
        tenantId: this.tenantId,
        err,
      });
      this.serveWaiters();
      throw err;
    }

    this.opening--;

    if (this.closed) {
      this.closeQuietly(conn);
      throw RoutingErrors.poolClosed({ tenantId: this.tenantId });
    }

    this.inUse++;
    return conn;
  }

  private waitForConnection(): Promise<TenantConnection> {
    return new Promise<TenantConnection>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);

          this.deps.logger.warn('tenant_pool.exhausted', {
            flow: 'tenant_pool',
            tenantId: this.tenantId,
            max: this.opts.max,
            waitedMs: this.opts.acquireTimeoutMs,
          });

          reject(
            RoutingErrors.poolExhausted({
              tenantId: this.tenantId,
              max: this.opts.max,
              waitedMs: this.opts.acquireTimeoutMs,
            }),
          );
        }, this.opts.acquireTimeoutMs),
      };

      this.waiters.push(waiter);
    });
  }

  /** Capacity freed without a connection to hand over (drop, failed open): open fresh ones for waiters. */
  private serveWaiters(): void {
    while (!this.closed && this.waiters.length > 0 && this.hasCapacity()) {
      const waiter = this.waiters.shift();
      if (!waiter) return;

      clearTimeout(waiter.timer);
      void this.openConnection().then(waiter.resolve, (err: unknown) =>
        waiter.reject(toError(err)),
      );
    }
  }

  private closeQuietly(conn: TenantConnection): void {
    void conn.close().catch((err: unknown) => {
      this.deps.logger.warn('tenant_pool.close_failed', {
        flow: 'tenant_pool',
        tenantId: this.tenantId,
        err,
      });
    });
  }
}
