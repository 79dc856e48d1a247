import {
  DummyDriver,
  Kysely,
  SqliteAdapter,
  SqliteIntrospector,
  SqliteQueryCompiler,
} from 'kysely';

import type { SharedDatabase } from '../../src/shared/db/shared-db.types';
import type { TenantDatabase } from '../../src/shared/db/tenant-db.types';
import type {
  TenantConnection,
  TenantConnectionFactory,
  TenantDb,
} from '../../src/shared/tenancy/tenant-connection';
import { RoutingErrors } from '../../src/shared/tenancy/tenancy.errors';

/** A Kysely instance that never connects anywhere (identity checks only). */
export function coldDb<DB>(): Kysely<DB> {
  return new Kysely<DB>({
    dialect: {
      createAdapter: () => new SqliteAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new SqliteIntrospector(db),
      createQueryCompiler: () => new SqliteQueryCompiler(),
    },
  });
}

export const coldSharedDb = () => coldDb<SharedDatabase>();

export class FakeConnection implements TenantConnection {
  readonly db: TenantDb = coldDb<TenantDatabase>();
  open = true;
  closeCalls = 0;

  constructor(readonly tenantId: string) {}

  isOpen(): boolean {
    return this.open;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.open = false;
  }
}

/** Counts provisioning checks and opens; tenants in `missing` look unprovisioned. */
export class FakeConnectionFactory implements TenantConnectionFactory {
  readonly opened: FakeConnection[] = [];
  readonly missing = new Set<string>();
  ensureCalls = 0;

  async ensureProvisioned(tenantId: string): Promise<void> {
    this.ensureCalls++;
    // yield so concurrent callers really overlap
    await new Promise((resolve) => setImmediate(resolve));
    if (this.missing.has(tenantId)) throw RoutingErrors.tenantUnprovisioned({ tenantId });
  }

  async open(tenantId: string): Promise<TenantConnection> {
    const conn = new FakeConnection(tenantId);
    this.opened.push(conn);
    return conn;
  }
}
