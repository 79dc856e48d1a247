/**
 * backend/src/shared/tenancy/routed-data-access.ts
 *
 * WHY:
 * - The ONLY way handlers reach a database. Two targets, no names:
 *   - tenant(): the connection bound by the resolver for this request
 *   - shared(): the process-wide shared database
 * - No method accepts a database name or tenant id, so request input can never
 *   select a physical database.
 *
 * RULES:
 * - Revoked when the request's routing is released. Later calls to tenant()/shared() throw,
 *   and so does every query built from an instance they returned earlier: both hand out a
 *   view guarded by RevokedAccessPlugin, never the pooled Kysely itself.
 * - `rollback` still passes after revocation, so a write transaction abandoned mid-way
 *   (handler timeout) can close and not leave BEGIN IMMEDIATE open on a reused connection.
 */

import { RawNode } from 'kysely';
import type {
  KyselyPlugin,
  PluginTransformQueryArgs,
  PluginTransformResultArgs,
  QueryResult,
  RootOperationNode,
  UnknownRow,
} from 'kysely';

import type { DbExecutor } from '../db/db';
import type { ConnectionHandle } from './connection-pool';
import type { TenantDb } from './tenant-connection';
import { RoutingErrors } from './tenancy.errors';

function isRollback(node: RootOperationNode): boolean {
  return RawNode.is(node) && node.sqlFragments.join('').trim().toLowerCase() === 'rollback';
}

export class RevokedAccessPlugin implements KyselyPlugin {
  constructor(
    private readonly isRevoked: () => boolean,
    private readonly onRevoked: () => Error,
  ) {}

  transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
    if (this.isRevoked() && !isRollback(args.node)) throw this.onRevoked();
    return args.node;
  }

  async transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
    return args.result;
  }
}

export class RoutedDataAccess {
  private revoked = false;
  private readonly guard: RevokedAccessPlugin;
  private readonly tenantView: TenantDb | null;
  private readonly sharedView: DbExecutor;

  constructor(sharedDb: DbExecutor, private readonly handle: ConnectionHandle | null) {
    this.guard = new RevokedAccessPlugin(
      () => this.revoked,
      () => RoutingErrors.accessAfterRelease({ tenantId: this.handle?.tenantId ?? null }),
    );
    this.tenantView = handle ? handle.db.withPlugin(this.guard) : null;
    this.sharedView = sharedDb.withPlugin(this.guard);
  }

  /** The current tenant's database. Throws on a shared-target request. */
  tenant(): TenantDb {
    this.assertLive();
    if (!this.tenantView) throw RoutingErrors.noTenantBound();
    return this.tenantView;
  }

  /** The shared (platform) database. */
  shared(): DbExecutor {
    this.assertLive();
    return this.sharedView;
  }

  get isRevoked(): boolean {
    return this.revoked;
  }

  revoke(): void {
    this.revoked = true;
  }

  private assertLive(): void {
    if (this.revoked) {
      throw RoutingErrors.accessAfterRelease({ tenantId: this.handle?.tenantId ?? null });
    }
  }
}
