/**
 * backend/src/modules/tenants/tenant-directory.ts
 *
 * WHY:
 * - Shared-database registry: tenant id -> database descriptor + active flag.
 * - Consulted by TenantResolver on every authenticated request, so active records are
 *   cached in memory.
 *
 * CACHE RULES:
 * - Only ACTIVE records are cached, for `cacheTtlSeconds`.
 * - register / deactivate / rename invalidate synchronously in this process.
 * - Each invalidation bumps one directory-wide generation. A lookup that overlapped any
 *   invalidation (read the row, then awaited) does not write its row back; the next
 *   lookup reads again.
 * - Other processes see a deactivation after at most `cacheTtlSeconds`.
 *
 * REGISTRATION RULES:
 * - All-or-nothing: the record insert and the database provisioning happen inside one
 *   shared-db transaction. If provisioning fails the transaction rolls back and the
 *   partial file is discarded: no active tenant ever points at an unprovisioned database.
 * - Inside the transaction only `trx` is used (SQLite has a single connection).
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation } from '../../shared/db/db-errors';
import { AppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import type { TenantProvisioner } from '../../shared/tenancy/tenant-provisioner';

import { TenantRepo } from './dal/tenant.repo';
import { isDescriptorTakenSql, selectTenantBySlugSql } from './dal/tenant.query-sql';
import { getTenantById, getTenantBySlug, listTenants } from './queries/tenant.queries';
import { assertValidTenantSlug } from './policies/tenant-slug.policy';
import { TenantErrors } from './tenant.errors';
import type { Tenant } from './tenant.types';

const MAX_DESCRIPTOR_ATTEMPTS = 20;

export type TenantDirectoryOptions = {
  cacheTtlSeconds: number;
  now?: () => Date;
};

type CacheEntry = { tenant: Tenant; expiresAtMs: number };

export class TenantDirectory {
  private readonly cache = new Map<string, CacheEntry>();
  private generation = 0;
  private readonly tenantRepo: TenantRepo;
  private readonly now: () => Date;

  constructor(
    private readonly deps: { db: DbExecutor; provisioner: TenantProvisioner; logger: Logger },
    private readonly opts: TenantDirectoryOptions,
  ) {
    this.tenantRepo = new TenantRepo(deps.db);
    this.now = opts.now ?? (() => new Date());
  }

  /** Returns active AND inactive records; callers decide what inactive means for them. */
  async lookup(tenantId: string): Promise<Tenant> {
    const cached = this.readCache(tenantId);
    if (cached) return cached;

    const generation = this.generation;
    const tenant = await getTenantById(this.deps.db, tenantId);
    if (!tenant) throw TenantErrors.tenantNotFound({ tenantId });

    if (tenant.isActive && this.generation === generation) {
      this.writeCache(tenant);
    }

    return tenant;
  }

  /** Registration / listing path only (not cached). */
  async lookupBySlug(slug: string): Promise<Tenant> {
    const tenant = await getTenantBySlug(this.deps.db, slug);
    if (!tenant) throw TenantErrors.tenantNotFound({ slug });
    return tenant;
  }

  async descriptorOf(tenantId: string): Promise<string> {
    const tenant = await this.lookup(tenantId);
    return tenant.dbDescriptor;
  }

  listActive(): Promise<Tenant[]> {
    return listTenants(this.deps.db, { activeOnly: true });
  }

  listAll(): Promise<Tenant[]> {
    return listTenants(this.deps.db, { activeOnly: false });
  }

  /**
   * Creates the record and provisions its database, atomically.
   * Fails: invalid slug (400) | slug taken (409, nothing mutated) | provisioning failure (500).
   *
   * `within` runs inside the same transaction after provisioning (e.g. creating the
   * company's first user). If it throws, the record is rolled back and the file discarded.
   */
  async register(
    input: { name: string; slug: string },
    opts: { within?: (trx: DbExecutor, tenant: Tenant) => Promise<void> } = {},
  ): Promise<Tenant> {
    const name = input.name.trim();
    if (!name) throw AppError.validationError('Company name is required.');
    assertValidTenantSlug(input.slug);

    const id = randomUUID();
    const now = this.now();
    const provisioned: string[] = [];

    const run = async (db: DbExecutor): Promise<Tenant> => {
      if (await selectTenantBySlugSql(db, input.slug)) {
        throw TenantErrors.slugTaken({ slug: input.slug });
      }

      const dbDescriptor = await this.allocateDescriptor(db, input.slug);
      await this.tenantRepo.withDb(db).insertTenant({
        id,
        name,
        slug: input.slug,
        dbDescriptor,
        now,
      });

      await this.provision(dbDescriptor, input.slug);
      provisioned.push(dbDescriptor);

      const created: Tenant = {
        id,
        name,
        slug: input.slug,
        dbDescriptor,
        isActive: true,
        createdAt: now,
        updatedAt: now,
      };

      if (opts.within) await opts.within(db, created);
      return created;
    };

    let tenant: Tenant;
    try {
      tenant = await this.deps.db.transaction().execute(run);
    } catch (err) {
      // rolled back after a successful provision: the file has no record
      await Promise.all(provisioned.map((descriptor) => this.discardQuietly(descriptor)));

      if (isUniqueViolation(err)) throw TenantErrors.slugTaken({ slug: input.slug });
      throw err;
    }

    this.invalidate(id);

    this.deps.logger.info('tenants.registered', {
      flow: 'tenants.register',
      tenantId: id,
      slug: input.slug,
    });

    return tenant;
  }

  /**
   * Soft-deactivates. Takes effect for NEW resolutions immediately (this process);
   * connections already acquired by in-flight requests are not interrupted.
   */
  async deactivate(tenantId: string): Promise<Tenant> {
    const updated = await this.tenantRepo.setActive(tenantId, false, this.now());
    this.invalidate(tenantId);
    if (updated === 0) throw TenantErrors.tenantNotFound({ tenantId });

    this.deps.logger.info('tenants.deactivated', { flow: 'tenants.deactivate', tenantId });
    return this.lookup(tenantId);
  }

  async rename(tenantId: string, name: string): Promise<Tenant> {
    const trimmed = name.trim();
    if (!trimmed) throw AppError.validationError('Company name is required.');

    const updated = await this.tenantRepo.rename(tenantId, trimmed, this.now());
    this.invalidate(tenantId);
    if (updated === 0) throw TenantErrors.tenantNotFound({ tenantId });

    this.deps.logger.info('tenants.renamed', { flow: 'tenants.rename', tenantId });
    return this.lookup(tenantId);
  }

  /** Drops every cached record (tests, admin tooling). */
  clearCache(): void {
    for (const tenantId of this.cache.keys()) this.invalidate(tenantId);
  }

  private async allocateDescriptor(db: DbExecutor, slug: string): Promise<string> {
    for (let attempt = 1; attempt <= MAX_DESCRIPTOR_ATTEMPTS; attempt++) {
      const candidate = this.deps.provisioner.descriptorFor(slug, attempt);

      if (await isDescriptorTakenSql(db, candidate)) continue;
      if (await this.deps.provisioner.exists(candidate)) continue;

      return candidate;
    }

    throw TenantErrors.provisioningFailed({ slug, cause: 'no_free_descriptor' });
  }

  private async provision(descriptor: string, slug: string): Promise<void> {
    try {
      await this.deps.provisioner.provision(descriptor);
    } catch (err) {
      this.deps.logger.error('tenants.provisioning_failed', {
        flow: 'tenants.register',
        slug,
        err,
      });
      await this.discardQuietly(descriptor);
      throw TenantErrors.provisioningFailed({ slug });
    }
  }

  private async discardQuietly(descriptor: string): Promise<void> {
    try {
      await this.deps.provisioner.discard(descriptor);
    } catch (err) {
      this.deps.logger.error('tenants.discard_failed', { flow: 'tenants.register', err });
    }
  }

  private readCache(tenantId: string): Tenant | null {
    const entry = this.cache.get(tenantId);
    if (!entry) return null;

    if (entry.expiresAtMs <= this.now().getTime()) {
      this.cache.delete(tenantId);
      return null;
    }

    return entry.tenant;
  }

  private writeCache(tenant: Tenant): void {
    if (this.opts.cacheTtlSeconds <= 0) return;

    this.cache.set(tenant.id, {
      tenant,
      expiresAtMs: this.now().getTime() + this.opts.cacheTtlSeconds * 1000,
    });
  }

  private invalidate(tenantId: string): void {
    this.cache.delete(tenantId);
    this.generation++;
  }
}
