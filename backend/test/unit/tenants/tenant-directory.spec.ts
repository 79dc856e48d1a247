import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { TenantDirectory } from '../../../src/modules/tenants';
import { createDb, type Db } from '../../../src/shared/db/db';
import { migrateSharedDb } from '../../../src/shared/db/migrator';
import { logger } from '../../../src/shared/logger/logger';
import type { TenantProvisioner } from '../../../src/shared/tenancy/tenant-provisioner';

/** Files are a Set; provisioning can be made to fail once. */
class FakeProvisioner implements TenantProvisioner {
  readonly files = new Set<string>();
  readonly discarded: string[] = [];
  failNext = false;

  descriptorFor(slug: string, attempt: number): string {
    return attempt <= 1 ? `/data/${slug}_db.sqlite3` : `/data/${slug}-${attempt}_db.sqlite3`;
  }

  async exists(descriptor: string): Promise<boolean> {
    return this.files.has(descriptor);
  }

  async provision(descriptor: string): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    this.files.add(descriptor);
  }

  async discard(descriptor: string): Promise<void> {
    this.discarded.push(descriptor);
    this.files.delete(descriptor);
  }
}

async function errorOf(work: Promise<unknown>): Promise<unknown> {
  try {
    await work;
  } catch (err) {
    return err;
  }
  throw new Error('expected a rejection');
}

describe('TenantDirectory', () => {
  let db: Db;
  let provisioner: FakeProvisioner;
  let nowMs: number;

  function buildDirectory(cacheTtlSeconds = 60): TenantDirectory {
    return new TenantDirectory(
      { db, provisioner, logger },
      { cacheTtlSeconds, now: () => new Date(nowMs) },
    );
  }

  beforeEach(async () => {
    nowMs = Date.UTC(2030, 0, 1);
    db = createDb(':memory:');
    await migrateSharedDb(db);
    provisioner = new FakeProvisioner();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('registers an active tenant with a provisioned database', async () => {
    const directory = buildDirectory();

    const acme = await directory.register({ name: '  Acme  ', slug: 'acme' });

    expect(acme).toMatchObject({
      name: 'Acme',
      slug: 'acme',
      dbDescriptor: '/data/acme_db.sqlite3',
      isActive: true,
    });
    expect(provisioner.files.has('/data/acme_db.sqlite3')).toBe(true);
    expect(await directory.lookup(acme.id)).toEqual(acme);
    expect((await directory.lookupBySlug('acme')).id).toBe(acme.id);
    expect(await directory.descriptorOf(acme.id)).toBe('/data/acme_db.sqlite3');
  });

  it('rejects a duplicate slug and leaves the directory unchanged', async () => {
    const directory = buildDirectory();
    await directory.register({ name: 'Acme', slug: 'acme' });

    const err = await errorOf(directory.register({ name: 'Acme Again', slug: 'acme' }));

    expect(err).toMatchObject({ status: 409, code: 'CONFLICT' });
    expect(await directory.listAll()).toHaveLength(1);
    expect([...provisioner.files]).toEqual(['/data/acme_db.sqlite3']);
  });

  it('skips a descriptor whose file already exists', async () => {
    provisioner.files.add('/data/acme_db.sqlite3');
    const directory = buildDirectory();

    const acme = await directory.register({ name: 'Acme', slug: 'acme' });

    expect(acme.dbDescriptor).toBe('/data/acme-2_db.sqlite3');
  });

  it('rejects an invalid slug before touching anything', async () => {
    const directory = buildDirectory();

    const err = await errorOf(directory.register({ name: 'Evil', slug: '../evil' }));

    expect(err).toMatchObject({ status: 400 });
    expect(provisioner.files.size).toBe(0);
    expect(await directory.listAll()).toEqual([]);
  });

  it('rolls the record back when provisioning fails', async () => {
    const directory = buildDirectory();
    provisioner.failNext = true;

    const err = await errorOf(directory.register({ name: 'Acme', slug: 'acme' }));

    expect(err).toMatchObject({ status: 500, message: 'Company database could not be provisioned.' });
    expect(await directory.listAll()).toEqual([]);
    expect(provisioner.discarded).toContain('/data/acme_db.sqlite3');
  });

  it('rolls back and discards the database when the `within` step fails', async () => {
    const directory = buildDirectory();

    const err = await errorOf(
      directory.register(
        { name: 'Acme', slug: 'acme' },
        {
          within: async () => {
            throw new Error('first user could not be created');
          },
        },
      ),
    );

    expect(err).toMatchObject({ message: 'first user could not be created' });
    expect(await directory.listAll()).toEqual([]);
    expect(provisioner.files.size).toBe(0);
  });

  it('fails lookup of an unknown tenant with 404', async () => {
    const err = await errorOf(buildDirectory().lookup('00000000-0000-4000-8000-000000000000'));
    expect(err).toMatchObject({ status: 404, code: 'NOT_FOUND' });
  });

  it('sees its own deactivation immediately', async () => {
    const directory = buildDirectory();
    const acme = await directory.register({ name: 'Acme', slug: 'acme' });
    await directory.lookup(acme.id); // cached

    const deactivated = await directory.deactivate(acme.id);

    expect(deactivated.isActive).toBe(false);
    expect((await directory.lookup(acme.id)).isActive).toBe(false);
    expect(await directory.listActive()).toEqual([]);
    expect(await directory.listAll()).toHaveLength(1);
  });

  it('serves cached records until the TTL passes', async () => {
    const reader = buildDirectory(60);
    const writer = buildDirectory(60); // another process sharing the database
    const acme = await writer.register({ name: 'Acme', slug: 'acme' });

    await reader.lookup(acme.id);
    await writer.deactivate(acme.id);

    expect((await reader.lookup(acme.id)).isActive).toBe(true);

    nowMs += 61_000;
    expect((await reader.lookup(acme.id)).isActive).toBe(false);
  });

  it('keeps caching after other tenants were invalidated', async () => {
    const reader = buildDirectory(60);
    const writer = buildDirectory(60);
    const acme = await reader.register({ name: 'Acme', slug: 'acme' });
    const globex = await reader.register({ name: 'Globex', slug: 'globex' });
    await reader.deactivate(globex.id);

    await reader.lookup(acme.id);
    await writer.deactivate(acme.id);

    expect((await reader.lookup(acme.id)).isActive).toBe(true);
    expect((await reader.lookup(globex.id)).isActive).toBe(false);
  });

  it('renames and reports unknown ids as 404', async () => {
    const directory = buildDirectory();
    const acme = await directory.register({ name: 'Acme', slug: 'acme' });

    const renamed = await directory.rename(acme.id, 'Acme Holdings');
    expect(renamed.name).toBe('Acme Holdings');
    expect(renamed.slug).toBe('acme');

    const missing = '00000000-0000-4000-8000-000000000000';
    expect(await errorOf(directory.rename(missing, 'X'))).toMatchObject({ status: 404 });
    expect(await errorOf(directory.deactivate(missing))).toMatchObject({ status: 404 });
  });
});
