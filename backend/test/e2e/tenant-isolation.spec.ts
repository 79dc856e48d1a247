import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { bearer, readJson, registerCompany } from '../helpers/auth-helpers';

type ProductListBody = { products: { id: string; name: string }[]; total: number };

const REQUESTS_PER_TENANT = 50;

describe('tenant isolation', () => {
  let t: TestApp;
  let acmeToken: string;
  let globexToken: string;

  async function seedCatalog(token: string, names: string[]): Promise<string[]> {
    const ids: string[] = [];
    for (const name of names) {
      const res = await t.app.inject({
        method: 'POST',
        url: '/products',
        headers: bearer(token),
        payload: { name, sku: `SHARED-SKU-${ids.length}` },
      });
      expect(res.statusCode).toBe(201);
      ids.push(readJson<{ product: { id: string } }>(res).product.id);
    }
    return ids;
  }

  beforeEach(async () => {
    t = await buildTestApp();
    acmeToken = (await registerCompany(t.app, { companyName: 'Acme', email: 'a@acme.test' }))
      .tokens.access;
    globexToken = (
      await registerCompany(t.app, { companyName: 'Globex', email: 'g@globex.test' })
    ).tokens.access;
  });

  afterEach(async () => {
    await t.close();
  });

  it('keeps each tenant on its own database under concurrent load', async () => {
    // same SKUs in both catalogs: uniqueness is per tenant database
    await seedCatalog(acmeToken, ['Anvil', 'Rocket Skates']);
    await seedCatalog(globexToken, ['Doomsday Device', 'Hammock', 'Monorail']);

    const list = (token: string) =>
      t.app.inject({ method: 'GET', url: '/products', headers: bearer(token) });

    const requests = [];
    for (let i = 0; i < REQUESTS_PER_TENANT; i++) {
      requests.push(list(acmeToken).then((res) => ({ tenant: 'acme', res })));
      requests.push(list(globexToken).then((res) => ({ tenant: 'globex', res })));
    }

    const results = await Promise.all(requests);

    for (const { tenant, res } of results) {
      expect(res.statusCode).toBe(200);
      const names = readJson<ProductListBody>(res)
        .products.map((p) => p.name)
        .sort();

      if (tenant === 'acme') {
        expect(names).toEqual(['Anvil', 'Rocket Skates']);
      } else {
        expect(names).toEqual(['Doomsday Device', 'Hammock', 'Monorail']);
      }
    }

    // everything leased during the burst went back
    expect(t.deps.pool.stats()).toMatchObject({ tenantPools: 2, leased: 0, waiting: 0 });
  });

  it("cannot read or modify another tenant's product by id", async () => {
    const [anvilId] = await seedCatalog(acmeToken, ['Anvil']);
    const url = `/products/${anvilId ?? ''}`;

    const read = await t.app.inject({ method: 'GET', url, headers: bearer(globexToken) });
    expect(read.statusCode).toBe(404);

    const update = await t.app.inject({
      method: 'PATCH',
      url,
      headers: bearer(globexToken),
      payload: { name: 'Stolen Anvil' },
    });
    expect(update.statusCode).toBe(404);

    const del = await t.app.inject({ method: 'DELETE', url, headers: bearer(globexToken) });
    expect(del.statusCode).toBe(404);

    const own = await t.app.inject({ method: 'GET', url, headers: bearer(acmeToken) });
    expect(readJson<{ product: { name: string } }>(own).product.name).toBe('Anvil');
  });

  it('gives each company its own database file', async () => {
    const companies = await t.deps.tenants.directory.listAll();
    const descriptors = companies.map((c) => c.dbDescriptor);

    expect(new Set(descriptors).size).toBe(2);
    for (const descriptor of descriptors) {
      expect(descriptor.startsWith(t.tenantDbDir)).toBe(true);
    }
  });
});
