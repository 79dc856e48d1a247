import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import {
  bearer,
  login,
  readJson,
  registerCompany,
  seedUser,
  type AuthResponseBody,
  type ErrorResponseBody,
} from '../helpers/auth-helpers';

type CompanySummaryBody = {
  id: string;
  name: string;
  slug: string;
  isActive: boolean;
  createdAt: string;
};

describe('admin companies', () => {
  let t: TestApp;
  let platformToken: string;
  let acme: AuthResponseBody;

  beforeEach(async () => {
    t = await buildTestApp();

    acme = await registerCompany(t.app, { companyName: 'Acme', email: 'a@acme.test' });
    await registerCompany(t.app, { companyName: 'Globex', email: 'g@globex.test' });

    await seedUser(t.deps, {
      email: 'platform@example.com',
      role: 'admin',
      companyId: null,
      isSuperuser: true,
    });
    platformToken = (await login(t.app, { email: 'platform@example.com' })).tokens.access;
  });

  afterEach(async () => {
    await t.close();
  });

  it('lists every company without exposing database locations', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/admin/companies',
      headers: bearer(platformToken),
    });

    expect(res.statusCode).toBe(200);
    const { companies } = readJson<{ companies: CompanySummaryBody[] }>(res);
    expect(companies.map((c) => c.slug).sort()).toEqual(['acme', 'globex']);
    expect(res.body).not.toContain('sqlite3');
  });

  it('renames a company', async () => {
    const id = acme.user.company?.id ?? '';

    const res = await t.app.inject({
      method: 'PATCH',
      url: `/admin/companies/${id}`,
      headers: bearer(platformToken),
      payload: { name: 'Acme Holdings' },
    });

    expect(res.statusCode).toBe(200);
    expect(readJson<{ company: CompanySummaryBody }>(res).company).toMatchObject({
      id,
      name: 'Acme Holdings',
      slug: 'acme',
      isActive: true,
    });

    const profile = await t.app.inject({
      method: 'GET',
      url: '/auth/profile',
      headers: bearer(acme.tokens.access),
    });
    expect(readJson<AuthResponseBody>(profile).user.company?.name).toBe('Acme Holdings');
  });

  it('deactivates a company and cuts off its users immediately', async () => {
    const id = acme.user.company?.id ?? '';

    const res = await t.app.inject({
      method: 'POST',
      url: `/admin/companies/${id}/deactivate`,
      headers: bearer(platformToken),
    });
    expect(res.statusCode).toBe(200);
    expect(readJson<{ company: CompanySummaryBody }>(res).company.isActive).toBe(false);

    const products = await t.app.inject({
      method: 'GET',
      url: '/products',
      headers: bearer(acme.tokens.access),
    });
    expect(products.statusCode).toBe(401);
    // the token itself stays valid; only routing refuses it
    await expect(t.deps.tokens.tokenService.verify(acme.tokens.access)).resolves.toMatchObject({
      tenantId: id,
      type: 'access',
    });

    const inactive = await t.app.inject({
      method: 'GET',
      url: '/admin/companies?active=false',
      headers: bearer(platformToken),
    });
    expect(
      readJson<{ companies: CompanySummaryBody[] }>(inactive).companies.map((c) => c.slug),
    ).toEqual(['acme']);

    const publicList = await t.app.inject({ method: 'GET', url: '/auth/companies' });
    expect(
      readJson<{ companies: { slug: string }[] }>(publicList).companies.map((c) => c.slug),
    ).toEqual(['globex']);
  });

  it('returns 404 for an unknown company', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/admin/companies/00000000-0000-4000-8000-000000000000/deactivate',
      headers: bearer(platformToken),
    });

    expect(res.statusCode).toBe(404);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe('Company not found.');
  });

  it('is not reachable with a tenant admin token', async () => {
    const res = await t.app.inject({
      method: 'GET',
      url: '/admin/companies',
      headers: bearer(acme.tokens.access),
    });

    expect(res.statusCode).toBe(403);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'This endpoint is not available for this account.',
    );
  });
});
