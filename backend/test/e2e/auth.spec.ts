import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import {
  bearer,
  login,
  readJson,
  registerCompany,
  seedUser,
  TEST_PASSWORD,
  type AuthResponseBody,
  type ErrorResponseBody,
} from '../helpers/auth-helpers';

type ProfileResponseBody = {
  user: AuthResponseBody['user'] & { firstName: string; lastName: string; fullName: string };
};

describe('auth', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  describe('POST /auth/register', () => {
    it('creates a company and makes the caller its admin', async () => {
      const body = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'Founder@Acme.test',
      });

      expect(body.user.email).toBe('founder@acme.test');
      expect(body.user.role).toBe('admin');
      expect(body.user.company).toMatchObject({ name: 'Acme Corp', slug: 'acme-corp' });
      expect(typeof body.tokens.access).toBe('string');
      expect(typeof body.tokens.refresh).toBe('string');

      const list = await t.app.inject({ method: 'GET', url: '/auth/companies' });
      expect(list.statusCode).toBe(200);
      expect(readJson<{ companies: { slug: string }[] }>(list).companies).toEqual([
        { id: body.user.company?.id, name: 'Acme Corp', slug: 'acme-corp' },
      ]);
    });

    it('joins an existing company as a plain user', async () => {
      const admin = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: {
          email: 'staff@acme.test',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
          companyId: admin.user.company?.id,
        },
      });

      expect(res.statusCode).toBe(201);
      const body = readJson<AuthResponseBody>(res);
      expect(body.user.role).toBe('user');
      expect(body.user.company?.id).toBe(admin.user.company?.id);
    });

    it('rejects an email that is already registered', async () => {
      await registerCompany(t.app, { companyName: 'Acme Corp', email: 'founder@acme.test' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: {
          email: 'FOUNDER@acme.test',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
          companyName: 'Another Co',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('CONFLICT');
      expect(await t.deps.tenants.directory.listAll()).toHaveLength(1);
    });

    it('rejects a company name that is already taken', async () => {
      await registerCompany(t.app, { companyName: 'Acme Corp', email: 'founder@acme.test' });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: {
          email: 'other@acme.test',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
          companyName: 'ACME corp',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'A company with a similar name already exists.',
      );
    });

    it('rejects mismatched passwords', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: {
          email: 'founder@acme.test',
          password: TEST_PASSWORD,
          passwordConfirm: 'something-else',
          companyName: 'Acme Corp',
        },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /auth/login', () => {
    it('returns tokens for valid credentials', async () => {
      const registered = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const body = await login(t.app, { email: 'founder@acme.test' });

      expect(body.user.id).toBe(registered.user.id);
      expect(body.user.company?.slug).toBe('acme-corp');
    });

    it('gives the same error for a wrong password and an unknown email', async () => {
      await registerCompany(t.app, { companyName: 'Acme Corp', email: 'founder@acme.test' });

      const wrongPassword = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'founder@acme.test', password: 'not-the-password' },
      });
      const unknownEmail = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'nobody@acme.test', password: TEST_PASSWORD },
      });

      expect(wrongPassword.statusCode).toBe(401);
      expect(unknownEmail.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(wrongPassword)).toEqual(
        readJson<ErrorResponseBody>(unknownEmail),
      );
      expect(readJson<ErrorResponseBody>(wrongPassword).error.message).toBe(
        'Invalid email or password.',
      );
    });
  });

  describe('token refresh and logout', () => {
    it('mints a working access token from a refresh token', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/token/refresh',
        payload: { refresh: tokens.refresh },
      });

      expect(res.statusCode).toBe(200);
      const { access } = readJson<{ access: string; accessExpiresAt: string }>(res);

      const profile = await t.app.inject({
        method: 'GET',
        url: '/auth/profile',
        headers: bearer(access),
      });
      expect(profile.statusCode).toBe(200);
    });

    it('rejects an access token presented as a refresh token', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/token/refresh',
        payload: { refresh: tokens.access },
      });

      expect(res.statusCode).toBe(401);
    });

    it('blacklists the refresh token on logout', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const logout = await t.app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: bearer(tokens.access),
        payload: { refresh: tokens.refresh },
      });
      expect(logout.statusCode).toBe(200);
      expect(readJson<{ message: string }>(logout).message).toBe('Logout successful');

      const refresh = await t.app.inject({
        method: 'POST',
        url: '/auth/token/refresh',
        payload: { refresh: tokens.refresh },
      });
      expect(refresh.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(refresh).error.message).toBe('Token has been revoked.');
    });

    it("refuses to revoke someone else's refresh token", async () => {
      const first = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });
      const second = await registerCompany(t.app, {
        companyName: 'Globex',
        email: 'founder@globex.test',
      });

      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: bearer(first.tokens.access),
        payload: { refresh: second.tokens.refresh },
      });
      expect(res.statusCode).toBe(401);

      const stillValid = await t.app.inject({
        method: 'POST',
        url: '/auth/token/refresh',
        payload: { refresh: second.tokens.refresh },
      });
      expect(stillValid.statusCode).toBe(200);
    });

    it('requires a bearer token for logout', async () => {
      const res = await t.app.inject({
        method: 'POST',
        url: '/auth/logout',
        payload: { refresh: 'whatever' },
      });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe('Authentication required.');
    });
  });

  describe('profile and password', () => {
    it('reads and updates the profile', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const patch = await t.app.inject({
        method: 'PATCH',
        url: '/auth/profile',
        headers: bearer(tokens.access),
        payload: { firstName: 'Ada', lastName: 'Lovelace' },
      });
      expect(patch.statusCode).toBe(200);
      expect(readJson<ProfileResponseBody>(patch).user.fullName).toBe('Ada Lovelace');

      const get = await t.app.inject({
        method: 'GET',
        url: '/auth/profile',
        headers: bearer(tokens.access),
      });
      const { user } = readJson<ProfileResponseBody>(get);
      expect(user.firstName).toBe('Ada');
      expect(user.email).toBe('founder@acme.test');
      expect(user.company?.slug).toBe('acme-corp');
    });

    it('rejects profile fields it does not own', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const res = await t.app.inject({
        method: 'PATCH',
        url: '/auth/profile',
        headers: bearer(tokens.access),
        payload: { role: 'admin' },
      });
      expect(res.statusCode).toBe(400);
    });

    it('changes the password only with the correct old password', async () => {
      const { tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });

      const wrong = await t.app.inject({
        method: 'POST',
        url: '/auth/password/change',
        headers: bearer(tokens.access),
        payload: {
          oldPassword: 'not-the-password',
          newPassword: 'a-new-password',
          newPasswordConfirm: 'a-new-password',
        },
      });
      expect(wrong.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(wrong).error.message).toBe('Old password is incorrect.');

      const ok = await t.app.inject({
        method: 'POST',
        url: '/auth/password/change',
        headers: bearer(tokens.access),
        payload: {
          oldPassword: TEST_PASSWORD,
          newPassword: 'a-new-password',
          newPasswordConfirm: 'a-new-password',
        },
      });
      expect(ok.statusCode).toBe(200);

      const relogin = await login(t.app, { email: 'founder@acme.test', password: 'a-new-password' });
      expect(relogin.user.email).toBe('founder@acme.test');
    });
  });

  describe('deactivated company', () => {
    it('blocks login, existing access tokens and refresh', async () => {
      const { user, tokens } = await registerCompany(t.app, {
        companyName: 'Acme Corp',
        email: 'founder@acme.test',
      });
      const companyId = user.company?.id ?? '';

      await t.deps.tenants.directory.deactivate(companyId);

      const loginRes = await t.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: 'founder@acme.test', password: TEST_PASSWORD },
      });
      expect(loginRes.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(loginRes).error.message).toBe(
        'Your company account is inactive.',
      );

      const profile = await t.app.inject({
        method: 'GET',
        url: '/auth/profile',
        headers: bearer(tokens.access),
      });
      expect(profile.statusCode).toBe(401);

      const refresh = await t.app.inject({
        method: 'POST',
        url: '/auth/token/refresh',
        payload: { refresh: tokens.refresh },
      });
      expect(refresh.statusCode).toBe(401);
    });
  });

  it('lets a platform superuser log in without a company', async () => {
    await seedUser(t.deps, {
      email: 'platform@example.com',
      role: 'admin',
      companyId: null,
      isSuperuser: true,
    });

    const body = await login(t.app, { email: 'platform@example.com' });
    expect(body.user.company).toBeNull();

    const profile = await t.app.inject({
      method: 'GET',
      url: '/auth/profile',
      headers: bearer(body.tokens.access),
    });
    expect(profile.statusCode).toBe(200);
  });

  it('refuses login to a non-superuser without a company', async () => {
    await seedUser(t.deps, { email: 'drifter@example.com', role: 'user', companyId: null });

    const res = await t.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { email: 'drifter@example.com', password: TEST_PASSWORD },
    });

    expect(res.statusCode).toBe(403);
    expect(readJson<ErrorResponseBody>(res).error.message).toBe(
      'This account is not assigned to a company.',
    );
  });
});
