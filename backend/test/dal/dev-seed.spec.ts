import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';
import { getUserByEmail } from '../../src/modules/users';

describe('dev seed', () => {
  it('is idempotent (company + admin + platform superuser)', async () => {
    const { deps, close } = await buildTestApp();

    const seed = () =>
      runDevSeed({
        db: deps.db,
        directory: deps.tenants.directory,
        userRepo: deps.users.userRepo,
        passwordHasher: deps.passwordHasher,
        options: {
          companyName: 'Demo Company',
          adminEmail: 'admin@example.com',
          adminPassword: 'test-password',
          superuserEmail: 'platform@example.com',
        },
      });

    try {
      await seed();
      await seed();

      const companies = await deps.tenants.directory.listAll();
      expect(companies).toHaveLength(1);
      expect(companies[0]?.slug).toBe('demo-company');

      const admin = await getUserByEmail(deps.db, 'admin@example.com');
      expect(admin?.role).toBe('admin');
      expect(admin?.companyId).toBe(companies[0]?.id);

      const superuser = await getUserByEmail(deps.db, 'platform@example.com');
      expect(superuser?.isSuperuser).toBe(true);
      expect(superuser?.companyId).toBeNull();
    } finally {
      await close();
    }
  });

  it('does not create a company when the admin email already belongs to someone', async () => {
    const { deps, close } = await buildTestApp();

    try {
      await deps.users.userRepo.insertUser({
        email: 'admin@example.com',
        passwordHash: 'x',
        firstName: 'Someone',
        lastName: 'Else',
        companyId: null,
        role: 'user',
        now: new Date(),
      });

      await runDevSeed({
        db: deps.db,
        directory: deps.tenants.directory,
        userRepo: deps.users.userRepo,
        passwordHasher: deps.passwordHasher,
        options: {
          companyName: 'Demo Company',
          adminEmail: 'admin@example.com',
          adminPassword: 'test-password',
          superuserEmail: 'platform@example.com',
        },
      });

      expect(await deps.tenants.directory.listAll()).toEqual([]);
    } finally {
      await close();
    }
  });
});
