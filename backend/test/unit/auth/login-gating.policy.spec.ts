import { describe, it, expect } from 'vitest';
import { getLoginGatingFailure } from '../../../src/modules/auth/policies/login-gating.policy';
import { AppError } from '../../../src/shared/http/errors';

const member = { isActive: true, isSuperuser: false, companyId: 'c1' };

describe('getLoginGatingFailure', () => {
  it('returns null for an active user of an active company', () => {
    expect(getLoginGatingFailure(member, { isActive: true })).toBeNull();
  });

  it('rejects a disabled user before looking at the company', () => {
    const res = getLoginGatingFailure({ ...member, isActive: false }, undefined);
    expect(res?.reason).toBe('account_disabled');
    expect(res?.error).toBeInstanceOf(AppError);
  });

  it('rejects a user whose company is deactivated', () => {
    const res = getLoginGatingFailure(member, { isActive: false });
    expect(res?.reason).toBe('company_inactive');
  });

  it('rejects a user whose company record is gone', () => {
    const res = getLoginGatingFailure(member, undefined);
    expect(res?.reason).toBe('company_inactive');
  });

  it('lets a platform superuser without a company through', () => {
    const res = getLoginGatingFailure(
      { isActive: true, isSuperuser: true, companyId: null },
      undefined,
    );
    expect(res).toBeNull();
  });

  it('rejects a regular user without a company', () => {
    const res = getLoginGatingFailure(
      { isActive: true, isSuperuser: false, companyId: null },
      undefined,
    );
    expect(res?.reason).toBe('no_company');
    expect(res?.error).toMatchObject({ status: 403 });
  });
});
