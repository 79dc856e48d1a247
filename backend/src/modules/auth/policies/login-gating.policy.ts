/**
 * backend/src/modules/auth/policies/login-gating.policy.ts
 *
 * WHY:
 * - Who may obtain tokens is a business/security rule.
 * - Keep it pure + unit-testable (no DB, no HTTP).
 *
 * RULES (checked AFTER the password, so they never leak whether an email exists):
 * - Disabled user → account disabled.
 * - No company: platform superusers pass (shared-database tokens), others fail.
 * - Company missing or deactivated → company inactive.
 * - Otherwise OK.
 */

import { AuthErrors } from '../auth.errors';

export type LoginSubject = Readonly<{
  isActive: boolean;
  isSuperuser: boolean;
  companyId: string | null;
}>;

export type LoginCompany = Readonly<{ isActive: boolean }>;

export type LoginGatingFailure =
  | { reason: 'account_disabled'; error: Error }
  | { reason: 'no_company'; error: Error }
  | { reason: 'company_inactive'; error: Error };

/** Returns null when OK; otherwise the reason (for logs) and the error to throw. */
export function getLoginGatingFailure(
  user: LoginSubject,
  company: LoginCompany | undefined,
): LoginGatingFailure | null {
  if (!user.isActive) {
    return { reason: 'account_disabled', error: AuthErrors.accountDisabled() };
  }

  if (user.companyId === null) {
    return user.isSuperuser ? null : { reason: 'no_company', error: AuthErrors.noCompany() };
  }

  if (!company || !company.isActive) {
    return { reason: 'company_inactive', error: AuthErrors.companyInactive() };
  }

  return null;
}
