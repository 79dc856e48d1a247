/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This email is already registered. Please sign in.', meta);
  },

  /** Registration with companyId: unknown or deactivated company. */
  companyUnavailable(meta?: AppErrorMeta) {
    return AppError.validationError('Company not found or inactive.', meta);
  },

  /** Company name slugifies to nothing (e.g. only punctuation). */
  invalidCompanyName(meta?: AppErrorMeta) {
    return AppError.validationError('Company name must contain letters or digits.', meta);
  },

  accountDisabled(meta?: AppErrorMeta) {
    return AppError.forbidden('This account is disabled.', meta);
  },

  /** Login: the user's company was deactivated. */
  companyInactive(meta?: AppErrorMeta) {
    return AppError.forbidden('Your company account is inactive.', meta);
  },

  /** Login: a non-platform user without a company has nothing to route to. */
  noCompany(meta?: AppErrorMeta) {
    return AppError.forbidden('This account is not assigned to a company.', meta);
  },

  wrongOldPassword(meta?: AppErrorMeta) {
    return AppError.validationError('Old password is incorrect.', meta);
  },

  /** The token is valid but its user is gone or disabled. */
  userUnavailable(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required.', meta);
  },
} as const;
