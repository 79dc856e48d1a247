/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * PII-minimized logging: auth flows log the email domain, never the address.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : '';
}
