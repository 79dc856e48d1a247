import { TenantErrors } from '../tenant.errors';

/**
 * Tenant slug rules:
 * - Pure (no DB / no I/O)
 * - Throws AppError
 *
 * A slug ends up in a file name (<slug>_db.sqlite3), so the alphabet is closed:
 * no dots, slashes or uppercase.
 */

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
const SLUG_MAX_LENGTH = 60;

export function isValidTenantSlug(slug: string): boolean {
  return slug.length <= SLUG_MAX_LENGTH && SLUG_PATTERN.test(slug);
}

export function assertValidTenantSlug(slug: string): void {
  if (!isValidTenantSlug(slug)) {
    throw TenantErrors.invalidSlug({ slug });
  }
}

/**
 * Company name -> slug ("Acme Corp." -> "acme-corp").
 * Accents are stripped; anything outside [a-z0-9] becomes a single dash.
 */
export function slugifyCompanyName(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/-+$/g, '');
}
