/**
 * backend/src/modules/products/policies/product-slug.policy.ts
 *
 * Product slugs are unique per tenant database:
 *   "Blue Mug" -> "blue-mug", then "blue-mug-1", "blue-mug-2", ...
 *
 * RULES:
 * - Pure (no DB). The service passes in the slugs already taken.
 */

const SLUG_MAX_LENGTH = 255;
const FALLBACK_SLUG = 'product';

export function slugifyProductName(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/-+$/g, '');

  return slug || FALLBACK_SLUG;
}

export function pickUniqueSlug(base: string, taken: Iterable<string>): string {
  const used = new Set(taken);
  if (!used.has(base)) return base;

  let counter = 1;
  while (used.has(`${base}-${counter}`)) counter++;
  return `${base}-${counter}`;
}
