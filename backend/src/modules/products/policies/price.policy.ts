/**
 * backend/src/modules/products/policies/price.policy.ts
 *
 * Prices are stored as text with exactly two decimals. Parsing goes through the
 * string form only, so "0.1" stays "0.10" with no binary float in between.
 */

const PRICE_PATTERN = /^(\d{1,8})(?:\.(\d{1,2}))?$/;

/** Returns the normalized "123.40" form, or null when the input is not a valid price. */
export function normalizePrice(input: string | number): string | null {
  const raw = typeof input === 'number' ? String(input) : input.trim();

  const match = PRICE_PATTERN.exec(raw);
  if (!match) return null;

  const whole = String(Number(match[1]));
  const cents = (match[2] ?? '').padEnd(2, '0');
  return `${whole}.${cents}`;
}
