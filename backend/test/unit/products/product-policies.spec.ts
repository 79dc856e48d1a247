import { describe, it, expect } from 'vitest';
import {
  PRODUCT_MANAGER_ROLES,
  canManageProducts,
  normalizePrice,
  pickUniqueSlug,
  slugifyProductName,
} from '../../../src/modules/products';

describe('slugifyProductName', () => {
  it('lowercases and dashes word breaks', () => {
    expect(slugifyProductName('Blue Coffee Mug')).toBe('blue-coffee-mug');
  });

  it('strips accents and collapses punctuation', () => {
    expect(slugifyProductName('  Crème Brûlée -- 250g! ')).toBe('creme-brulee-250g');
  });

  it('falls back when nothing usable is left', () => {
    expect(slugifyProductName('***')).toBe('product');
  });
});

describe('pickUniqueSlug', () => {
  it('keeps the base when it is free', () => {
    expect(pickUniqueSlug('mug', ['mug-1'])).toBe('mug');
  });

  it('appends the first free counter', () => {
    expect(pickUniqueSlug('mug', ['mug', 'mug-1', 'mug-3'])).toBe('mug-2');
  });
});

describe('normalizePrice', () => {
  it('pads to two decimals', () => {
    expect(normalizePrice('19.9')).toBe('19.90');
    expect(normalizePrice('5')).toBe('5.00');
    expect(normalizePrice(0.1)).toBe('0.10');
  });

  it('drops leading zeros of the whole part', () => {
    expect(normalizePrice('007')).toBe('7.00');
  });

  it('rejects negatives, extra decimals and junk', () => {
    expect(normalizePrice('-1')).toBeNull();
    expect(normalizePrice('1.999')).toBeNull();
    expect(normalizePrice('abc')).toBeNull();
    expect(normalizePrice('')).toBeNull();
  });
});

describe('canManageProducts', () => {
  it('allows admins and managers only', () => {
    expect(PRODUCT_MANAGER_ROLES).toEqual(['admin', 'manager']);
    expect(canManageProducts('admin')).toBe(true);
    expect(canManageProducts('manager')).toBe(true);
    expect(canManageProducts('user')).toBe(false);
  });
});
