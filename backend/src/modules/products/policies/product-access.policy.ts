/**
 * backend/src/modules/products/policies/product-access.policy.ts
 *
 * Every member of a company can read its catalog; only admins and managers write.
 */

import type { UserRole } from '../../users/user.types';

export const PRODUCT_MANAGER_ROLES = ['admin', 'manager'] as const satisfies readonly UserRole[];

export function canManageProducts(role: UserRole): boolean {
  return PRODUCT_MANAGER_ROLES.some((r) => r === role);
}
