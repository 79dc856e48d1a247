/**
 * backend/src/shared/tenancy/routing-context.ts
 *
 * WHY:
 * - The per-request bundle of verified identity, routing target and data capability.
 * - Passed EXPLICITLY to handlers (never stored in module state or async-local storage),
 *   so concurrent requests for different tenants cannot observe each other's binding.
 *
 * RULES:
 * - Created only by TenantResolver.resolve(), frozen, never mutated.
 * - target.kind === 'shared' is an explicit routing target (platform superuser), not an error.
 */

import type { UserRole } from '../../modules/users/user.types';
import type { ConnectionHandle } from './connection-pool';
import type { RoutedDataAccess } from './routed-data-access';

export type RoutingIdentity = Readonly<{
  userId: string;
  role: UserRole;
}>;

export type RoutingTarget =
  | Readonly<{ kind: 'tenant'; tenantId: string; tenantSlug: string }>
  | Readonly<{ kind: 'shared' }>;

export type RoutingContext = Readonly<{
  requestId: string;
  identity: RoutingIdentity;
  target: RoutingTarget;
  /** Bound tenant connection; null for the shared target. */
  handle: ConnectionHandle | null;
  data: RoutedDataAccess;
}>;

/** Resolver states, in order. Any failure short-circuits to REJECTED. */
export type ResolutionState =
  | 'UNAUTHENTICATED'
  | 'TOKEN_VERIFIED'
  | 'TENANT_RESOLVED'
  | 'CONNECTION_BOUND'
  | 'REJECTED';
