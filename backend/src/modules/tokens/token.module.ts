/**
 * src/modules/tokens/token.module.ts
 *
 * WHY:
 * - Encapsulates Tokens module wiring (service + background purge).
 * - Support module: no routes of its own. Auth issues/refreshes/revokes through it,
 *   TenantResolver verifies through it.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { TokenService, type TokenServiceOptions } from './token.service';

export type TokenModule = ReturnType<typeof createTokenModule>;

export function createTokenModule(deps: {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  logger: Logger;
  options: TokenServiceOptions & { sweepIntervalMs: number };
}) {
  const tokenService = new TokenService(
    { db: deps.db, tokenHasher: deps.tokenHasher, logger: deps.logger },
    deps.options,
  );

  const stopSweeper = tokenService.startSweeper(deps.options.sweepIntervalMs);

  return {
    tokenService,
    close() {
      stopSweeper();
    },
  };
}
