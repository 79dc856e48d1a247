/**
 * backend/src/modules/tokens/index.ts
 *
 * Public surface of the tokens module.
 */

export { TokenService } from './token.service';
export { TokenErrors, tokenErrorReason } from './token.errors';
export type { TokenClaims, TokenIdentity, IssuedTokens, TokenType } from './token.types';
