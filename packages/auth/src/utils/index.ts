/**
 * Auth utilities, organized by concern:
 * - PKCE and state generation
 * - Authorization URL and token request construction
 * - Token response parsing and expiry checks
 * - Token endpoint error parsing and classification
 *
 * @public
 */

export * from './token/token.utils.js';
export * from './error/oauth-error.utils.js';
export * from './oauth-types.js';
export * from './pkce.js';
export * from './auth-url.js';
export * from './token-exchange.js';
