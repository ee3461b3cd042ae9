/**
 * Token endpoint wire types and lifecycle constants.
 *
 * @public
 */
export type {
  TokenResponse,
  TokenErrorResponse,
} from '@helio/models';

/**
 * Credentials expiring within this window are treated as already expired.
 * @public
 */
export const AUTH_EXPIRY_SKEW_MS = 60 * 1000;

/**
 * Default timeout for a single token endpoint round trip.
 * @public
 */
export const AUTH_REQUEST_TIMEOUT_MS = 30 * 1000;

/**
 * Random bytes behind a code verifier: 96 bytes encode to 128 characters.
 * @public
 */
export const PKCE_VERIFIER_BYTES = 96;

export const PKCE_MIN_VERIFIER_BYTES = 32;
export const PKCE_MAX_VERIFIER_BYTES = 96;

/**
 * Random bytes behind a CSRF state value.
 * @public
 */
export const STATE_BYTES = 16;

export const TOKEN_ENDPOINT_PATH = 'auth/token';
export const SIGN_OUT_ENDPOINT_PATH = 'auth/signout';
export const AUTHORIZE_PATH = 'oauth';

export const DEFAULT_TOKEN_TYPE = 'Bearer';
