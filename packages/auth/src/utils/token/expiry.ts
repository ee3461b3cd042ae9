import type { Credential } from '@helio/models';
import { AUTH_EXPIRY_SKEW_MS } from '../oauth-types.js';

/**
 * True when the credential is absent or expires within `skewMs` of `now`.
 *
 * A credential with `expiresAt === null` never expires. An invalid date is
 * treated as expired.
 * @public
 */
export function isCredentialExpired(
  credential: Credential | null,
  now: number = Date.now(),
  skewMs: number = AUTH_EXPIRY_SKEW_MS,
): boolean {
  if (!credential) {
    return true;
  }
  if (credential.expiresAt === null) {
    return false;
  }
  const expiresAt = credential.expiresAt.getTime();
  if (Number.isNaN(expiresAt)) {
    return true;
  }
  return now >= expiresAt - skewMs;
}

/**
 * The bearer secret of a credential: the API key or the access token.
 * @public
 */
export function credentialSecret(credential: Credential): string {
  return credential.method === 'api_key'
    ? credential.apiKey
    : credential.accessToken;
}

/**
 * `Authorization` header value for a credential.
 * @public
 */
export function authorizationHeader(credential: Credential): string {
  const tokenType =
    credential.method === 'api_key' ? 'Bearer' : credential.tokenType;
  return `${tokenType} ${credentialSecret(credential)}`;
}

/**
 * The refresh token of a token-pair credential, if any.
 * @public
 */
export function refreshTokenOf(credential: Credential | null): string | undefined {
  if (credential?.method === 'password' || credential?.method === 'oauth') {
    return credential.refreshToken;
  }
  return undefined;
}
