/**
 * PKCE verifier/challenge pair (RFC 7636).
 *
 * Created per authorization attempt and used once. Only the challenge ever
 * leaves the process before the token exchange.
 */
export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
}

/**
 * Result of building an authorization URL. The caller holds the verifier
 * until the redirect comes back with a code.
 */
export interface AuthorizationUrlResult {
  url: string;
  codeVerifier: string;
}

/**
 * Outcome of a sign-out. Local state is always cleared; `error` reports a
 * failed remote revocation without failing the sign-out.
 */
export interface SignOutResult {
  remoteRevoked: boolean;
  error?: Error;
}
