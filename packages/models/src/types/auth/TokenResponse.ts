/**
 * Token endpoint success body (RFC 6749 section 5.1) plus the identity
 * claims the platform echoes alongside the tokens.
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  token_type?: string;
  /** Lifetime in seconds */
  expires_in?: number;
  scope?: string;
  sub?: string;
  /** Issued-at, seconds since epoch */
  iat?: number;
  /** Expiry, seconds since epoch */
  exp?: number;
  user?: string;
  org?: string;
  client?: string;
}

/**
 * Token endpoint error body (RFC 6749 section 5.2)
 */
export interface TokenErrorResponse {
  error: string;
  error_description?: string;
  error_uri?: string;
}
