/**
 * OAuth2 Authorization Code + PKCE configuration.
 *
 * Immutable for the lifetime of an OAuth client.
 */
export interface OAuthConfig {
  clientId: string;
  redirectUri: string;
  /** Requested scopes, joined with spaces in the authorization URL */
  scopes: string[];
  /** Frontend base URL hosting the `/oauth` consent page */
  appUrl: string;
  /** API base URL hosting the token endpoint */
  apiUrl: string;
  /** API version, rendered as `/v{apiVersion}` */
  apiVersion: string;
  /** Optional opaque value echoed back on the redirect */
  state?: string;
}

/**
 * Endpoint settings the token exchanger needs
 */
export interface TokenEndpointConfig {
  apiUrl: string;
  apiVersion: string;
  /** Default client id sent with every grant that does not carry its own */
  clientId?: string;
  /** Redirect URI sent with authorization code exchanges */
  redirectUri?: string;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
}
