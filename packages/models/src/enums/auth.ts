/**
 * Authentication method tags carried by every credential.
 *
 * The tag decides how a credential is refreshed:
 * - `api_key`: static, never refreshed
 * - `password` / `oauth`: refreshed with the stored refresh token
 * - `client_credentials`: re-exchanged with the client id and secret
 */
export const AuthMethods = {
  API_KEY: 'api_key',
  PASSWORD: 'password',
  OAUTH: 'oauth',
  CLIENT_CREDENTIALS: 'client_credentials',
} as const;

export type AuthMethod = (typeof AuthMethods)[keyof typeof AuthMethods];

/**
 * OAuth 2.0 grant types accepted by the platform token endpoint
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  PASSWORD: 'password',
  CLIENT_CREDENTIALS: 'client_credentials',
  REFRESH_TOKEN: 'refresh_token',
} as const;

export type GrantType = (typeof GrantTypes)[keyof typeof GrantTypes];

/**
 * Standard OAuth 2.0 response types
 */
export const ResponseTypes = {
  CODE: 'code',
} as const;

/**
 * PKCE code challenge methods. Only S256 is ever sent.
 */
export const CodeChallengeMethods = {
  S256: 'S256',
} as const;
