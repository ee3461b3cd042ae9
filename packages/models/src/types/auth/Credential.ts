import type { Session } from './Session.js';

interface CredentialBase {
  /** When the credential was obtained locally */
  issuedAt: Date;
  /** Absolute expiry; `null` means the credential never expires */
  expiresAt: Date | null;
  /** Identity claims that accompanied the credential */
  session?: Session;
}

/**
 * Static platform API key
 */
export interface ApiKeyCredential extends CredentialBase {
  method: 'api_key';
  apiKey: string;
  expiresAt: null;
}

/**
 * Access/refresh token pair obtained from a user sign-in
 * (password grant or authorization code with PKCE)
 */
export interface TokenPairCredential extends CredentialBase {
  method: 'password' | 'oauth';
  accessToken: string;
  refreshToken?: string;
  tokenType: string;
  scope?: string;
}

/**
 * Access token obtained server-to-server with client credentials.
 * Renewed by re-exchanging the client id and secret.
 */
export interface ClientTokenCredential extends CredentialBase {
  method: 'client_credentials';
  accessToken: string;
  clientId: string;
  tokenType: string;
  scope?: string;
}

/**
 * The active secret plus metadata used to authenticate API calls.
 * Exactly one is active per client instance.
 */
export type Credential =
  | ApiKeyCredential
  | TokenPairCredential
  | ClientTokenCredential;
