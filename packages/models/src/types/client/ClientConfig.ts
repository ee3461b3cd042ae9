/**
 * Options accepted by the Helio client constructor. Every field is optional;
 * missing values are filled from `HELIO_*` environment variables, then from
 * built-in defaults.
 */
export interface ClientConfigInput {
  apiKey?: string;
  apiUrl?: string;
  appUrl?: string;
  apiVersion?: string;
  clientId?: string;
  clientSecret?: string;
  verbose?: boolean;
  /** Token and API request timeout in milliseconds */
  requestTimeoutMs?: number;
  /** Safety margin subtracted from a credential's expiry */
  expirySkewMs?: number;
}

/**
 * Fully resolved client configuration
 */
export interface ClientConfig {
  apiKey?: string;
  apiUrl: string;
  appUrl: string;
  apiVersion: string;
  clientId?: string;
  clientSecret?: string;
  verbose: boolean;
  requestTimeoutMs: number;
  expirySkewMs: number;
}
