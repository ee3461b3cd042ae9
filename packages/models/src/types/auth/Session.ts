/**
 * Identity claims attached to a credential.
 *
 * Read from the token response (`sub`, `iat`, `exp`, `user`, `org`, `client`)
 * or, failing that, from the unverified payload of a JWT access token. Used for
 * local expiry checks and scoping; never trusted for authorization decisions.
 */
export interface Session {
  /** Subject id (`sub` claim) */
  subject?: string;
  /** User the credential acts for */
  user?: string;
  /** Organization the credential is scoped to */
  org?: string;
  /** OAuth client that obtained the credential */
  client?: string;
  /** `iat` claim */
  issuedAt?: Date;
  /** `exp` claim */
  expiresAt?: Date;
}
