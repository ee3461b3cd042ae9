import type { Credential } from '@helio/models';

/**
 * Called after the active credential changes; `null` means it was cleared.
 */
export type CredentialListener = (credential: Credential | null) => void;

/**
 * The single slot holding a client's active credential.
 *
 * Every authenticated request reads the credential from here. Writers replace
 * the whole credential at once; readers never see a partially updated value.
 */
export interface ICredentialStore {
  /**
   * Current credential, or null when signed out
   */
  current(): Credential | null;

  /**
   * Replaces the active credential
   */
  install(credential: Credential): void;

  /**
   * Removes the active credential and starts a new generation
   */
  clear(): void;

  /**
   * Number of clear() calls so far. A writer that read a lower value before
   * starting its exchange must discard its result.
   */
  generation(): number;

  /**
   * True when there is no credential, or it expires within `skewMs`
   * @param skewMs - Safety margin, store default when omitted
   * @param now - Reference time, `Date.now()` when omitted
   */
  isExpired(skewMs?: number, now?: number): boolean;

  /**
   * Registers a change listener
   * @returns Function that removes the listener
   */
  subscribe(listener: CredentialListener): () => void;
}
