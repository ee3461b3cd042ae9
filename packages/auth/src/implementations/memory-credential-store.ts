import {
  type CredentialListener,
  type ICredentialStore,
  logError,
  logEvent,
} from '@helio/core';
import type { Credential } from '@helio/models';
import {
  credentialSecret,
  isCredentialExpired,
} from '../utils/token/expiry.js';
import { AUTH_EXPIRY_SKEW_MS } from '../utils/oauth-types.js';

export interface MemoryCredentialStoreOptions {
  /** Default safety margin for isExpired(), 60 s when omitted */
  expirySkewMs?: number;
}

/**
 * In-memory credential slot, lost on process exit.
 *
 * `install` freezes the credential and swaps it in with one assignment, so a
 * reader sees either the previous credential or the new one, never a mix.
 * Listeners run after the swap.
 */
export class MemoryCredentialStore implements ICredentialStore {
  private credential: Credential | null = null;
  private clears = 0;
  private readonly listeners = new Set<CredentialListener>();
  private readonly expirySkewMs: number;

  public constructor(options: MemoryCredentialStoreOptions = {}) {
    this.expirySkewMs = options.expirySkewMs ?? AUTH_EXPIRY_SKEW_MS;
  }

  public current(): Credential | null {
    return this.credential;
  }

  /**
   * @throws \{Error\} When the credential carries an empty secret
   */
  public install(credential: Credential): void {
    this.validateCredential(credential);

    const frozen = this.freeze(credential);
    this.credential = frozen;

    logEvent('info', 'auth:credential_stored', {
      method: frozen.method,
      expiresAt: this.describeExpiry(frozen),
      scope: frozen.method === 'api_key' ? undefined : frozen.scope,
    });

    this.notify(frozen);
  }

  public clear(): void {
    this.clears += 1;
    if (this.credential === null) {
      return;
    }
    this.credential = null;
    logEvent('info', 'auth:credential_cleared', {});
    this.notify(null);
  }

  public generation(): number {
    return this.clears;
  }

  public isExpired(
    skewMs: number = this.expirySkewMs,
    now: number = Date.now(),
  ): boolean {
    return isCredentialExpired(this.credential, now, skewMs);
  }

  public subscribe(listener: CredentialListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private validateCredential(credential: Credential): void {
    if (!credentialSecret(credential).trim()) {
      throw new Error('Credential secret cannot be empty');
    }
    if (credential.method !== 'api_key' && !credential.tokenType.trim()) {
      throw new Error('Token type cannot be empty');
    }
  }

  private freeze(credential: Credential): Credential {
    const copy: Credential = credential.session
      ? { ...credential, session: Object.freeze({ ...credential.session }) }
      : { ...credential };
    return Object.freeze(copy);
  }

  private describeExpiry(credential: Credential): string {
    if (credential.expiresAt === null) {
      return 'never';
    }
    const time = credential.expiresAt.getTime();
    return Number.isNaN(time) ? 'invalid-date' : credential.expiresAt.toISOString();
  }

  private notify(credential: Credential | null): void {
    for (const listener of this.listeners) {
      try {
        listener(credential);
      } catch (error) {
        logError('auth:credential_listener', error);
      }
    }
  }
}
