import { type ICredentialStore, logEvent } from '@helio/core';
import type {
  ApiKeyCredential,
  Credential,
  Session,
  SignOutResult,
  TokenEndpointConfig,
} from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { TokenUtils } from '../utils/token/token.utils.js';
import { Authenticator, type AuthenticatorOptions } from './authenticator.js';
import { MemoryCredentialStore } from './memory-credential-store.js';
import { TokenExchanger, type ExchangeOptions } from './token-exchanger.js';

/**
 * @public
 */
export interface AuthClientConfig extends TokenEndpointConfig, AuthenticatorOptions {
  /** Used with `clientId` to re-exchange client credentials on refresh */
  clientSecret?: string;
}

interface ClientIdentity {
  clientId: string;
  clientSecret: string;
}

function requireValue(value: string, field: string): void {
  if (!value || !value.trim()) {
    throw AuthenticationError.configuration(`${field} is required`);
  }
}

/**
 * Password, client-credential and API-key authentication against the
 * platform, plus refresh and sign-out.
 *
 * @example
 * ```typescript
 * const auth = new AuthClient({
 *   apiUrl: 'https://api.helio.dev',
 *   apiVersion: '1',
 *   clientId: 'client-1',
 * });
 * await auth.signInWithPassword('user@example.com', 'hunter2');
 * const headers = await auth.getHeaders();
 * ```
 * @public
 */
export class AuthClient extends Authenticator {
  private readonly config: AuthClientConfig;
  private clientIdentity?: ClientIdentity;

  public constructor(
    config: AuthClientConfig,
    store: ICredentialStore = new MemoryCredentialStore({
      expirySkewMs: config.expirySkewMs,
    }),
    exchanger: TokenExchanger = new TokenExchanger(config),
  ) {
    super(exchanger, store, config);
    this.config = { ...config };
  }

  /**
   * Signs in with an email and password
   * @throws {AuthenticationError} kind `configuration` for empty inputs, `invalid_grant` for rejected credentials
   */
  public async signInWithPassword(
    email: string,
    password: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    requireValue(email, 'email');
    requireValue(password, 'password');

    return this.authenticate(
      { grantType: 'password', email, password },
      'password',
      options,
    );
  }

  /**
   * Signs in as a client application.
   *
   * The client identity is remembered in memory so `refresh()` can re-exchange it.
   */
  public async signInWithClient(
    clientId: string,
    clientSecret: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    requireValue(clientId, 'clientId');
    requireValue(clientSecret, 'clientSecret');

    const credential = await this.authenticate(
      { grantType: 'client_credentials', clientId, clientSecret },
      'client_credentials',
      options,
    );
    this.clientIdentity = { clientId, clientSecret };
    return credential;
  }

  /**
   * Exchanges a refresh token, explicit or the active credential's.
   *
   * The new credential keeps the active credential's method; with no active
   * token pair it is a `password` credential.
   * @throws {AuthenticationError} kind `configuration` when no refresh token exists, without a network call
   */
  public async refreshToken(
    refreshToken?: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    const active = this.store.current();
    const method = active?.method === 'oauth' ? 'oauth' : 'password';
    return this.refreshWithToken(refreshToken, method, options);
  }

  /**
   * Same as refreshToken, producing an `oauth` credential
   */
  public async refreshOAuthToken(
    refreshToken?: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    return this.refreshWithToken(refreshToken, 'oauth', options);
  }

  /**
   * Installs a static API key as the active credential
   */
  public useApiKey(apiKey: string): ApiKeyCredential {
    requireValue(apiKey, 'apiKey');

    const credential: ApiKeyCredential = {
      method: 'api_key',
      apiKey,
      issuedAt: new Date(),
      expiresAt: null,
    };
    this.store.install(credential);
    return credential;
  }

  /**
   * Identity claims of the active credential; no network call
   */
  public getSession(): Session | null {
    return this.store.current()?.session ?? null;
  }

  /**
   * Invalidates the server-side session and clears local state.
   *
   * Local state is cleared whether or not the remote call succeeds. A remote
   * failure is logged and reported in the result, never thrown.
   * @param apiKey - Secret to revoke instead of the active credential's
   */
  public async signOut(
    apiKey?: string,
    options: ExchangeOptions = {},
  ): Promise<SignOutResult> {
    const active = this.store.current();
    const secret = apiKey ?? (active ? TokenUtils.credentialSecret(active) : undefined);

    try {
      if (!secret) {
        return { remoteRevoked: false };
      }
      await this.exchanger.signOut(secret, options);
      logEvent('info', 'auth:signed_out', { method: active?.method });
      return { remoteRevoked: true };
    } catch (error) {
      const failure =
        error instanceof Error ? error : new Error(String(error));
      logEvent('warn', 'auth:sign_out_remote_failed', {
        error: failure.message,
        kind: failure instanceof AuthenticationError ? failure.kind : undefined,
      });
      return { remoteRevoked: false, error: failure };
    } finally {
      this.store.clear();
      this.clientIdentity = undefined;
    }
  }

  /**
   * Renews by the active credential's method:
   * - `api_key`: nothing to renew, returns it unchanged
   * - `password` / `oauth`: refresh-token exchange
   * - `client_credentials`: re-exchange with the remembered or configured client
   */
  protected async renewCredential(
    options: ExchangeOptions,
  ): Promise<Credential> {
    const active = this.store.current();
    if (!active) {
      throw AuthenticationError.missingToken('refresh');
    }

    switch (active.method) {
      case 'api_key':
        return active;
      case 'password':
      case 'oauth':
        return this.refreshWithToken(undefined, active.method, options);
      case 'client_credentials': {
        const identity = this.resolveClientIdentity(active.clientId);
        return this.authenticate(
          {
            grantType: 'client_credentials',
            clientId: identity.clientId,
            clientSecret: identity.clientSecret,
          },
          'client_credentials',
          options,
        );
      }
    }
  }

  private resolveClientIdentity(clientId: string): ClientIdentity {
    if (this.clientIdentity?.clientId === clientId) {
      return this.clientIdentity;
    }
    if (this.config.clientId === clientId && this.config.clientSecret) {
      return { clientId, clientSecret: this.config.clientSecret };
    }
    throw AuthenticationError.configuration(
      'client secret unavailable; sign in with the client again',
    );
  }
}
