import { type ICredentialStore, logEvent } from '@helio/core';
import type {
  AuthMethod,
  Credential,
  TokenRequest,
  TokenResponse,
} from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { AUTH_EXPIRY_SKEW_MS } from '../utils/oauth-types.js';
import { TokenUtils } from '../utils/token/token.utils.js';
import type { ExchangeOptions, TokenExchanger } from './token-exchanger.js';

/**
 * Methods whose credentials come from the token endpoint.
 * @public
 */
export type TokenMethod = Exclude<AuthMethod, 'api_key'>;

/**
 * @public
 */
export interface AuthenticateOptions extends ExchangeOptions {
  /** Kept on the new credential when the response carries no refresh token */
  previousRefreshToken?: string;
}

/**
 * @public
 */
export interface AuthenticatorOptions {
  /** Safety margin before expiry, 60 s when omitted */
  expirySkewMs?: number;
}

/**
 * Shared credential lifecycle for every sign-in flow.
 *
 * Provides:
 * - `authenticate`: exchange a grant, build the credential, install it
 * - header generation and validity checks against the credential store
 * - single-flight `refresh`: concurrent callers share one in-flight renewal
 * - refresh-token rotation with reauthentication mapping
 *
 * Nothing is installed unless the whole exchange succeeds; a failed or
 * cancelled call leaves the store untouched. There are no background timers:
 * refresh happens when a caller asks for it or a request finds the
 * credential expired.
 * @public
 */
export abstract class Authenticator {
  protected readonly exchanger: TokenExchanger;
  protected readonly store: ICredentialStore;
  protected readonly expirySkewMs: number;
  private refreshPromise?: Promise<Credential>;

  public constructor(
    exchanger: TokenExchanger,
    store: ICredentialStore,
    options: AuthenticatorOptions = {},
  ) {
    this.exchanger = exchanger;
    this.store = store;
    this.expirySkewMs = options.expirySkewMs ?? AUTH_EXPIRY_SKEW_MS;
  }

  /**
   * The active credential, or null when signed out
   * @public
   */
  public get credential(): Credential | null {
    return this.store.current();
  }

  /**
   * `Bearer <secret>` for the active credential, without refreshing
   * @public
   */
  public getAuthorizationHeader(): string | null {
    const credential = this.store.current();
    return credential ? TokenUtils.authorizationHeader(credential) : null;
  }

  /**
   * Returns request headers, refreshing first when the credential is expired
   * @throws {AuthenticationError} When no credential is installed or the refresh fails
   * @public
   */
  public async getHeaders(
    options: ExchangeOptions = {},
  ): Promise<Record<string, string>> {
    const credential = await this.ensureValidCredential(options);
    return {
      Authorization: TokenUtils.authorizationHeader(credential),
    };
  }

  /**
   * True when a credential is installed and outside the expiry margin
   * @public
   */
  public isValid(now: number = Date.now()): boolean {
    return !TokenUtils.isCredentialExpired(
      this.store.current(),
      now,
      this.expirySkewMs,
    );
  }

  /**
   * Renews the active credential.
   *
   * Calls made while a renewal is in flight join it and receive the same
   * result; the joining caller's signal is not consulted.
   * @throws {AuthenticationError} When renewal fails; the store keeps its previous credential
   * @public
   */
  public async refresh(options: ExchangeOptions = {}): Promise<Credential> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.renewCredential(options);

    try {
      return await this.refreshPromise;
    } finally {
      this.refreshPromise = undefined;
    }
  }

  /**
   * Returns the active credential, refreshing it first when expired
   * @throws {AuthenticationError} kind `configuration` when none is installed
   * @public
   */
  public async ensureValidCredential(
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    const credential = this.store.current();
    if (!credential) {
      throw AuthenticationError.missingToken('this request');
    }
    if (!TokenUtils.isCredentialExpired(credential, Date.now(), this.expirySkewMs)) {
      return credential;
    }

    logEvent('info', 'auth:token_refresh', {
      reason: 'expired',
      method: credential.method,
    });
    return this.refresh(options);
  }

  /**
   * Exchanges a grant and installs the resulting credential.
   *
   * The signal is checked again after the response arrives: a cancellation
   * that lands between the response and installation discards the result.
   * So does a store clear (sign-out) made while the exchange was in flight.
   * @throws {AuthenticationError} Mapped by failure kind
   * @public
   */
  public async authenticate(
    request: TokenRequest,
    method: TokenMethod,
    options: AuthenticateOptions = {},
  ): Promise<Credential> {
    const generation = this.store.generation();
    const tokenResponse = await this.exchanger.exchange(request, {
      signal: options.signal,
    });
    const credential = this.buildCredential(
      tokenResponse,
      request,
      method,
      options.previousRefreshToken,
    );

    if (options.signal?.aborted) {
      throw AuthenticationError.cancelled();
    }
    if (this.store.generation() !== generation) {
      logEvent('info', 'auth:credential_discarded', {
        method,
        grantType: request.grantType,
        reason: 'store_cleared',
      });
      throw AuthenticationError.cancelled();
    }

    this.store.install(credential);

    logEvent('info', 'auth:credential_installed', {
      method,
      grantType: request.grantType,
      expiresAt: credential.expiresAt?.toISOString() ?? 'never',
      hasRefreshToken: TokenUtils.refreshTokenOf(credential) !== undefined,
    });

    // The store keeps a frozen copy
    return this.store.current() ?? credential;
  }

  /**
   * Exchanges a refresh token and installs the rotated credential.
   *
   * Uses the explicit token when given, else the active credential's. A
   * rejected refresh token is terminal and surfaces as
   * `reauthentication_required`.
   * @throws {AuthenticationError} kind `configuration` without any refresh token, before any network call
   * @protected
   */
  protected async refreshWithToken(
    refreshToken: string | undefined,
    method: 'password' | 'oauth',
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    const token = refreshToken ?? TokenUtils.refreshTokenOf(this.store.current());
    if (!token) {
      throw AuthenticationError.configuration(
        'No refresh token available; sign in again or pass one explicitly',
      );
    }

    logEvent('info', 'auth:token_refresh', {
      method,
      source: refreshToken ? 'explicit' : 'active_credential',
    });

    try {
      return await this.authenticate(
        { grantType: 'refresh_token', refreshToken: token },
        method,
        { signal: options.signal, previousRefreshToken: token },
      );
    } catch (error) {
      if (error instanceof AuthenticationError && error.kind === 'invalid_grant') {
        logEvent('warn', 'auth:reauthentication_required', {
          method,
          code: error.code,
        });
        throw AuthenticationError.reauthenticationRequired(error);
      }
      throw error;
    }
  }

  /**
   * Builds the credential for a token response
   * @throws {AuthenticationError} When a client credential is requested from another grant
   * @protected
   */
  protected buildCredential(
    tokenResponse: TokenResponse,
    request: TokenRequest,
    method: TokenMethod,
    previousRefreshToken?: string,
  ): Credential {
    const parsed = TokenUtils.parseTokenResponse(tokenResponse);

    if (method === 'client_credentials') {
      if (request.grantType !== 'client_credentials') {
        throw AuthenticationError.configuration(
          `${request.grantType} grant cannot produce a client credential`,
        );
      }
      return {
        method,
        accessToken: parsed.accessToken,
        clientId: request.clientId,
        tokenType: parsed.tokenType,
        scope: parsed.scope,
        issuedAt: parsed.issuedAt,
        expiresAt: parsed.expiresAt,
        session: parsed.session,
      };
    }

    return {
      method,
      accessToken: parsed.accessToken,
      refreshToken: parsed.refreshToken ?? previousRefreshToken,
      tokenType: parsed.tokenType,
      scope: parsed.scope,
      issuedAt: parsed.issuedAt,
      expiresAt: parsed.expiresAt,
      session: parsed.session,
    };
  }

  /**
   * Renews the active credential; called through the single-flight `refresh`
   * @protected
   */
  protected abstract renewCredential(
    options: ExchangeOptions,
  ): Promise<Credential>;
}
