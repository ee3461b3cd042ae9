import { type ICredentialStore, logEvent, ValidationUtils } from '@helio/core';
import type {
  AuthorizationUrlResult,
  Credential,
  OAuthConfig,
} from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { OAuthConfigSchema, type OAuthConfigInput } from '../schemas.js';
import { buildAuthorizationUrl } from '../utils/auth-url.js';
import { generatePkcePair, type RandomSource } from '../utils/pkce.js';
import { Authenticator, type AuthenticatorOptions } from './authenticator.js';
import { MemoryCredentialStore } from './memory-credential-store.js';
import { TokenExchanger, type ExchangeOptions } from './token-exchanger.js';

/**
 * @public
 */
export interface OAuthClientOptions extends AuthenticatorOptions {
  /** Shared exchanger; its client_id and redirect_uri are replaced by this client's */
  exchanger?: TokenExchanger;
  requestTimeoutMs?: number;
  /** Random source for PKCE, `crypto.randomBytes` by default */
  randomSource?: RandomSource;
}

function parseConfig(input: OAuthConfigInput | OAuthConfig): OAuthConfig {
  const result = OAuthConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw AuthenticationError.configuration(
      issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid OAuth config',
    );
  }
  return result.data;
}

/**
 * OAuth2 Authorization Code flow with PKCE (S256).
 *
 * The client builds the authorization URL and hands back the code verifier;
 * keeping the verifier across the redirect is the caller's job. After the
 * redirect, `authenticateWithCodeAndVerifier` exchanges the single-use code.
 *
 * @example
 * ```typescript
 * const oauth = new OAuthClient({
 *   clientId: 'client-1',
 *   redirectUri: 'https://app.example.com/callback',
 *   scopes: ['read', 'write'],
 *   appUrl: 'https://helio.dev',
 *   apiUrl: 'https://api.helio.dev',
 *   apiVersion: '1',
 * });
 * const { url, codeVerifier } = oauth.getAuthorizationUrlAndCodeVerifier();
 * // redirect to url, then on callback:
 * await oauth.authenticateWithCodeAndVerifier(code, codeVerifier);
 * ```
 * @public
 */
export class OAuthClient extends Authenticator {
  private readonly config: OAuthConfig;
  private readonly randomSource?: RandomSource;

  public constructor(
    config: OAuthConfigInput | OAuthConfig,
    store?: ICredentialStore,
    options: OAuthClientOptions = {},
  ) {
    const parsed = parseConfig(config);
    try {
      ValidationUtils.validateRequired(
        parsed,
        ['clientId', 'apiUrl', 'apiVersion'],
        'OAuth config',
      );
    } catch (error) {
      throw AuthenticationError.configuration(
        error instanceof Error ? error.message : String(error),
      );
    }

    const endpointConfig = {
      clientId: parsed.clientId,
      redirectUri: parsed.redirectUri || undefined,
    };
    const exchanger = options.exchanger
      ? options.exchanger.withConfig(endpointConfig)
      : new TokenExchanger({
          apiUrl: parsed.apiUrl,
          apiVersion: parsed.apiVersion,
          requestTimeoutMs: options.requestTimeoutMs,
          ...endpointConfig,
        });

    super(
      exchanger,
      store ?? new MemoryCredentialStore({ expirySkewMs: options.expirySkewMs }),
      options,
    );
    this.config = parsed;
    this.randomSource = options.randomSource;
  }

  /**
   * Builds the authorization URL with a fresh PKCE pair.
   *
   * Nothing is stored: the returned verifier must be kept by the caller and
   * presented with the code after the redirect.
   * @param state - CSRF state, overriding the configured one
   * @throws {AuthenticationError} kind `configuration` without clientId, redirectUri or scopes;
   * kind `crypto` when no secure randomness is available
   */
  public getAuthorizationUrlAndCodeVerifier(state?: string): AuthorizationUrlResult {
    const { codeVerifier, codeChallenge } = generatePkcePair(this.randomSource);
    const url = buildAuthorizationUrl({
      config: this.config,
      codeChallenge,
      state,
    });

    logEvent('debug', 'auth:authorization_url_created', {
      clientId: this.config.clientId,
      scopes: this.config.scopes,
      hasState: url.searchParams.has('state'),
    });

    return { url: url.toString(), codeVerifier };
  }

  /**
   * Exchanges the authorization code and its verifier for an `oauth` credential
   * @throws {AuthenticationError} kind `invalid_grant` for a used, expired or mismatched code
   */
  public async authenticateWithCodeAndVerifier(
    code: string,
    codeVerifier: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    if (!this.config.redirectUri) {
      throw AuthenticationError.configuration('redirect_uri is required');
    }

    return this.authenticate(
      { grantType: 'authorization_code', code, codeVerifier },
      'oauth',
      options,
    );
  }

  /**
   * Exchanges a refresh token, explicit or the active credential's
   */
  public async refreshToken(
    refreshToken?: string,
    options: ExchangeOptions = {},
  ): Promise<Credential> {
    return this.refreshWithToken(refreshToken, 'oauth', options);
  }

  /**
   * Configured scopes, in order
   */
  public get scopes(): readonly string[] {
    return this.config.scopes;
  }

  /**
   * Renews by the active credential's method. The store may be shared with an
   * AuthClient, so a `password` credential stays `password`; client
   * credentials carry no refresh token and are renewed by AuthClient only.
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
      case 'client_credentials':
        throw AuthenticationError.configuration(
          'client credentials cannot be renewed through an OAuth client',
        );
    }
  }
}
