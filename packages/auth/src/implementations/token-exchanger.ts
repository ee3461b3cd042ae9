import { logEvent, RequestUtils, type RequestScope } from '@helio/core';
import type {
  TokenEndpointConfig,
  TokenRequest,
  TokenResponse,
} from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { TokenResponseSchema } from '../schemas.js';
import { OAuthErrorUtils } from '../utils/error/oauth-error.utils.js';
import { AUTH_REQUEST_TIMEOUT_MS } from '../utils/oauth-types.js';
import {
  buildTokenRequestBody,
  buildTokenRequestHeaders,
  signOutEndpointUrl,
  tokenEndpointUrl,
} from '../utils/token-exchange.js';

/**
 * Per-call options for token endpoint requests.
 * @public
 */
export interface ExchangeOptions {
  /** Aborting it cancels the request and leaves all state unchanged */
  signal?: AbortSignal;
}

/**
 * HTTP transport to the platform's auth endpoints.
 *
 * One form-encoded POST per call, no retries: every grant goes to
 * `{apiUrl}/v{apiVersion}/auth/token`, sign-out to `.../auth/signout`.
 * Failures surface as AuthenticationError with a `kind` the caller can act on:
 * - 4xx OAuth error bodies: `invalid_grant` or `configuration`
 * - 5xx and malformed success bodies: `server`
 * - fetch rejections, timeouts and cancellation: `transport`
 * @public
 */
export class TokenExchanger {
  private readonly config: TokenEndpointConfig;
  private readonly timeoutMs: number;

  public constructor(config: TokenEndpointConfig) {
    if (!config.apiUrl) {
      throw AuthenticationError.configuration('apiUrl is required');
    }
    if (!config.apiVersion) {
      throw AuthenticationError.configuration('apiVersion is required');
    }
    this.config = { ...config };
    this.timeoutMs = config.requestTimeoutMs ?? AUTH_REQUEST_TIMEOUT_MS;
  }

  public get endpoint(): string {
    return tokenEndpointUrl(this.config);
  }

  public get signOutEndpoint(): string {
    return signOutEndpointUrl(this.config);
  }

  /**
   * Returns an exchanger for the same endpoint with some settings replaced.
   */
  public withConfig(overrides: Partial<TokenEndpointConfig>): TokenExchanger {
    return new TokenExchanger({ ...this.config, ...overrides });
  }

  /**
   * Exchanges one grant for a validated token response.
   * @throws {AuthenticationError} Mapped by failure kind; see class docs
   */
  public async exchange(
    request: TokenRequest,
    options: ExchangeOptions = {},
  ): Promise<TokenResponse> {
    this.throwIfAborted(options.signal);

    const body = buildTokenRequestBody(request, this.config);
    const requestId = RequestUtils.generateRequestId();

    logEvent('debug', 'auth:token_exchange_start', {
      requestId,
      grantType: request.grantType,
      tokenEndpoint: this.endpoint,
    });

    const scope = RequestUtils.openRequestScope(this.timeoutMs, options.signal);
    try {
      const response = await this.send(
        this.endpoint,
        {
          method: 'POST',
          headers: buildTokenRequestHeaders(requestId),
          body: body.toString(),
        },
        scope,
        options.signal,
      );

      if (!response.ok) {
        const errorResponse = await OAuthErrorUtils.parseErrorResponse(response);
        const error = OAuthErrorUtils.createOAuth2Error(
          errorResponse,
          response.status,
        );
        logEvent('warn', 'auth:token_exchange_failed', {
          requestId,
          grantType: request.grantType,
          status: response.status,
          code: error.code,
          kind: error.kind,
        });
        throw error;
      }

      const tokenResponse = await this.readTokenResponse(
        response,
        scope,
        options.signal,
      );

      logEvent('debug', 'auth:token_exchange_complete', {
        requestId,
        grantType: request.grantType,
        expiresIn: tokenResponse.expires_in,
        hasRefreshToken: tokenResponse.refresh_token !== undefined,
      });

      return tokenResponse;
    } finally {
      scope.dispose();
    }
  }

  /**
   * Invalidates the server-side session behind a bearer secret.
   * @throws {AuthenticationError} When the platform rejects the request or it cannot be sent
   */
  public async signOut(
    secret: string,
    options: ExchangeOptions = {},
  ): Promise<void> {
    this.throwIfAborted(options.signal);

    const requestId = RequestUtils.generateRequestId();
    const scope = RequestUtils.openRequestScope(this.timeoutMs, options.signal);
    try {
      const response = await this.send(
        this.signOutEndpoint,
        {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            Authorization: `Bearer ${secret}`,
            'X-Request-ID': requestId,
          },
        },
        scope,
        options.signal,
      );

      if (!response.ok) {
        const errorResponse = await OAuthErrorUtils.parseErrorResponse(response);
        throw OAuthErrorUtils.createOAuth2Error(errorResponse, response.status);
      }

      logEvent('debug', 'auth:sign_out_complete', { requestId });
    } finally {
      scope.dispose();
    }
  }

  private async send(
    url: string,
    init: RequestInit,
    scope: RequestScope,
    callerSignal?: AbortSignal,
  ): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: scope.signal });
    } catch (error) {
      throw this.transportError(error, scope, callerSignal);
    }
  }

  private async readTokenResponse(
    response: Response,
    scope: RequestScope,
    callerSignal?: AbortSignal,
  ): Promise<TokenResponse> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (scope.signal.aborted) {
        throw this.transportError(error, scope, callerSignal);
      }
      throw AuthenticationError.invalidTokenResponse(
        'body is not valid JSON',
        error instanceof Error ? error : undefined,
      );
    }

    this.throwIfAborted(callerSignal);

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw AuthenticationError.invalidTokenResponse(
        issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'unexpected shape',
        parsed.error,
      );
    }
    return parsed.data;
  }

  private transportError(
    error: unknown,
    scope: RequestScope,
    callerSignal?: AbortSignal,
  ): AuthenticationError {
    if (error instanceof AuthenticationError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    if (callerSignal?.aborted) {
      return AuthenticationError.cancelled(cause);
    }
    if (scope.timedOut()) {
      return AuthenticationError.networkError(
        `request timed out after ${this.timeoutMs}ms`,
        cause,
      );
    }
    return AuthenticationError.networkError(
      error instanceof Error ? error.message : String(error),
      cause,
    );
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw AuthenticationError.cancelled();
    }
  }
}
