import { logEvent, RequestUtils, type RequestScope } from '@helio/core';
import { AuthenticationError, TokenUtils } from '@helio/auth';
import type { Credential, HttpMethod, QueryParams } from '@helio/models';
import { ApiError } from '../errors/api-error.js';
import type { ResponseSchema } from '../schemas.js';

/**
 * Source of the credential attached to each request. `Authenticator`
 * satisfies it.
 * @public
 */
export interface CredentialProvider {
  /** Active credential, renewed first when it is expired */
  ensureValidCredential(options?: { signal?: AbortSignal }): Promise<Credential>;
  /** Renews the active credential unconditionally */
  refresh(options?: { signal?: AbortSignal }): Promise<Credential>;
}

/**
 * @public
 */
export interface ApiClientConfig {
  apiUrl: string;
  apiVersion: string;
  /** Log every request and response at info level instead of debug */
  verbose?: boolean;
  requestTimeoutMs?: number;
  /** Id of the owning client, added to every request log line */
  instanceId?: string;
}

/**
 * @public
 */
export interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  signal?: AbortSignal;
}

interface RawResponse {
  status: number;
  statusText: string;
  ok: boolean;
  payload: unknown;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Builds `?a=1&b=x&b=y` from query params. `undefined`, `null` and empty
 * strings are skipped; array values are repeated.
 * @public
 */
export function buildQueryString(query?: QueryParams): string {
  if (!query) return '';

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null || value === '') continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        params.append(key, String(item));
      }
    } else {
      params.append(key, String(value));
    }
  }

  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

function stripEnvelopeKeys(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return payload;
  }
  return Object.fromEntries(
    Object.entries(payload).filter(([key]) => key !== 'meta' && key !== 'error'),
  );
}

function errorField(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return undefined;
  }
  return Object.entries(payload).find(([key]) => key === 'error')?.[1];
}

/**
 * JSON HTTP client for the platform's versioned REST API.
 *
 * Every request carries the active credential. An expired credential is
 * renewed before the request; a 401 on a renewable credential triggers one
 * renewal and one retry. Renewal failures surface as AuthenticationError,
 * everything else as ApiError.
 * @public
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly verbose: boolean;
  private readonly timeoutMs: number;
  private readonly instanceId?: string;

  public constructor(
    config: ApiClientConfig,
    private readonly credentials: CredentialProvider,
  ) {
    if (!config.apiUrl) {
      throw AuthenticationError.configuration('apiUrl is required');
    }
    if (!config.apiVersion) {
      throw AuthenticationError.configuration('apiVersion is required');
    }
    this.baseUrl = `${config.apiUrl.replace(/\/+$/, '')}/v${config.apiVersion}`;
    this.verbose = config.verbose ?? false;
    this.timeoutMs = config.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.instanceId = config.instanceId;
  }

  /**
   * Full request URL for a path relative to the API version root
   */
  public url(path: string, query?: QueryParams): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}${buildQueryString(query)}`;
  }

  /**
   * Sends a request and parses the body with `schema`.
   *
   * A 204 response parses `undefined`. `meta` and `error` keys are removed
   * from object bodies before parsing.
   * @throws {AuthenticationError} When no credential is installed or renewal fails
   * @throws {ApiError} For non-2xx responses, 2xx bodies carrying `error`, transport failures and unexpected shapes
   */
  public async request<T>(
    method: HttpMethod,
    path: string,
    schema: ResponseSchema<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    const url = this.url(path, options.query);
    const { signal } = options;

    const credential = await this.credentials.ensureValidCredential({ signal });
    let response = await this.send(method, url, credential, options);

    if (response.status === 401 && credential.method !== 'api_key') {
      logEvent('info', 'sdk:unauthorized_retry', { method, path });
      const renewed = await this.credentials.refresh({ signal });
      response = await this.send(method, url, renewed, options);
    }

    if (!response.ok) {
      throw ApiError.fromResponse(
        response.status,
        response.statusText,
        response.payload,
      );
    }

    const error = errorField(response.payload);
    if (error) {
      throw ApiError.fromErrorField(response.status, error);
    }

    const parsed = schema.safeParse(stripEnvelopeKeys(response.payload));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw ApiError.invalidResponse(
        response.status,
        issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'unexpected shape',
        parsed.error,
      );
    }
    return parsed.data;
  }

  private async send(
    method: HttpMethod,
    url: string,
    credential: Credential,
    options: RequestOptions,
  ): Promise<RawResponse> {
    if (options.signal?.aborted) {
      throw ApiError.cancelled();
    }

    const requestId = RequestUtils.generateRequestId();
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: TokenUtils.authorizationHeader(credential),
      'X-Request-ID': requestId,
    };
    const hasBody = options.body !== undefined && method !== 'GET';
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    logEvent(this.verbose ? 'info' : 'debug', 'sdk:request', {
      instanceId: this.instanceId,
      requestId,
      method,
      url,
      hasBody,
    });

    const scope = RequestUtils.openRequestScope(this.timeoutMs, options.signal);
    try {
      const response = await fetch(url, {
        method,
        headers,
        body: hasBody ? JSON.stringify(options.body) : undefined,
        signal: scope.signal,
      });
      const payload = await this.readBody(response);

      logEvent(this.verbose ? 'info' : 'debug', 'sdk:response', {
        instanceId: this.instanceId,
        requestId,
        method,
        url,
        status: response.status,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        payload,
      };
    } catch (error) {
      throw this.transportError(error, scope, options.signal);
    } finally {
      scope.dispose();
    }
  }

  private async readBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) {
      return text;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw ApiError.invalidResponse(
        response.status,
        'body is not valid JSON',
        error instanceof Error ? error : undefined,
      );
    }
  }

  private transportError(
    error: unknown,
    scope: RequestScope,
    callerSignal?: AbortSignal,
  ): ApiError {
    if (error instanceof ApiError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    if (callerSignal?.aborted) {
      return ApiError.cancelled(cause);
    }
    if (scope.timedOut()) {
      return ApiError.timeout(this.timeoutMs, cause);
    }
    return ApiError.networkError(
      error instanceof Error ? error.message : String(error),
      cause,
    );
  }
}
