/**
 * Codes the client assigns itself. Codes sent by the platform in an error
 * body are passed through unchanged.
 */
export enum ApiErrorCode {
  HTTP_ERROR = 'http_error',
  NETWORK_ERROR = 'network_error',
  REQUEST_TIMEOUT = 'request_timeout',
  REQUEST_CANCELLED = 'request_cancelled',
  INVALID_RESPONSE = 'invalid_response',
  UNKNOWN_ERROR = 'unknown_error',
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(
  record: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Failure of a resource call.
 *
 * `status` is the HTTP status when a response arrived, 0 otherwise.
 * @public
 */
export class ApiError extends Error {
  public readonly status: number;
  public readonly code: string;
  public override readonly cause?: Error;

  public constructor(
    message: string,
    status: number,
    code: string = ApiErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.cause = cause;

    Object.setPrototypeOf(this, ApiError.prototype);
  }

  /**
   * True for 5xx responses and for failures where no response arrived
   */
  public get retryable(): boolean {
    if (this.status >= 500) return true;
    return (
      this.code === ApiErrorCode.NETWORK_ERROR ||
      this.code === ApiErrorCode.REQUEST_TIMEOUT
    );
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      code: this.code,
      cause: this.cause?.message,
    };
  }

  /**
   * Builds an error from a non-2xx response body.
   *
   * Reads `message`, then `error` (string or `{ message, code }`), then falls
   * back to the status line.
   */
  public static fromResponse(
    status: number,
    statusText: string,
    body: unknown,
  ): ApiError {
    const fallback = `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
    if (!isRecord(body)) {
      return new ApiError(fallback, status, ApiErrorCode.HTTP_ERROR);
    }

    const nested = isRecord(body.error) ? body.error : undefined;
    const message =
      stringField(body, 'message') ??
      stringField(body, 'error') ??
      (nested && stringField(nested, 'message')) ??
      fallback;
    const code =
      stringField(body, 'code') ??
      (nested && stringField(nested, 'code')) ??
      ApiErrorCode.HTTP_ERROR;

    return new ApiError(message, status, code);
  }

  /**
   * Builds an error from a 2xx body that still carries an `error` field
   */
  public static fromErrorField(status: number, error: unknown): ApiError {
    if (typeof error === 'string') {
      return new ApiError(error, status, ApiErrorCode.HTTP_ERROR);
    }
    if (isRecord(error)) {
      return new ApiError(
        stringField(error, 'message') ?? 'Request failed',
        status,
        stringField(error, 'code') ?? ApiErrorCode.HTTP_ERROR,
      );
    }
    return new ApiError('Request failed', status, ApiErrorCode.HTTP_ERROR);
  }

  public static networkError(message: string, cause?: Error): ApiError {
    return new ApiError(
      `Network error: ${message}`,
      0,
      ApiErrorCode.NETWORK_ERROR,
      cause,
    );
  }

  public static timeout(timeoutMs: number, cause?: Error): ApiError {
    return new ApiError(
      `Request timed out after ${timeoutMs}ms`,
      0,
      ApiErrorCode.REQUEST_TIMEOUT,
      cause,
    );
  }

  public static cancelled(cause?: Error): ApiError {
    return new ApiError(
      'Request was cancelled',
      0,
      ApiErrorCode.REQUEST_CANCELLED,
      cause,
    );
  }

  public static invalidResponse(
    status: number,
    detail: string,
    cause?: Error,
  ): ApiError {
    return new ApiError(
      `Invalid response: ${detail}`,
      status,
      ApiErrorCode.INVALID_RESPONSE,
      cause,
    );
  }
}
