/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Error codes raised by the SDK itself rather than the authorization server
 */
export enum AuthErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  REAUTHENTICATION_REQUIRED = 'reauthentication_required',
  NETWORK_ERROR = 'network_error',
  REQUEST_CANCELLED = 'request_cancelled',
  ENTROPY_UNAVAILABLE = 'entropy_unavailable',
  INVALID_TOKEN_RESPONSE = 'invalid_token_response',
  MISSING_TOKEN = 'missing_token',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Failure categories callers act on:
 * - `configuration`: fix the setup, do not retry
 * - `invalid_grant`: re-authenticate, retrying the same inputs always fails
 * - `transport`: network failure, timeout or cancellation; retry with backoff
 * - `server`: 5xx or malformed success body; retry with backoff
 * - `crypto`: the runtime cannot produce random bytes; fatal
 */
export type AuthErrorKind =
  | 'configuration'
  | 'invalid_grant'
  | 'transport'
  | 'server'
  | 'crypto'
  | 'unknown';

const KIND_BY_CODE: Record<ErrorCode, AuthErrorKind> = {
  [OAuth2ErrorCode.INVALID_REQUEST]: 'configuration',
  [OAuth2ErrorCode.UNSUPPORTED_GRANT_TYPE]: 'configuration',
  [OAuth2ErrorCode.INVALID_SCOPE]: 'configuration',
  [OAuth2ErrorCode.UNSUPPORTED_RESPONSE_TYPE]: 'configuration',
  [OAuth2ErrorCode.INVALID_GRANT]: 'invalid_grant',
  [OAuth2ErrorCode.INVALID_CLIENT]: 'invalid_grant',
  [OAuth2ErrorCode.UNAUTHORIZED_CLIENT]: 'invalid_grant',
  [OAuth2ErrorCode.ACCESS_DENIED]: 'invalid_grant',
  [OAuth2ErrorCode.SERVER_ERROR]: 'server',
  [OAuth2ErrorCode.TEMPORARILY_UNAVAILABLE]: 'server',
  [AuthErrorCode.CONFIGURATION_ERROR]: 'configuration',
  [AuthErrorCode.REAUTHENTICATION_REQUIRED]: 'invalid_grant',
  [AuthErrorCode.NETWORK_ERROR]: 'transport',
  [AuthErrorCode.REQUEST_CANCELLED]: 'transport',
  [AuthErrorCode.ENTROPY_UNAVAILABLE]: 'crypto',
  [AuthErrorCode.INVALID_TOKEN_RESPONSE]: 'server',
  [AuthErrorCode.MISSING_TOKEN]: 'configuration',
  [AuthErrorCode.UNKNOWN_ERROR]: 'unknown',
};

/**
 * Maps an error code to its failure category
 */
export function kindOf(code: ErrorCode): AuthErrorKind {
  return KIND_BY_CODE[code];
}

/**
 * Authentication error with an OAuth2/SDK error code and a failure kind.
 * Messages are sanitized so tokens and secrets never leak into logs.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: AuthErrorKind;
  public readonly status?: number;
  public override readonly cause?: Error;

  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
    status?: number,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.kind = kindOf(code);
    this.cause = cause;
    this.status = status;

    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  /**
   * True for transport and server failures; the SDK itself never retries
   */
  public get retryable(): boolean {
    return this.kind === 'transport' || this.kind === 'server';
  }

  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\b[a-zA-Z0-9+/_-]{32,}={0,2}/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bcode_verifier[=:]\s*[^\s&]+/gi, 'code_verifier=[REDACTED]')
      .replace(/\bpassword[=:]\s*[^\s&]+/gi, 'password=[REDACTED]');
  }

  /**
   * Missing or invalid setup detected before any network call
   */
  public static configuration(description: string): AuthenticationError {
    return new AuthenticationError(
      `Configuration error: ${description}`,
      AuthErrorCode.CONFIGURATION_ERROR,
    );
  }

  public static invalidGrant(
    description?: string,
    cause?: Error,
  ): AuthenticationError {
    const message = description
      ? `Invalid grant: ${description}`
      : 'The provided authorization grant is invalid, expired, revoked, or does not match the code verifier';
    return new AuthenticationError(
      message,
      OAuth2ErrorCode.INVALID_GRANT,
      cause,
    );
  }

  /**
   * The refresh token was rejected; the user has to sign in again
   */
  public static reauthenticationRequired(cause?: Error): AuthenticationError {
    return new AuthenticationError(
      'Refresh token was rejected; re-authentication required',
      AuthErrorCode.REAUTHENTICATION_REQUIRED,
      cause,
      cause instanceof AuthenticationError ? cause.status : undefined,
    );
  }

  public static networkError(
    message: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      `Network error during authentication: ${message}`,
      AuthErrorCode.NETWORK_ERROR,
      cause,
    );
  }

  public static cancelled(cause?: Error): AuthenticationError {
    return new AuthenticationError(
      'Authentication request was cancelled',
      AuthErrorCode.REQUEST_CANCELLED,
      cause,
    );
  }

  public static serverError(status: number, cause?: Error): AuthenticationError {
    return new AuthenticationError(
      `Authorization server error (HTTP ${status})`,
      OAuth2ErrorCode.SERVER_ERROR,
      cause,
      status,
    );
  }

  public static entropyUnavailable(cause?: Error): AuthenticationError {
    return new AuthenticationError(
      'Secure random source is unavailable',
      AuthErrorCode.ENTROPY_UNAVAILABLE,
      cause,
    );
  }

  public static invalidTokenResponse(
    description: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      `Invalid token response: ${description}`,
      AuthErrorCode.INVALID_TOKEN_RESPONSE,
      cause,
    );
  }

  /**
   * No credential is installed for an operation that needs one
   */
  public static missingToken(operation: string): AuthenticationError {
    return new AuthenticationError(
      `No active credential for ${operation}; sign in first`,
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  /**
   * JSON representation for structured logs
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      status: this.status,
      cause: this.cause?.message,
    };
  }
}
