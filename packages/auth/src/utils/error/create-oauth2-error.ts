import {
  AuthenticationError,
  OAuth2ErrorCode,
  kindOf,
  type ErrorCode,
} from '../../errors/authentication-error.js';
import type { TokenErrorResponse } from '../oauth-types.js';

function mapErrorCode(error: string, statusCode: number): ErrorCode {
  switch (error) {
    case 'invalid_request':
      return OAuth2ErrorCode.INVALID_REQUEST;
    case 'invalid_client':
      return OAuth2ErrorCode.INVALID_CLIENT;
    case 'invalid_grant':
      return OAuth2ErrorCode.INVALID_GRANT;
    case 'unauthorized_client':
      return OAuth2ErrorCode.UNAUTHORIZED_CLIENT;
    case 'unsupported_grant_type':
      return OAuth2ErrorCode.UNSUPPORTED_GRANT_TYPE;
    case 'invalid_scope':
      return OAuth2ErrorCode.INVALID_SCOPE;
    case 'access_denied':
      return OAuth2ErrorCode.ACCESS_DENIED;
    case 'unsupported_response_type':
      return OAuth2ErrorCode.UNSUPPORTED_RESPONSE_TYPE;
    case 'server_error':
      return OAuth2ErrorCode.SERVER_ERROR;
    case 'temporarily_unavailable':
      return OAuth2ErrorCode.TEMPORARILY_UNAVAILABLE;
    default:
      if (statusCode >= 500) {
        return OAuth2ErrorCode.SERVER_ERROR;
      }
      // Unrecognized rejections of the presented credentials
      if (statusCode === 401 || statusCode === 403) {
        return OAuth2ErrorCode.INVALID_GRANT;
      }
      return OAuth2ErrorCode.INVALID_REQUEST;
  }
}

/**
 * Creates an AuthenticationError from a token endpoint error body.
 *
 * RFC 6749 codes map one-to-one. A 5xx status always yields kind `server`,
 * whatever the body says. Unknown codes fall back on the status: 401/403 are
 * credential rejections (`invalid_grant`), other 4xx are `invalid_request`.
 * @param errorResponse - Error body from parseErrorResponse
 * @param statusCode - HTTP status of the failed request
 * @example
 * ```typescript
 * const error = createOAuth2Error({ error: 'invalid_grant' }, 400);
 * error.kind; // 'invalid_grant'
 * error.retryable; // false
 * ```
 * @see file:../../errors/authentication-error.ts - AuthenticationError class
 * @see file:./parse-error-response.ts - Parses the body from a fetch Response
 * @public
 */
export function createOAuth2Error(
  errorResponse: TokenErrorResponse,
  statusCode: number,
): AuthenticationError {
  const message = errorResponse.error_description
    ? `OAuth2 authentication failed: ${errorResponse.error} - ${errorResponse.error_description}`
    : `OAuth2 authentication failed: ${errorResponse.error}`;

  let errorCode = mapErrorCode(errorResponse.error, statusCode);
  if (statusCode >= 500 && kindOf(errorCode) !== 'server') {
    errorCode = OAuth2ErrorCode.SERVER_ERROR;
  }

  return new AuthenticationError(message, errorCode, undefined, statusCode);
}
