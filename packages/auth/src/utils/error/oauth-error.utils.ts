/**
 * OAuth error handling utilities
 */

import { parseErrorResponse } from './parse-error-response.js';
import { createOAuth2Error } from './create-oauth2-error.js';
import { isRetryableError } from './is-retryable-error.js';

/**
 * Static access to token endpoint error parsing and classification.
 *
 * @example
 * ```typescript
 * const errorResponse = await OAuthErrorUtils.parseErrorResponse(response);
 * const error = OAuthErrorUtils.createOAuth2Error(errorResponse, response.status);
 * if (OAuthErrorUtils.isRetryableError(error)) {
 *   // caller-side backoff
 * }
 * ```
 *
 * @public
 */
export class OAuthErrorUtils {
  public static parseErrorResponse = parseErrorResponse;
  public static createOAuth2Error = createOAuth2Error;
  public static isRetryableError = isRetryableError;
}

export { parseErrorResponse } from './parse-error-response.js';
export { createOAuth2Error } from './create-oauth2-error.js';
export { isRetryableError } from './is-retryable-error.js';
