import type { TokenErrorResponse } from '../oauth-types.js';
import { TokenErrorResponseSchema } from '../../schemas.js';

function fallbackCode(status: number): string {
  if (status >= 500) return 'server_error';
  // The presented credentials were rejected without an RFC 6749 body
  if (status === 401 || status === 403) return 'invalid_grant';
  return 'invalid_request';
}

function fallbackError(response: Response, description?: string): TokenErrorResponse {
  const statusLine = response.statusText
    ? `HTTP ${response.status} ${response.statusText}`
    : `HTTP ${response.status}`;
  return {
    error: fallbackCode(response.status),
    error_description: description ? `${statusLine}: ${description}` : statusLine,
  };
}

/**
 * Parses a failed token endpoint response into an OAuth2 error body.
 *
 * Accepts RFC 6749 bodies (`{ error, error_description }`), the same wrapped
 * in a `{ data }` envelope, and platform bodies that only carry a `message`.
 * Anything else, including a non-JSON body, falls back by status:
 * - 5xx maps to 'server_error'
 * - 401 and 403 map to 'invalid_grant'
 * - everything else maps to 'invalid_request'
 * @param response - Failed HTTP response (`!response.ok`)
 * @returns Never throws
 * @see file:./create-oauth2-error.ts - Converts this response to AuthenticationError
 * @public
 */
export async function parseErrorResponse(
  response: Response,
): Promise<TokenErrorResponse> {
  let errorData: unknown;
  try {
    errorData = await response.json();
  } catch {
    return fallbackError(response);
  }

  const parsed = TokenErrorResponseSchema.safeParse(errorData);
  if (parsed.success) {
    return parsed.data;
  }

  const message =
    typeof errorData === 'object' &&
    errorData !== null &&
    'message' in errorData &&
    typeof errorData.message === 'string'
      ? errorData.message
      : undefined;
  return fallbackError(response, message);
}
