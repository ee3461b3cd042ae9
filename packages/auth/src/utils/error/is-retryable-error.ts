import { AuthenticationError } from '../../errors/authentication-error.js';

const RETRYABLE_NETWORK_CODES = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'ECONNABORTED',
];

/**
 * Determines whether retrying the failed operation can succeed.
 *
 * Authentication errors answer through their `kind`: transport and server
 * failures are retryable, configuration and invalid-grant failures never are.
 * Plain errors are retryable when they look like a transient network failure.
 * The SDK never retries on its own; this is for callers that add backoff.
 * @public
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AuthenticationError) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const errorMessage = error.message.toLowerCase();

  if (
    RETRYABLE_NETWORK_CODES.some((code) =>
      errorMessage.includes(code.toLowerCase()),
    )
  ) {
    return true;
  }

  return (
    errorMessage.includes('network') ||
    errorMessage.includes('timeout') ||
    errorMessage.includes('socket hang up')
  );
}
