import { randomBytes } from 'crypto';

/**
 * Generates a request id of the form `[prefix_]timestamp_randomhex`.
 *
 * Sent as `X-Request-ID` so token and API calls can be correlated with log
 * events on both sides.
 * @param prefix - Optional namespace
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const timestamp = Date.now();
  const randomSuffix = randomBytes(4).toString('hex');
  return `${prefix ? `${prefix}_` : ''}${timestamp}_${randomSuffix}`;
}
