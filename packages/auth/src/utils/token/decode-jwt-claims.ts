/**
 * Reads the payload of a JWT without verifying its signature.
 *
 * Used only to recover session claims (`sub`, `iat`, `exp`, ...) that the
 * token endpoint did not send alongside the token. Returns null for anything
 * that is not a three-part token with a JSON object payload.
 * @public
 */
export function decodeJwtClaims(token: string): Record<string, unknown> | null {
  const parts = token.split('.');
  if (parts.length !== 3 || !parts[1]) {
    return null;
  }

  try {
    const payload: unknown = JSON.parse(
      Buffer.from(parts[1], 'base64url').toString('utf8'),
    );
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      return null;
    }
    return Object.fromEntries(Object.entries(payload));
  } catch {
    return null;
  }
}
