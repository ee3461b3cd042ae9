import type { Session, TokenResponse } from '@helio/models';
import { AuthenticationError } from '../../errors/authentication-error.js';
import { DEFAULT_TOKEN_TYPE } from '../oauth-types.js';
import { decodeJwtClaims } from './decode-jwt-claims.js';

/**
 * Token fields normalized from a token endpoint response.
 * @public
 */
export interface ParsedToken {
  accessToken: string;
  refreshToken?: string;
  tokenType: string;
  scope?: string;
  issuedAt: Date;
  expiresAt: Date | null;
  session?: Session;
}

// Largest epoch offset in milliseconds a Date can represent
const MAX_DATE_MS = 8.64e15;

function checkedDate(epochMs: number, field: string): Date {
  if (!Number.isFinite(epochMs) || Math.abs(epochMs) > MAX_DATE_MS) {
    throw AuthenticationError.invalidTokenResponse(`${field}: out of range`);
  }
  return new Date(epochMs);
}

function toDate(seconds: unknown, field: string): Date | undefined {
  const value = typeof seconds === 'string' ? Number(seconds) : seconds;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return checkedDate(value * 1000, field);
}

function toText(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Extracts session claims from the response fields, falling back to the
 * unverified JWT payload of the access token.
 * @returns undefined when no claim is present
 * @throws {AuthenticationError} code `invalid_token_response` for a timestamp no Date can hold
 * @public
 */
export function extractSession(tokenResponse: TokenResponse): Session | undefined {
  const claims = decodeJwtClaims(tokenResponse.access_token) ?? {};

  const session: Session = {};
  const subject = toText(tokenResponse.sub) ?? toText(claims.sub);
  const user = toText(tokenResponse.user) ?? toText(claims.user);
  const org = toText(tokenResponse.org) ?? toText(claims.org);
  const client = toText(tokenResponse.client) ?? toText(claims.client);
  const issuedAt = toDate(tokenResponse.iat, 'iat') ?? toDate(claims.iat, 'iat');
  const expiresAt = toDate(tokenResponse.exp, 'exp') ?? toDate(claims.exp, 'exp');

  if (subject) session.subject = subject;
  if (user) session.user = user;
  if (org) session.org = org;
  if (client) session.client = client;
  if (issuedAt) session.issuedAt = issuedAt;
  if (expiresAt) session.expiresAt = expiresAt;

  return Object.keys(session).length > 0 ? session : undefined;
}

/**
 * Parses a token response into normalized token fields.
 *
 * Expiry, in order of preference:
 * 1. `issuedAt + expires_in`
 * 2. the `exp` claim (response field or JWT payload)
 * 3. null: the token does not expire
 * @param tokenResponse - Validated token endpoint body
 * @param now - Issue time in epoch milliseconds
 * @throws {AuthenticationError} code `invalid_token_response` when the expiry is out of range
 * @public
 * @see file:../../schemas.ts - TokenResponseSchema validates the body first
 */
export function parseTokenResponse(
  tokenResponse: TokenResponse,
  now: number = Date.now(),
): ParsedToken {
  const session = extractSession(tokenResponse);
  const expiresAt =
    tokenResponse.expires_in !== undefined
      ? checkedDate(now + tokenResponse.expires_in * 1000, 'expires_in')
      : (session?.expiresAt ?? null);

  const parsed: ParsedToken = {
    accessToken: tokenResponse.access_token,
    tokenType: tokenResponse.token_type ?? DEFAULT_TOKEN_TYPE,
    issuedAt: new Date(now),
    expiresAt,
  };
  if (tokenResponse.refresh_token) parsed.refreshToken = tokenResponse.refresh_token;
  if (tokenResponse.scope) parsed.scope = tokenResponse.scope;
  if (session) parsed.session = session;

  return parsed;
}
