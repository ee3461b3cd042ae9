/**
 * PKCE (Proof Key for Code Exchange) utilities for the OAuth2 Authorization Code flow
 * Pure functions with no side effects beyond reading the random source
 */
import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import type { PkcePair } from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import {
  PKCE_MAX_VERIFIER_BYTES,
  PKCE_MIN_VERIFIER_BYTES,
  PKCE_VERIFIER_BYTES,
  STATE_BYTES,
} from './oauth-types.js';

/**
 * Source of cryptographically secure random bytes
 * @internal
 */
export type RandomSource = (size: number) => Buffer;

/**
 * Encodes a buffer as base64url without padding (RFC 4648 Section 5).
 * @internal
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer.toString('base64url');
}

function secureRandom(size: number, randomSource: RandomSource): Buffer {
  try {
    return randomSource(size);
  } catch (error) {
    throw AuthenticationError.entropyUnavailable(
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Generates a cryptographically random PKCE code verifier.
 *
 * The default 96 bytes encode to exactly 128 characters, the RFC 7636
 * maximum. Shorter verifiers are available down to 32 bytes (43 characters).
 * @param byteLength - Random bytes to encode, between 32 and 96
 * @param randomSource - Secure random source, `crypto.randomBytes` by default
 * @returns Verifier over the unreserved alphabet `[A-Za-z0-9-_]`
 * @throws {AuthenticationError} kind `configuration` for an out-of-range length,
 * kind `crypto` when the random source fails
 * @public
 * @see file:./pkce.ts - generateCodeChallenge for the matching challenge
 */
export function generateCodeVerifier(
  byteLength: number = PKCE_VERIFIER_BYTES,
  randomSource: RandomSource = randomBytes,
): string {
  if (
    !Number.isInteger(byteLength) ||
    byteLength < PKCE_MIN_VERIFIER_BYTES ||
    byteLength > PKCE_MAX_VERIFIER_BYTES
  ) {
    throw AuthenticationError.configuration(
      `code verifier length must be between ${PKCE_MIN_VERIFIER_BYTES} and ${PKCE_MAX_VERIFIER_BYTES} bytes`,
    );
  }
  return base64URLEncode(secureRandom(byteLength, randomSource));
}

/**
 * Derives the S256 code challenge: base64url(SHA-256(verifier)), unpadded.
 * @example
 * ```typescript
 * const verifier = generateCodeVerifier();
 * const challenge = generateCodeChallenge(verifier);
 * // challenge goes into the authorization URL, verifier into the token exchange
 * ```
 * @public
 */
export function generateCodeChallenge(verifier: string): string {
  const hash = createHash('sha256').update(verifier).digest();
  return base64URLEncode(hash);
}

/**
 * Checks that a verifier hashes to the given S256 challenge.
 * Comparison is constant-time.
 * @public
 */
export function verifyCodeChallenge(
  verifier: string,
  challenge: string,
): boolean {
  const expected = Buffer.from(generateCodeChallenge(verifier));
  const actual = Buffer.from(challenge);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Generates a fresh verifier/challenge pair.
 *
 * Each call draws new randomness; nothing is cached or persisted.
 * @throws {AuthenticationError} kind `crypto` when the random source fails
 * @public
 */
export function generatePkcePair(
  randomSource: RandomSource = randomBytes,
): PkcePair {
  const codeVerifier = generateCodeVerifier(PKCE_VERIFIER_BYTES, randomSource);
  return {
    codeVerifier,
    codeChallenge: generateCodeChallenge(codeVerifier),
  };
}

/**
 * Generates a random OAuth2 `state` value for CSRF protection (22 characters).
 * @public
 */
export function generateState(randomSource: RandomSource = randomBytes): string {
  return base64URLEncode(secureRandom(STATE_BYTES, randomSource));
}
