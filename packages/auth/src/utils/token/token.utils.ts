/**
 * Token-related utilities
 */

import { parseTokenResponse, extractSession } from './parse-token-response.js';
import { decodeJwtClaims } from './decode-jwt-claims.js';
import {
  authorizationHeader,
  credentialSecret,
  isCredentialExpired,
  refreshTokenOf,
} from './expiry.js';

export class TokenUtils {
  public static parseTokenResponse = parseTokenResponse;
  public static extractSession = extractSession;
  public static decodeJwtClaims = decodeJwtClaims;
  public static isCredentialExpired = isCredentialExpired;
  public static credentialSecret = credentialSecret;
  public static authorizationHeader = authorizationHeader;
  public static refreshTokenOf = refreshTokenOf;
}

export {
  parseTokenResponse,
  extractSession,
  type ParsedToken,
} from './parse-token-response.js';
export { decodeJwtClaims } from './decode-jwt-claims.js';
export {
  authorizationHeader,
  credentialSecret,
  isCredentialExpired,
  refreshTokenOf,
} from './expiry.js';
