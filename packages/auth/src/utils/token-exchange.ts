/**
 * Token endpoint request construction
 * Pure functions shared by every grant
 */
import { ValidationUtils } from '@helio/core';
import type { TokenEndpointConfig, TokenRequest } from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import {
  SIGN_OUT_ENDPOINT_PATH,
  TOKEN_ENDPOINT_PATH,
} from './oauth-types.js';

/**
 * Versioned API base: `{apiUrl}/v{apiVersion}`
 * @internal
 */
export function apiBaseUrl(config: TokenEndpointConfig): string {
  return `${ValidationUtils.stripTrailingSlash(config.apiUrl)}/v${config.apiVersion}`;
}

/**
 * @public
 */
export function tokenEndpointUrl(config: TokenEndpointConfig): string {
  return `${apiBaseUrl(config)}/${TOKEN_ENDPOINT_PATH}`;
}

/**
 * @public
 */
export function signOutEndpointUrl(config: TokenEndpointConfig): string {
  return `${apiBaseUrl(config)}/${SIGN_OUT_ENDPOINT_PATH}`;
}

function requireField(value: string | undefined, field: string): string {
  if (!value) {
    throw AuthenticationError.configuration(`${field} is required`);
  }
  return value;
}

/**
 * Builds the form-encoded body for any grant.
 *
 * Every body carries `grant_type` and `client_id`. Grant-specific fields:
 * - authorization_code: `code`, `code_verifier`, `redirect_uri`
 * - password: `username` (the email), `password`
 * - client_credentials: `client_secret` (client_id comes from the request)
 * - refresh_token: `refresh_token`
 * @throws {AuthenticationError} kind `configuration` when a field is missing
 * @public
 * @see file:../implementations/token-exchanger.ts - Sends the body
 */
export function buildTokenRequestBody(
  request: TokenRequest,
  config: TokenEndpointConfig,
): URLSearchParams {
  const body = new URLSearchParams({ grant_type: request.grantType });

  switch (request.grantType) {
    case 'authorization_code':
      body.set('client_id', requireField(config.clientId, 'client_id'));
      body.set('code', requireField(request.code, 'code'));
      body.set(
        'code_verifier',
        requireField(request.codeVerifier, 'code_verifier'),
      );
      body.set(
        'redirect_uri',
        requireField(config.redirectUri, 'redirect_uri'),
      );
      break;
    case 'password':
      body.set('client_id', requireField(config.clientId, 'client_id'));
      body.set('username', requireField(request.email, 'email'));
      body.set('password', requireField(request.password, 'password'));
      break;
    case 'client_credentials':
      body.set('client_id', requireField(request.clientId, 'client_id'));
      body.set(
        'client_secret',
        requireField(request.clientSecret, 'client_secret'),
      );
      break;
    case 'refresh_token':
      body.set('client_id', requireField(config.clientId, 'client_id'));
      body.set(
        'refresh_token',
        requireField(request.refreshToken, 'refresh_token'),
      );
      break;
  }

  return body;
}

/**
 * Headers for a token endpoint request.
 * @internal
 */
export function buildTokenRequestHeaders(
  requestId: string,
): Record<string, string> {
  return {
    'Content-Type': 'application/x-www-form-urlencoded',
    Accept: 'application/json',
    'X-Request-ID': requestId,
  };
}
