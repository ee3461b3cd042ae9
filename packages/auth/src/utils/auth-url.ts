/**
 * Authorization URL construction for the PKCE flow
 */
import { ValidationUtils } from '@helio/core';
import {
  CodeChallengeMethods,
  ResponseTypes,
  type OAuthConfig,
} from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { AUTHORIZE_PATH } from './oauth-types.js';

/**
 * Parameters for building an authorization URL.
 * @public
 */
export interface AuthUrlParams {
  config: OAuthConfig;
  /** S256 challenge derived from the code verifier */
  codeChallenge: string;
  /** Overrides `config.state` when given */
  state?: string;
}

/**
 * Fails with a configuration error when the config cannot produce a usable
 * authorization URL.
 * @internal
 */
export function assertAuthorizationConfig(config: OAuthConfig): void {
  try {
    ValidationUtils.validateRequired(
      config,
      ['clientId', 'redirectUri', 'scopes', 'appUrl'],
      'OAuth authorization',
    );
  } catch (error) {
    throw AuthenticationError.configuration(
      error instanceof Error ? error.message : String(error),
    );
  }
}

/**
 * Builds `{appUrl}/oauth?client_id&redirect_uri&response_type=code&code_challenge&code_challenge_method=S256&scope[&state]`.
 *
 * Scopes are joined with spaces. Parameter values are form-encoded.
 * @example
 * ```typescript
 * const url = buildAuthorizationUrl({
 *   config: {
 *     clientId: 'client-1',
 *     redirectUri: 'https://app.example.com/callback',
 *     scopes: ['read', 'write'],
 *     appUrl: 'https://helio.dev',
 *     apiUrl: 'https://api.helio.dev',
 *     apiVersion: '1',
 *   },
 *   codeChallenge: challenge,
 * });
 * // https://helio.dev/oauth?client_id=client-1&redirect_uri=...&scope=read+write
 * ```
 * @throws {AuthenticationError} kind `configuration` when clientId,
 * redirectUri, scopes or appUrl is missing
 * @public
 */
export function buildAuthorizationUrl(params: AuthUrlParams): URL {
  const { config, codeChallenge } = params;
  assertAuthorizationConfig(config);

  const authUrl = new URL(
    `${ValidationUtils.stripTrailingSlash(config.appUrl)}/${AUTHORIZE_PATH}`,
  );
  authUrl.searchParams.set('client_id', config.clientId);
  authUrl.searchParams.set('redirect_uri', config.redirectUri);
  authUrl.searchParams.set('response_type', ResponseTypes.CODE);
  authUrl.searchParams.set('code_challenge', codeChallenge);
  authUrl.searchParams.set('code_challenge_method', CodeChallengeMethods.S256);
  authUrl.searchParams.set('scope', config.scopes.join(' '));

  const state = params.state ?? config.state;
  if (state) {
    authUrl.searchParams.set('state', state);
  }

  return authUrl;
}
