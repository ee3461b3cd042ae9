import { describe, it, expect } from 'vitest';
import {
  buildTokenRequestBody,
  buildTokenRequestHeaders,
  signOutEndpointUrl,
  tokenEndpointUrl,
} from '../../utils/token-exchange.js';
import { catchAuthError, testEndpointConfig } from '../test-utils.js';

describe('token request construction', () => {
  describe('endpoint urls', () => {
    it('should version the token endpoint', () => {
      expect(tokenEndpointUrl(testEndpointConfig)).toBe(
        'https://api.test.local/v1/auth/token',
      );
    });

    it('should strip a trailing slash from apiUrl', () => {
      expect(
        signOutEndpointUrl({
          apiUrl: 'https://api.test.local/',
          apiVersion: '2',
        }),
      ).toBe('https://api.test.local/v2/auth/signout');
    });
  });

  describe('buildTokenRequestBody', () => {
    it('should build the authorization_code body', () => {
      const body = buildTokenRequestBody(
        {
          grantType: 'authorization_code',
          code: 'code-1',
          codeVerifier: 'verifier-1',
        },
        testEndpointConfig,
      );

      expect(body.toString()).toBe(
        'grant_type=authorization_code&client_id=test-client&code=code-1' +
          '&code_verifier=verifier-1' +
          '&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcallback',
      );
    });

    it('should send the email as username for the password grant', () => {
      const body = buildTokenRequestBody(
        {
          grantType: 'password',
          email: 'user@example.com',
          password: 'test-password',
        },
        testEndpointConfig,
      );

      expect(Object.fromEntries(body)).toEqual({
        grant_type: 'password',
        client_id: 'test-client',
        username: 'user@example.com',
        password: 'test-password',
      });
    });

    it('should take client_id from the client_credentials request', () => {
      const body = buildTokenRequestBody(
        {
          grantType: 'client_credentials',
          clientId: 'other-client',
          clientSecret: 'test-secret',
        },
        testEndpointConfig,
      );

      expect(Object.fromEntries(body)).toEqual({
        grant_type: 'client_credentials',
        client_id: 'other-client',
        client_secret: 'test-secret',
      });
    });

    it('should build the refresh_token body', () => {
      const body = buildTokenRequestBody(
        { grantType: 'refresh_token', refreshToken: 'R1' },
        testEndpointConfig,
      );

      expect(Object.fromEntries(body)).toEqual({
        grant_type: 'refresh_token',
        client_id: 'test-client',
        refresh_token: 'R1',
      });
    });

    it('should require redirect_uri for the authorization_code grant', () => {
      const error = catchAuthError(() =>
        buildTokenRequestBody(
          { grantType: 'authorization_code', code: 'c', codeVerifier: 'v' },
          { ...testEndpointConfig, redirectUri: undefined },
        ),
      );

      expect(error.kind).toBe('configuration');
      expect(error.message).toBe('Configuration error: redirect_uri is required');
    });

    it('should require client_id for the password grant', () => {
      const error = catchAuthError(() =>
        buildTokenRequestBody(
          { grantType: 'password', email: 'user@example.com', password: 'p' },
          { apiUrl: 'https://api.test.local', apiVersion: '1' },
        ),
      );

      expect(error.message).toBe('Configuration error: client_id is required');
    });

    it('should reject an empty code verifier', () => {
      const error = catchAuthError(() =>
        buildTokenRequestBody(
          { grantType: 'authorization_code', code: 'c', codeVerifier: '' },
          testEndpointConfig,
        ),
      );

      expect(error.message).toBe('Configuration error: code_verifier is required');
    });
  });

  describe('buildTokenRequestHeaders', () => {
    it('should send form encoding with a request id', () => {
      expect(buildTokenRequestHeaders('1700000000000_deadbeef')).toEqual({
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
        'X-Request-ID': '1700000000000_deadbeef',
      });
    });
  });
});
