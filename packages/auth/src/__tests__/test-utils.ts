import { vi, type Mock } from 'vitest';
import type { TokenEndpointConfig } from '@helio/models';
import { AuthenticationError } from '../errors/authentication-error.js';
import { verifyCodeChallenge } from '../utils/pkce.js';

export const TEST_API_URL = 'https://api.test.local';
export const TEST_APP_URL = 'https://app.test.local';
export const TEST_CLIENT_ID = 'test-client';
export const TEST_CLIENT_SECRET = 'test-secret';
export const TEST_EMAIL = 'user@example.com';
export const TEST_PASSWORD = 'test-password';
export const TEST_REDIRECT_URI = 'https://app.example.com/callback';
export const TOKEN_URL = `${TEST_API_URL}/v1/auth/token`;
export const SIGN_OUT_URL = `${TEST_API_URL}/v1/auth/signout`;

export const testEndpointConfig: TokenEndpointConfig = {
  apiUrl: TEST_API_URL,
  apiVersion: '1',
  clientId: TEST_CLIENT_ID,
  redirectUri: TEST_REDIRECT_URI,
};

export type FetchHandler = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

/**
 * Real Response with a JSON body
 */
export function jsonResponse(
  body: unknown,
  status = 200,
  statusText = '',
): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number, statusText = ''): Response {
  return new Response(body, { status, statusText });
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function requestBody(init?: RequestInit): URLSearchParams {
  return new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
}

export function installFetchMock() {
  const mockFetch = vi.fn<FetchHandler>();
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

/**
 * The url and init of one recorded fetch call
 */
export function fetchCall(
  mockFetch: Mock<FetchHandler>,
  index = 0,
): { url: string; init?: RequestInit } {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch call ${index} was not made`);
  }
  const [input, init] = call;
  return { url: requestUrl(input), init };
}

export function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), {
    name: 'AbortError',
  });
}

export interface RecordedRequest {
  url: string;
  body: URLSearchParams;
  headers: Headers;
}

export interface FakeTokenServerOptions {
  expiresIn?: number;
  /** Leave refresh_token out of refresh responses */
  omitRotatedRefreshToken?: boolean;
}

/**
 * In-process stand-in for the platform's token and sign-out endpoints.
 *
 * Issues A1/R1, A2/R2, ... in order. Authorization codes and refresh tokens
 * are single-use. Codes only redeem with the verifier matching their challenge.
 */
export function createFakeTokenServer(options: FakeTokenServerOptions = {}) {
  const expiresIn = options.expiresIn ?? 3600;
  const challenges = new Map<string, string>();
  const liveRefreshTokens = new Set<string>();
  const requests: RecordedRequest[] = [];
  let issued = 0;
  let codes = 0;
  let signOutStatus = 200;

  const issue = (withRefreshToken: boolean): Response => {
    issued += 1;
    const body: Record<string, unknown> = {
      access_token: `A${issued}`,
      token_type: 'Bearer',
      expires_in: expiresIn,
    };
    if (withRefreshToken) {
      const refreshToken = `R${issued}`;
      liveRefreshTokens.add(refreshToken);
      body.refresh_token = refreshToken;
    }
    return jsonResponse(body);
  };

  const invalidGrant = (description: string): Response =>
    jsonResponse({ error: 'invalid_grant', error_description: description }, 400);

  const handleToken = (body: URLSearchParams): Response => {
    if (body.get('client_id') === null) {
      return jsonResponse({ error: 'invalid_request' }, 400);
    }

    switch (body.get('grant_type')) {
      case 'authorization_code': {
        const code = body.get('code') ?? '';
        const challenge = challenges.get(code);
        challenges.delete(code);
        if (!challenge) {
          return invalidGrant('unknown code');
        }
        if (!verifyCodeChallenge(body.get('code_verifier') ?? '', challenge)) {
          return invalidGrant('verifier mismatch');
        }
        return issue(true);
      }
      case 'password':
        if (
          body.get('username') !== TEST_EMAIL ||
          body.get('password') !== TEST_PASSWORD
        ) {
          return invalidGrant('bad credentials');
        }
        return issue(true);
      case 'client_credentials':
        if (
          body.get('client_id') !== TEST_CLIENT_ID ||
          body.get('client_secret') !== TEST_CLIENT_SECRET
        ) {
          return jsonResponse({ error: 'invalid_client' }, 401);
        }
        return issue(false);
      case 'refresh_token': {
        const refreshToken = body.get('refresh_token') ?? '';
        if (!liveRefreshTokens.delete(refreshToken)) {
          return invalidGrant('refresh token revoked');
        }
        return issue(!options.omitRotatedRefreshToken);
      }
      default:
        return jsonResponse({ error: 'unsupported_grant_type' }, 400);
    }
  };

  const fetch: FetchHandler = async (input, init) => {
    const url = requestUrl(input);
    const body = requestBody(init);
    const headers = new Headers(init?.headers);
    requests.push({ url, body, headers });

    if (url.endsWith('/auth/token')) {
      return handleToken(body);
    }
    if (url.endsWith('/auth/signout')) {
      if (signOutStatus >= 400) {
        return jsonResponse({ error: 'server_error' }, signOutStatus);
      }
      return jsonResponse({});
    }
    return jsonResponse({ error: 'not_found' }, 404);
  };

  return {
    fetch,
    requests,
    /** Registers a challenge and returns the code the redirect would carry */
    authorize(challenge: string): string {
      codes += 1;
      const code = `code-${codes}`;
      challenges.set(code, challenge);
      return code;
    },
    revokeRefreshToken(refreshToken: string): void {
      liveRefreshTokens.delete(refreshToken);
    },
    failSignOut(status = 503): void {
      signOutStatus = status;
    },
    get tokenRequests(): RecordedRequest[] {
      return requests.filter((request) => request.url.endsWith('/auth/token'));
    },
  };
}

export type FakeTokenServer = ReturnType<typeof createFakeTokenServer>;

/**
 * Runs a function expected to throw and returns what it threw as an AuthenticationError
 */
export function catchAuthError(fn: () => unknown): AuthenticationError {
  try {
    fn();
  } catch (error) {
    return expectAuthError(error);
  }
  throw new Error('expected an AuthenticationError to be thrown');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<AuthenticationError> {
  try {
    await promise;
  } catch (error) {
    return expectAuthError(error);
  }
  throw new Error('expected the promise to reject');
}

export function expectAuthError(error: unknown): AuthenticationError {
  if (!(error instanceof AuthenticationError)) {
    throw new Error(`expected AuthenticationError, got ${String(error)}`);
  }
  return error;
}
