import { vi, type Mock } from 'vitest';
import type {
  ApiKeyCredential,
  Credential,
  TokenPairCredential,
} from '@helio/models';
import type { CredentialProvider } from '../client/api-client.js';

export const TEST_API_URL = 'https://api.test.local';
export const API_ROOT = `${TEST_API_URL}/v1`;
export const TEST_API_KEY = 'test-api-key';
export const TEST_CLIENT_ID = 'test-client';
export const TEST_EMAIL = 'user@example.com';
export const TEST_PASSWORD = 'test-password';
export const TEST_AUTH_CODE = 'test-code';

export type FetchHandler = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

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

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function installFetchMock() {
  const mockFetch = vi.fn<FetchHandler>();
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

export function fetchCall(mockFetch: Mock<FetchHandler>, index = 0): RecordedCall {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch call ${index} was not made`);
  }
  const [input, init] = call;
  return {
    url: requestUrl(input),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? init.body : undefined,
  };
}

export function apiKeyCredential(apiKey = TEST_API_KEY): ApiKeyCredential {
  return {
    method: 'api_key',
    apiKey,
    issuedAt: new Date(0),
    expiresAt: null,
  };
}

export function tokenCredential(accessToken: string): TokenPairCredential {
  return {
    method: 'password',
    accessToken,
    refreshToken: `${accessToken}-refresh`,
    tokenType: 'Bearer',
    issuedAt: new Date(0),
    expiresAt: null,
  };
}

/**
 * CredentialProvider whose current and renewed credentials are fixed
 */
export function createCredentialProvider(
  current: Credential,
  renewed: Credential = current,
) {
  const provider = {
    ensureValidCredential: vi.fn<CredentialProvider['ensureValidCredential']>(
      async () => current,
    ),
    refresh: vi.fn<CredentialProvider['refresh']>(async () => renewed),
  };
  return provider satisfies CredentialProvider;
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

/**
 * In-process stand-in for the platform: a token endpoint issuing A1/R1,
 * A2/R2, ... for the test user, and resource routes that answer only to a
 * live bearer secret.
 */
export function createFakePlatform() {
  const liveSecrets = new Set<string>([TEST_API_KEY]);
  const liveRefreshTokens = new Set<string>();
  const calls: RecordedCall[] = [];
  const agents = [
    { id: 'agent-1', name: 'Support', model: 'model-1' },
    { id: 'agent-2', name: 'Research', model: null },
  ];
  let issued = 0;

  const issue = (): Response => {
    issued += 1;
    const accessToken = `A${issued}`;
    const refreshToken = `R${issued}`;
    liveSecrets.add(accessToken);
    liveRefreshTokens.add(refreshToken);
    return jsonResponse({
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'Bearer',
      expires_in: 3600,
      sub: 'user-1',
    });
  };

  const handleToken = (body: URLSearchParams): Response => {
    if (
      body.get('grant_type') === 'password' &&
      body.get('username') === TEST_EMAIL &&
      body.get('password') === TEST_PASSWORD
    ) {
      return issue();
    }
    if (
      body.get('grant_type') === 'authorization_code' &&
      body.get('code') === TEST_AUTH_CODE &&
      body.get('code_verifier')
    ) {
      return issue();
    }
    if (
      body.get('grant_type') === 'refresh_token' &&
      liveRefreshTokens.delete(body.get('refresh_token') ?? '')
    ) {
      return issue();
    }
    return jsonResponse({ error: 'invalid_grant' }, 400);
  };

  const handleResource = (call: RecordedCall): Response => {
    const path = new URL(call.url).pathname.replace(/^\/v1\//, '');
    if (path === 'auth/self') {
      return jsonResponse({ data: { user: { id: 'user-1', email: TEST_EMAIL } } });
    }
    if (path === 'agent' && call.method === 'GET') {
      return jsonResponse({ data: agents, paging: { offset: 0, limit: 10, total: 2 } });
    }
    if (path === 'agent' && call.method === 'POST') {
      const body: unknown = JSON.parse(call.body ?? '{}');
      const fields = typeof body === 'object' && body !== null ? body : {};
      return jsonResponse({ data: { id: 'agent-3', ...fields } }, 201);
    }
    const agent = agents.find((item) => path === `agent/${item.id}`);
    if (agent && call.method === 'GET') {
      return jsonResponse({ data: agent, meta: { cached: false } });
    }
    if (agent && call.method === 'DELETE') {
      return new Response(null, { status: 204 });
    }
    if (path === 'auth/session') {
      return jsonResponse({ data: { user: 'user-1', org: 'org-1' } });
    }
    if (path === 'app/app-1/bot' && call.method === 'GET') {
      return jsonResponse({
        data: [{ id: 'bot-1', app: 'app-1', agent: 'agent-1', api_key: null }],
      });
    }
    if (path === 'agent/agent-1/completions/async' && call.method === 'POST') {
      return jsonResponse({ id: 'job-1', status: 'queued' }, 202);
    }
    const completion = /^(agent|model|group)\/[^/]+\/completions$/.exec(path);
    if (completion && call.method === 'POST') {
      return jsonResponse({
        id: `${completion[1]}-completion`,
        model: 'model-1',
        choices: [
          { index: 0, message: { role: 'assistant', content: 'Hello there' } },
        ],
      });
    }
    return jsonResponse({ message: 'Not found', code: 'not_found' }, 404);
  };

  const fetch: FetchHandler = async (input, init) => {
    const url = requestUrl(input);
    const call: RecordedCall = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    calls.push(call);

    if (url.endsWith('/auth/token')) {
      return handleToken(new URLSearchParams(call.body ?? ''));
    }
    const secret = call.headers.get('authorization')?.replace(/^Bearer /, '') ?? '';
    if (url.endsWith('/auth/signout')) {
      liveSecrets.delete(secret);
      return jsonResponse({});
    }
    if (!liveSecrets.has(secret)) {
      return jsonResponse({ message: 'Unauthorized', code: 'unauthorized' }, 401);
    }
    return handleResource(call);
  };

  return {
    fetch,
    calls,
    /** Makes the server reject a secret before its local expiry */
    revoke(secret: string): void {
      liveSecrets.delete(secret);
    },
    get resourceCalls(): RecordedCall[] {
      return calls.filter((call) => !call.url.includes('/auth/'));
    },
  };
}

export type FakePlatform = ReturnType<typeof createFakePlatform>;
