import { describe, it, expect } from 'vitest';
import type { Credential } from '@helio/models';
import {
  decodeJwtClaims,
  parseTokenResponse,
} from '../../utils/token/token.utils.js';
import {
  authorizationHeader,
  isCredentialExpired,
  refreshTokenOf,
} from '../../utils/token/expiry.js';

const NOW = Date.UTC(2024, 0, 1, 12, 0, 0);

function jwt(payload: Record<string, unknown>): string {
  const encode = (value: unknown): string =>
    Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none' })}.${encode(payload)}.signature`;
}

describe('parseTokenResponse', () => {
  it('should compute expiry from expires_in', () => {
    const parsed = parseTokenResponse(
      { access_token: 'A1', refresh_token: 'R1', expires_in: 3600 },
      NOW,
    );

    expect(parsed).toEqual({
      accessToken: 'A1',
      refreshToken: 'R1',
      tokenType: 'Bearer',
      issuedAt: new Date(NOW),
      expiresAt: new Date(NOW + 3600 * 1000),
    });
  });

  it('should fall back to the exp claim', () => {
    const exp = NOW / 1000 + 600;
    const parsed = parseTokenResponse({ access_token: 'A1', exp }, NOW);

    expect(parsed.expiresAt).toEqual(new Date(exp * 1000));
    expect(parsed.session).toEqual({ expiresAt: new Date(exp * 1000) });
  });

  it('should treat a response without expiry as non-expiring', () => {
    const parsed = parseTokenResponse({ access_token: 'opaque-token' }, NOW);

    expect(parsed.expiresAt).toBeNull();
    expect(parsed.session).toBeUndefined();
  });

  it('should reject an expires_in beyond the Date range', () => {
    expect(() =>
      parseTokenResponse({ access_token: 'A1', expires_in: 1e13 }, NOW),
    ).toThrow('Invalid token response: expires_in: out of range');
  });

  it('should reject an exp claim beyond the Date range', () => {
    expect(() =>
      parseTokenResponse({ access_token: jwt({ exp: 1e13 }) }, NOW),
    ).toThrow('Invalid token response: exp: out of range');
  });

  it('should read session claims from a JWT access token', () => {
    const token = jwt({
      sub: 'user-1',
      org: 'org-1',
      iat: NOW / 1000,
      exp: NOW / 1000 + 900,
    });
    const parsed = parseTokenResponse({ access_token: token }, NOW);

    expect(parsed.session).toEqual({
      subject: 'user-1',
      org: 'org-1',
      issuedAt: new Date(NOW),
      expiresAt: new Date(NOW + 900 * 1000),
    });
    expect(parsed.expiresAt).toEqual(new Date(NOW + 900 * 1000));
  });

  it('should prefer response claims over the JWT payload', () => {
    const token = jwt({ sub: 'from-jwt' });
    const parsed = parseTokenResponse(
      { access_token: token, sub: 'from-body', user: 'user-9' },
      NOW,
    );

    expect(parsed.session).toEqual({ subject: 'from-body', user: 'user-9' });
  });

  it('should keep the server token type', () => {
    const parsed = parseTokenResponse(
      { access_token: 'A1', token_type: 'MAC', scope: 'read' },
      NOW,
    );
    expect(parsed.tokenType).toBe('MAC');
    expect(parsed.scope).toBe('read');
  });
});

describe('decodeJwtClaims', () => {
  it('should return null for opaque tokens', () => {
    expect(decodeJwtClaims('opaque')).toBeNull();
    expect(decodeJwtClaims('a.b')).toBeNull();
  });

  it('should return null for a payload that is not a JSON object', () => {
    const payload = Buffer.from('[1,2]').toString('base64url');
    expect(decodeJwtClaims(`x.${payload}.y`)).toBeNull();
    expect(decodeJwtClaims('x.%%%.y')).toBeNull();
  });
});

describe('isCredentialExpired', () => {
  const tokenCredential = (expiresAt: Date | null): Credential => ({
    method: 'password',
    accessToken: 'A1',
    tokenType: 'Bearer',
    issuedAt: new Date(NOW),
    expiresAt,
  });

  it('should treat a missing credential as expired', () => {
    expect(isCredentialExpired(null, NOW)).toBe(true);
  });

  it('should never expire without expiresAt', () => {
    expect(isCredentialExpired(tokenCredential(null), NOW + 10 ** 12)).toBe(false);
  });

  it('should apply the 60 second skew by default', () => {
    const credential = tokenCredential(new Date(NOW + 60_000));

    expect(isCredentialExpired(credential, NOW - 1)).toBe(false);
    expect(isCredentialExpired(credential, NOW)).toBe(true);
  });

  it('should honour a custom skew', () => {
    const credential = tokenCredential(new Date(NOW + 60_000));
    expect(isCredentialExpired(credential, NOW, 0)).toBe(false);
  });

  it('should treat an invalid date as expired', () => {
    expect(isCredentialExpired(tokenCredential(new Date('nope')), NOW)).toBe(true);
  });
});

describe('credential accessors', () => {
  it('should build the header for an API key', () => {
    const header = authorizationHeader({
      method: 'api_key',
      apiKey: 'test-api-key',
      issuedAt: new Date(NOW),
      expiresAt: null,
    });
    expect(header).toBe('Bearer test-api-key');
  });

  it('should only read refresh tokens from token pairs', () => {
    expect(
      refreshTokenOf({
        method: 'oauth',
        accessToken: 'A1',
        refreshToken: 'R1',
        tokenType: 'Bearer',
        issuedAt: new Date(NOW),
        expiresAt: null,
      }),
    ).toBe('R1');
    expect(
      refreshTokenOf({
        method: 'client_credentials',
        accessToken: 'A1',
        clientId: 'test-client',
        tokenType: 'Bearer',
        issuedAt: new Date(NOW),
        expiresAt: null,
      }),
    ).toBeUndefined();
  });
});
