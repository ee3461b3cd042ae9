/**
 * Zod schemas for OAuth configuration and token endpoint bodies.
 *
 * Configuration schemas normalize field name variations
 * (scope/scopes, apiURL/apiUrl, appURL/appUrl, redirectURI/redirectUri).
 * Token body schemas unwrap the platform's `{ data: {...} }` envelope and
 * treat `null` fields as absent.
 *
 * @example
 * ```typescript
 * import { OAuthConfigSchema } from './schemas.js';
 *
 * const config = OAuthConfigSchema.parse({
 *   clientId: 'client-1',
 *   redirectUri: 'https://app.example.com/callback',
 *   scope: 'read write', // normalized to scopes: ['read', 'write']
 *   appURL: 'https://helio.dev', // normalized to appUrl
 *   apiUrl: 'https://api.helio.dev',
 * });
 * ```
 *
 * @public
 */

import { z } from 'zod';

function toRecord(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input));
}

function renameAlias(
  result: Record<string, unknown>,
  alias: string,
  field: string,
): void {
  if (result[field] === undefined && result[alias] !== undefined) {
    result[field] = result[alias];
  }
  delete result[alias];
}

const OAuthConfigBaseSchema = z.object({
  clientId: z.string().default(''),
  redirectUri: z.string().default(''),
  scopes: z.array(z.string().min(1)).default([]),
  appUrl: z.string().default(''),
  apiUrl: z.string().default(''),
  apiVersion: z.string().default('1'),
  state: z.string().optional(),
});

/**
 * Zod schema for the OAuth client configuration.
 *
 * Missing strings default to '' so that the client reports which field is
 * missing with a configuration error rather than a schema dump.
 * - scope (space-separated string) → scopes (array)
 * - apiURL → apiUrl, appURL → appUrl, redirectURI → redirectUri
 * - numeric apiVersion → string
 *
 * @public
 */
export const OAuthConfigSchema = z.preprocess((input: unknown) => {
  if (typeof input !== 'object' || input === null) return input;

  const result = toRecord(input);

  renameAlias(result, 'apiURL', 'apiUrl');
  renameAlias(result, 'appURL', 'appUrl');
  renameAlias(result, 'redirectURI', 'redirectUri');

  // Prefer scopes when both exist
  if (result.scopes === undefined && typeof result.scope === 'string') {
    result.scopes = result.scope.split(/\s+/).filter(Boolean);
  }
  delete result.scope;

  if (typeof result.apiVersion === 'number') {
    result.apiVersion = String(result.apiVersion);
  }

  return result;
}, OAuthConfigBaseSchema);

/**
 * Accepted input shape for OAuthConfigSchema, aliases included.
 * @public
 */
export interface OAuthConfigInput {
  clientId?: string;
  redirectUri?: string;
  redirectURI?: string;
  scopes?: string[];
  scope?: string;
  appUrl?: string;
  appURL?: string;
  apiUrl?: string;
  apiURL?: string;
  apiVersion?: string | number;
  state?: string;
}

function unwrapEnvelope(input: unknown): unknown {
  if (typeof input !== 'object' || input === null) return input;

  let result = toRecord(input);
  if (
    typeof result.data === 'object' &&
    result.data !== null &&
    !('access_token' in result) &&
    !('error' in result)
  ) {
    result = toRecord(result.data);
  }

  for (const [key, value] of Object.entries(result)) {
    if (value === null) {
      delete result[key];
    }
  }
  return result;
}

const TokenResponseBaseSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  refresh_token: z.string().min(1).optional(),
  token_type: z.string().min(1).optional(),
  expires_in: z.coerce.number().finite().nonnegative().optional(),
  scope: z.string().optional(),
  sub: z.string().optional(),
  iat: z.coerce.number().finite().optional(),
  exp: z.coerce.number().finite().optional(),
  user: z.string().optional(),
  org: z.string().optional(),
  client: z.string().optional(),
});

/**
 * Zod schema for a successful token endpoint body.
 *
 * Numeric claims sent as strings (`"3600"`) are coerced.
 * @public
 */
export const TokenResponseSchema = z.preprocess(
  unwrapEnvelope,
  TokenResponseBaseSchema,
);

/**
 * Zod schema for an RFC 6749 error body.
 * @public
 */
export const TokenErrorResponseSchema = z.preprocess(
  unwrapEnvelope,
  z.object({
    error: z.string().min(1),
    error_description: z.string().optional(),
    error_uri: z.string().optional(),
  }),
);

export type OAuthConfigZod = z.infer<typeof OAuthConfigSchema>;
export type TokenResponseZod = z.infer<typeof TokenResponseSchema>;
