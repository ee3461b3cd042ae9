import { z } from 'zod';
import { resolveEnvVar, ValidationUtils } from '@helio/core';
import { AuthenticationError } from '@helio/auth';
import type { ClientConfig, ClientConfigInput } from '@helio/models';

type EnvSource = Record<string, string | undefined>;

/**
 * Environment variables read for fields the caller leaves unset
 * @public
 */
export const CLIENT_ENV_VARS = {
  apiKey: 'HELIO_API_KEY',
  apiUrl: 'HELIO_API_URL',
  appUrl: 'HELIO_APP_URL',
  apiVersion: 'HELIO_API_VERSION',
  clientId: 'HELIO_CLIENT_ID',
  clientSecret: 'HELIO_CLIENT_SECRET',
  verbose: 'HELIO_VERBOSE',
  requestTimeoutMs: 'HELIO_REQUEST_TIMEOUT_MS',
  expirySkewMs: 'HELIO_EXPIRY_SKEW_MS',
} as const satisfies Record<keyof ClientConfigInput, string>;

/**
 * @public
 */
export const DEFAULT_CLIENT_CONFIG = {
  apiUrl: 'https://api.helio.dev',
  appUrl: 'https://helio.dev',
  apiVersion: '1',
  verbose: false,
  requestTimeoutMs: 30_000,
  expirySkewMs: 60_000,
} as const;

const CLIENT_FIELDS: (keyof ClientConfigInput)[] = [
  'apiKey',
  'apiUrl',
  'appUrl',
  'apiVersion',
  'clientId',
  'clientSecret',
  'verbose',
  'requestTimeoutMs',
  'expirySkewMs',
];

const DEFAULTS: Partial<ClientConfigInput> = DEFAULT_CLIENT_CONFIG;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL')
  .transform(ValidationUtils.stripTrailingSlash);

const ClientConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  apiUrl: httpUrl,
  appUrl: httpUrl,
  apiVersion: z
    .string()
    .min(1)
    .transform((value) => value.replace(/^v/i, '')),
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional(),
  verbose: z.preprocess(
    (value) =>
      typeof value === 'string' ? TRUTHY.has(value.trim().toLowerCase()) : value,
    z.boolean(),
  ),
  requestTimeoutMs: z.coerce.number().int().positive(),
  expirySkewMs: z.coerce.number().int().nonnegative(),
});

function present(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Resolves client configuration.
 *
 * Each field comes from, in order: the explicit input, its `HELIO_*`
 * environment variable, the built-in default. String values may contain
 * `${VAR}` or `${VAR:default}` patterns, resolved against the same env source.
 * @throws {AuthenticationError} kind `configuration` for invalid values
 * @public
 */
export function resolveClientConfig(
  input: ClientConfigInput = {},
  env: EnvSource = process.env,
): ClientConfig {
  const merged: Record<string, unknown> = {};

  for (const field of CLIENT_FIELDS) {
    const explicit = input[field];
    const fromEnv = env[CLIENT_ENV_VARS[field]];

    let value: unknown = present(explicit)
      ? explicit
      : present(fromEnv)
        ? fromEnv
        : DEFAULTS[field];
    if (typeof value === 'string') {
      try {
        value = resolveEnvVar(value, env);
      } catch (error) {
        throw AuthenticationError.configuration(
          `${field}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    if (present(value)) {
      merged[field] = value;
    }
  }

  const result = ClientConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw AuthenticationError.configuration(
      issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid client config',
    );
  }
  return result.data;
}
