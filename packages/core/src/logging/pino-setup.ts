/**
 * Pino root logger with path-based redaction of credential material.
 *
 * Every SDK log line goes through this logger, so secrets are censored
 * before they reach any transport.
 */

import pino from 'pino';

const LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

type PinoLevel = (typeof LEVELS)[number];

function isPinoLevel(value: string): value is PinoLevel {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Reads HELIO_LOG_LEVEL. Unknown or missing values mean 'silent': an SDK
 * stays quiet unless the host application asks otherwise.
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): PinoLevel {
  const value = (env.HELIO_LOG_LEVEL ?? '').trim().toLowerCase();
  return isPinoLevel(value) ? value : 'silent';
}

/**
 * Paths censored on every log line. Both the wire (snake_case) and the
 * in-memory (camelCase) spellings are covered.
 * @public
 */
export const REDACT_PATHS = [
  // Token endpoint wire fields
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'password',
  '*.password',
  'code',
  '*.code',
  'code_verifier',
  '*.code_verifier',
  'api_key',
  '*.api_key',

  // Credential objects
  'accessToken',
  '*.accessToken',
  'refreshToken',
  '*.refreshToken',
  'clientSecret',
  '*.clientSecret',
  'codeVerifier',
  '*.codeVerifier',
  'apiKey',
  '*.apiKey',

  // HTTP headers
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.Authorization',
];

/**
 * Root logger instance.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'info';
 * rootLogger.info({ refresh_token: 'abc' }); // { refresh_token: '[REDACTED]' }
 * ```
 * @public
 */
const rootLogger = pino({
  name: 'helio',
  level: resolveLogLevel(),
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
