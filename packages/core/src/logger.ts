import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured event through the root logger.
 *
 * Events are named `area:what_happened` (e.g. `auth:credential_installed`) so
 * they can be filtered without parsing messages. Secret fields in `data` are
 * censored by the root logger's redaction paths.
 * @param level - Log severity level
 * @param event - Event identifier
 * @param data - Optional structured payload
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  rootLogger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with message, stack and code.
 * @param context - Where the error occurred; logged as `error:<context>`
 * @param rawError - The thrown value
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err =
    rawError instanceof Error
      ? rawError
      : new Error(typeof rawError === 'string' ? rawError : String(rawError));
  const code =
    'code' in err && typeof err.code === 'string' ? err.code : undefined;

  logEvent('error', `error:${context}`, {
    message: err.message,
    stack: err.stack,
    code,
    extra,
  });
}

