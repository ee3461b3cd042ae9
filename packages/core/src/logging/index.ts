/**
 * Logging infrastructure exports
 *
 * Structured logging with automatic redaction via pino
 */

export { rootLogger, resolveLogLevel, REDACT_PATHS } from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
