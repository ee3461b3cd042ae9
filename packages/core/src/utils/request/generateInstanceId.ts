import { v4 as uuidv4 } from 'uuid';

/**
 * Generates the id bound to every log line of one client instance.
 * @public
 * @see {@link generateRequestId} - Per-request ids
 */
export function generateInstanceId(): string {
  return uuidv4();
}
