/**
 * Shared validation helpers for URLs and required configuration fields.
 *
 * All failures throw plain `Error`s with a context prefix; callers wrap them
 * into their own error types.
 * @public
 */

/**
 * Validates a URL string.
 * @param url - URL string to validate
 * @param context - Optional context string for error messages
 * @throws \{Error\} When URL is empty or invalid format
 * @internal
 */
function validateUrl(url: string, context?: string): void {
  if (!url) {
    throw new Error(`${context ? context + ': ' : ''}URL is required`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(
      `${context ? context + ': ' : ''}Invalid URL format: ${url}`,
    );
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new Error(
      `${context ? context + ': ' : ''}Unsupported URL protocol: ${parsed.protocol}`,
    );
  }
}

/**
 * Validates every defined URL in a record.
 * @throws \{Error\} When any URL is invalid, with key in error message
 * @internal
 */
function validateUrls(urls: Record<string, string | undefined>): void {
  for (const [key, url] of Object.entries(urls)) {
    if (url !== undefined) {
      validateUrl(url, key);
    }
  }
}

/**
 * Validates that required fields are present and non-empty. Arrays must
 * contain at least one element.
 * @throws \{Error\} When any required field is missing
 * @internal
 */
function validateRequired<T extends object>(
  config: T,
  requiredFields: (keyof T)[],
  context?: string,
): void {
  for (const field of requiredFields) {
    const value = config[field];
    const missing =
      value === undefined ||
      value === null ||
      value === '' ||
      (Array.isArray(value) && value.length === 0);
    if (missing) {
      throw new Error(
        `${context ? context + ': ' : ''}Missing required field: ${String(field)}`,
      );
    }
  }
}

/**
 * Trims a trailing slash so paths can be appended with `/`.
 * @internal
 */
function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/**
 * @example
 * ```typescript
 * ValidationUtils.validateUrl('https://api.example.com', 'apiUrl');
 * ValidationUtils.validateRequired(config, ['clientId', 'redirectUri'], 'OAuth config');
 * ```
 * @public
 */
export const ValidationUtils = {
  validateUrl,
  validateUrls,
  validateRequired,
  stripTrailingSlash,
};
