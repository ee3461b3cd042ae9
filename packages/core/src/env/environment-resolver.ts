import type { EnvVarPatternResolverConfig } from '@helio/models';

/**
 * Error thrown when a `${VAR}` pattern cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(
    variable: string,
  ): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }
}

// ${VAR_NAME} or ${VAR_NAME:default}
const PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;
const DETECT = /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/;

/**
 * Resolves `${VAR}` and `${VAR:default}` patterns in configuration strings,
 * so a client id or API URL can be written as `${HELIO_CLIENT_ID}` in a
 * config file.
 *
 * Variable names are restricted to upper-case letters, digits and
 * underscores. Values that themselves contain patterns are resolved
 * recursively up to `maxDepth`.
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { REGION: 'eu' } });
 * resolver.resolve('https://${REGION}.api.example.com'); // 'https://eu.api.example.com'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * @throws {EnvironmentResolutionError} On a circular reference, depth overflow, or (strict mode) a missing variable
   */
  public resolve(
    value: string,
    visitedVars: ReadonlySet<string> = new Set(),
    depth: number = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      PATTERN,
      (match: string, varName: string, defaultValue: string | undefined) => {
        if (visitedVars.has(varName)) {
          throw EnvironmentResolutionError.circularReference(varName);
        }

        const next = new Set(visitedVars).add(varName);
        const envValue = this.envSource[varName];

        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (defaultValue !== undefined) {
          return this.resolve(defaultValue, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(varName);
        }
        return match;
      },
    );
  }

  public static containsPattern(value: string): boolean {
    return DETECT.test(value);
  }
}

/**
 * Resolves a single value; strings without patterns are returned unchanged.
 * @throws {EnvironmentResolutionError} When resolution fails
 * @public
 */
export function resolveEnvVar(
  value: string,
  envSource?: Record<string, string | undefined>,
): string {
  return EnvVarPatternResolver.containsPattern(value)
    ? new EnvVarPatternResolver({ envSource }).resolve(value)
    : value;
}

/**
 * Resolves patterns in the named string fields of a config object and returns
 * a copy. Non-string and unnamed fields are left alone.
 * @public
 */
export function resolveConfigFields<T extends object>(
  config: T,
  fields: (keyof T)[],
  envSource?: Record<string, string | undefined>,
): T {
  const resolved = { ...config };

  for (const field of fields) {
    const value = config[field];
    if (typeof value === 'string') {
      Object.assign(resolved, { [field]: resolveEnvVar(value, envSource) });
    }
  }

  return resolved;
}
