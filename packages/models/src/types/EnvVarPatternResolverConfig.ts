/**
 * Options for resolving `${VAR}` patterns in configuration strings
 */
export interface EnvVarPatternResolverConfig {
  /** Nesting limit for variables whose values contain patterns */
  maxDepth?: number;
  /** Throw on a missing variable that has no default */
  strict?: boolean;
  /** Variable source, `process.env` when omitted */
  envSource?: Record<string, string | undefined>;
}
