export * from './validation-utils.js';
export * from './auth/index.js';

export * as RequestUtils from './utils/request/index.js';
export type { RequestScope } from './utils/request/index.js';

// Logging with redaction
export * from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveEnvVar,
  resolveConfigFields,
} from './env/index.js';
