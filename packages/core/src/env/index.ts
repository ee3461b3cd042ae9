export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveEnvVar,
  resolveConfigFields,
} from './environment-resolver.js';
