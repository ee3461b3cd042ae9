export * from './auth/index.js';
export * from './resources/index.js';

export type {
  QueryParams,
  Paging,
  ApiEnvelope,
  HttpMethod,
  RecordBase,
} from './api/index.js';

export type { ClientConfigInput, ClientConfig } from './client/ClientConfig.js';

export type { EnvVarPatternResolverConfig } from './EnvVarPatternResolverConfig.js';
