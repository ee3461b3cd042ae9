export { HelioClient, type OAuthFlowOptions } from './helio-client.js';

export * from './client/api-client.js';
export * from './config/config.js';
export * from './errors/api-error.js';
export * from './collections/index.js';
export * from './schemas.js';
