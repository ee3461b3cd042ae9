// Errors
export * from './errors/authentication-error.js';

// Implementations
export * from './implementations/token-exchanger.js';
export * from './implementations/memory-credential-store.js';
export * from './implementations/authenticator.js';
export * from './implementations/auth-client.js';
export * from './implementations/oauth-client.js';

export * from './schemas.js';
export * from './utils/index.js';
