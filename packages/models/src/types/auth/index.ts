export type { Session } from './Session.js';
export type {
  ApiKeyCredential,
  TokenPairCredential,
  ClientTokenCredential,
  Credential,
} from './Credential.js';
export type { OAuthConfig, TokenEndpointConfig } from './OAuthConfig.js';
export type { TokenResponse, TokenErrorResponse } from './TokenResponse.js';
export type {
  AuthorizationCodeTokenRequest,
  PasswordTokenRequest,
  ClientCredentialsTokenRequest,
  RefreshTokenRequest,
  TokenRequest,
} from './TokenRequest.js';
export type {
  PkcePair,
  AuthorizationUrlResult,
  SignOutResult,
} from './PkcePair.js';
