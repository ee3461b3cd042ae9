/**
 * Authorization code exchange, bound to the PKCE verifier
 */
export interface AuthorizationCodeTokenRequest {
  grantType: 'authorization_code';
  code: string;
  codeVerifier: string;
}

export interface PasswordTokenRequest {
  grantType: 'password';
  email: string;
  password: string;
}

export interface ClientCredentialsTokenRequest {
  grantType: 'client_credentials';
  clientId: string;
  clientSecret: string;
}

export interface RefreshTokenRequest {
  grantType: 'refresh_token';
  refreshToken: string;
}

/**
 * Tagged request understood by the token exchanger. Each variant produces a
 * credential through the same exchange contract.
 */
export type TokenRequest =
  | AuthorizationCodeTokenRequest
  | PasswordTokenRequest
  | ClientCredentialsTokenRequest
  | RefreshTokenRequest;
