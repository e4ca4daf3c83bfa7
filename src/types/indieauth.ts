export type GrantType = 'authorization_code' | 'refresh_token';

export type CodeChallengeMethod = 'S256';

export type RefreshTokenRotation = 'rotate' | 'reuse';

export interface AuthorizationRequest {
  clientId: string;
  redirectUri: string;
  scope: string;
  codeChallenge: string;
  codeChallengeMethod: string;
  state?: string;
}

export interface AuthorizationGrant {
  /** Plain-text code, only ever returned here. */
  code: string;
  /** `redirect_uri` with `code`, `state` and `iss` appended. */
  redirectTo: string;
  expiresAt: Date;
  client: ClientInfo;
  scopes: string[];
}

export interface CodeExchangeRequest {
  code: string;
  redirectUri: string;
  codeVerifier: string;
  clientId?: string;
}

export interface RefreshRequest {
  refreshToken: string;
  clientId?: string;
  scope?: string;
}

export interface Profile {
  name?: string;
  url: string;
  photo?: string;
  email?: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  scope: string;
  me: string;
  expires_in: number;
  refresh_token?: string;
  profile?: Profile;
}

export interface VerifiedToken {
  me: string;
  clientId: string;
  scope: string;
  expiresAt: Date;
  issuedAt: Date;
}

export type IntrospectionResponse =
  | { active: false }
  | {
      active: true;
      me: string;
      client_id: string;
      scope: string;
      exp: number;
      iat: number;
    };

export interface ClientInfo {
  clientId: string;
  name: string;
  url: string;
  logo: string | null;
  redirectUris: string[];
}

export interface ServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  introspection_endpoint: string;
  introspection_endpoint_auth_methods_supported: string[];
  revocation_endpoint: string;
  revocation_endpoint_auth_methods_supported: string[];
  scopes_supported: string[];
  response_types_supported: string[];
  grant_types_supported: GrantType[];
  service_documentation: string;
  code_challenge_methods_supported: CodeChallengeMethod[];
  authorization_response_iss_parameter_supported: boolean;
}
