/**
 * OpenID provider configuration discovered from a WebID host
 */
export interface OidcConfiguration {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  jwks_uri: string;
  scopes_supported?: string[];
  response_types_supported?: string[];
}

/**
 * Claims extracted from a verified WebID-OIDC token
 */
export interface WebIdClaims {
  subject: string;
  webId: string;
  issuer: string;
  audience: string[];
  expiresAt: Date;
  issuedAt: Date;
}
