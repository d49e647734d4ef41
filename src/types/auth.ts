import type { Session } from './session.js';

/**
 * Credentials accepted by the authentication service
 */
export type Credentials =
  | { method: 'password'; email: string; password: string }
  | { method: 'webid-oidc'; webId: string; token: string }
  | { method: 'oauth'; provider: string; code: string };

export type AuthMethod = Credentials['method'];

/**
 * Identity established by a credential verifier
 */
export interface AuthPrincipal {
  userId: string;
  webId: string;
}

export interface AuthenticationResult {
  method: AuthMethod;
  session: Session;
  token: string;
}
