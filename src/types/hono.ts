import type { Session } from './session.js';
import type { SessionTokenClaims } from './token.js';

/**
 * Hono context variables set by session authentication
 */
export interface AuthVariables {
  session?: Session;
  claims?: SessionTokenClaims;
  token?: string;
}
