import type { MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { Session } from '../types/session.js';
import type { SessionTokenClaims } from '../types/token.js';
import type { SessionManager } from '../services/session-service.js';
import { AuthError } from '../errors/auth-error.js';
import { HEADER_AUTHORIZATION, HEADER_WWW_AUTHENTICATE } from '../config/constants.js';

export interface SessionAuthOptions {
  sessions: SessionManager;
  realm?: string;
}

/**
 * Extract bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string): string | null {
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token === '' ? null : token;
}

/**
 * Require a session token
 *
 * Sets `session`, `claims` and `token` in context variables on success
 */
export function sessionAuth(options: SessionAuthOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { sessions, realm = 'webid-auth' } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}"`);
      throw AuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_request"`);
      throw AuthError.invalidToken('Invalid authorization header format');
    }

    try {
      const { session, claims } = await sessions.authenticateToken(token);
      c.set('claims', claims);
      c.set('session', session);
      c.set('token', token);
    } catch (err) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_token"`);
      throw err;
    }

    await next();
  };
}

export interface Authenticated {
  session: Session;
  claims: SessionTokenClaims;
  token: string;
}

/**
 * Read what `sessionAuth` stored on the context
 */
export function authenticated(c: {
  get<K extends keyof AuthVariables>(key: K): AuthVariables[K];
}): Authenticated {
  const session = c.get('session');
  const claims = c.get('claims');
  const token = c.get('token');
  if (!session || !claims || !token) {
    throw AuthError.serverError('Session authentication did not run');
  }
  return { session, claims, token };
}
