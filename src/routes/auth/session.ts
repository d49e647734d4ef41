import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthServices } from './types.js';
import { toSessionResponse } from './types.js';
import { jsonBody } from './validation.js';
import { sessionAuth, authenticated } from '../../middleware/session-auth.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const accountContextSchema = z.object({
  account_id: z.string().min(1),
  role_id: z.string().min(1),
});

export interface SessionRouteOptions {
  services: AuthServices;
}

/**
 * Create session routes (all bearer-protected)
 *
 * - GET /session
 * - GET /sessions
 * - POST /refresh
 * - POST /logout
 * - POST /logout-all
 * - PUT /session/account
 * - DELETE /session/account
 */
export function createSessionRoutes(options: SessionRouteOptions) {
  const { sessions, tokens } = options.services;

  const router = new Hono<{ Variables: AuthVariables }>();
  const requireSession = sessionAuth({ sessions });

  router.get('/session', requireSession, (c) => {
    const { session, claims } = authenticated(c);
    return c.json({
      session: toSessionResponse(session),
      token_expires_at: new Date(claims.exp * 1000).toISOString(),
    });
  });

  router.get('/sessions', requireSession, async (c) => {
    const { session } = authenticated(c);
    const active = await sessions.listForUser(session.userId);
    return c.json({ sessions: active.map(toSessionResponse) });
  });

  router.post('/refresh', requireSession, async (c) => {
    const { session } = authenticated(c);
    const refreshed = await sessions.refresh(session.id);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json({ token: refreshed.token, session: toSessionResponse(refreshed.session) });
  });

  router.post('/logout', requireSession, async (c) => {
    const { session, token } = authenticated(c);

    await tokens.revoke(token, 'logout');
    await sessions.invalidate(session.id);

    return c.body(null, 204);
  });

  router.post('/logout-all', requireSession, async (c) => {
    const { session, token } = authenticated(c);

    await tokens.revoke(token, 'logout_all');
    await tokens.revokeAllForUser(session.userId, 'logout_all');
    const removed = await sessions.invalidateAllForUser(session.userId);

    return c.json({ sessions_invalidated: removed });
  });

  router.put('/session/account', requireSession, jsonBody(accountContextSchema), async (c) => {
    const { session } = authenticated(c);
    const input = c.req.valid('json');

    await sessions.setAccountContext(session.id, input.account_id, input.role_id);
    const refreshed = await sessions.refresh(session.id);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json({ token: refreshed.token, session: toSessionResponse(refreshed.session) });
  });

  router.delete('/session/account', requireSession, async (c) => {
    const { session } = authenticated(c);

    await sessions.clearAccountContext(session.id);
    const refreshed = await sessions.refresh(session.id);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json({ token: refreshed.token, session: toSessionResponse(refreshed.session) });
  });

  return router;
}
