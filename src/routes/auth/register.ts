import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthServices } from './types.js';
import { toSessionResponse, toUserResponse } from './types.js';
import { jsonBody } from './validation.js';
import { sessionAuth, authenticated } from '../../middleware/session-auth.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const externalCodeSchema = z.object({
  provider: z.string().min(1),
  code: z.string().min(1),
});

export interface RegisterRouteOptions {
  services: AuthServices;
}

/**
 * Create registration and identity linking routes
 *
 * - POST /register/external
 * - GET /identities (bearer)
 * - POST /identities (bearer)
 * - DELETE /identities/:provider/:externalId (bearer)
 *
 * Profiles always come from the provider through a code exchange,
 * never from the request body.
 */
export function createRegisterRoutes(options: RegisterRouteOptions) {
  const { authentication, registration, linking, sessions } = options.services;

  const router = new Hono<{ Variables: AuthVariables }>();
  const requireSession = sessionAuth({ sessions });

  router.post('/register/external', jsonBody(externalCodeSchema), async (c) => {
    const input = c.req.valid('json');

    const profile = await authentication.exchangeProfile(input.provider, input.code);
    const user = await registration.registerWithExternalIdentity(input.provider, profile);
    const { session, token } = await sessions.create(user.id, user.webId);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json(
      {
        user: toUserResponse(user),
        token,
        session: toSessionResponse(session),
      },
      201
    );
  });

  router.get('/identities', requireSession, async (c) => {
    const { session } = authenticated(c);
    const identities = await linking.listLinked(session.userId);

    return c.json({
      identities: identities.map((identity) => ({
        provider: identity.provider,
        external_id: identity.externalId,
        created_at: identity.createdAt.toISOString(),
      })),
    });
  });

  router.post('/identities', requireSession, jsonBody(externalCodeSchema), async (c) => {
    const { session } = authenticated(c);
    const input = c.req.valid('json');

    const profile = await authentication.exchangeProfile(input.provider, input.code);
    const identity = await linking.link(session.userId, input.provider, profile);

    return c.json(
      {
        provider: identity.provider,
        external_id: identity.externalId,
        created_at: identity.createdAt.toISOString(),
      },
      201
    );
  });

  router.delete('/identities/:provider/:externalId', requireSession, async (c) => {
    const { session } = authenticated(c);
    await linking.unlink(session.userId, c.req.param('provider'), c.req.param('externalId'));
    return c.body(null, 204);
  });

  return router;
}
