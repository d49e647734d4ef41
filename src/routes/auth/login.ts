import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { Credentials } from '../../types/auth.js';
import type { AuthServices } from './types.js';
import { toSessionResponse } from './types.js';
import { jsonBody } from './validation.js';
import { AuthError } from '../../errors/auth-error.js';
import {
  SUPPORTED_AUTH_METHODS,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const loginRequestSchema = z.object({ method: z.string().min(1) }).passthrough();

const credentialsSchema = z.discriminatedUnion('method', [
  z.object({
    method: z.literal('password'),
    email: z.string().min(1),
    password: z.string().min(1),
  }),
  z.object({
    method: z.literal('webid-oidc'),
    webId: z.string().url(),
    token: z.string().min(1),
  }),
  z.object({
    method: z.literal('oauth'),
    provider: z.string().min(1),
    code: z.string().min(1),
  }),
]);

/**
 * Parse a login body, reporting unknown methods as such
 */
export function parseCredentials(body: { method: string }): Credentials {
  if (!SUPPORTED_AUTH_METHODS.some((method) => method === body.method)) {
    throw AuthError.unsupportedAuthMethod(body.method);
  }
  return credentialsSchema.parse(body);
}

export interface LoginRouteOptions {
  services: AuthServices;
}

/**
 * Create login routes
 *
 * - POST /login
 * - GET /oauth/:provider
 * - GET /oauth/:provider/callback
 */
export function createLoginRoutes(options: LoginRouteOptions) {
  const { authentication, oauthStates } = options.services;

  const router = new Hono<{ Variables: AuthVariables }>();

  router.post('/login', jsonBody(loginRequestSchema), async (c) => {
    const credentials = parseCredentials(c.req.valid('json'));
    const result = await authentication.authenticate(credentials);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json({
      token: result.token,
      method: result.method,
      session: toSessionResponse(result.session),
    });
  });

  // Start an OAuth login: hand out the provider URL with a fresh state
  router.get('/oauth/:provider', (c) => {
    const provider = authentication.getProvider(c.req.param('provider'));
    const state = oauthStates.create(provider.name);

    return c.json({
      authorization_url: provider.getAuthUrl(state),
      state,
    });
  });

  router.get('/oauth/:provider/callback', async (c) => {
    const providerName = c.req.param('provider');
    const code = c.req.query('code');
    const state = c.req.query('state');

    const providerError = c.req.query('error');
    if (providerError) {
      throw AuthError.invalidCredentials(new Error(`Provider returned error: ${providerError}`));
    }

    if (!code || !state) {
      throw AuthError.invalidRequest('Missing code or state parameter');
    }

    if (!oauthStates.consume(state, providerName)) {
      throw AuthError.invalidRequest('Invalid or expired state parameter');
    }

    const result = await authentication.authenticate({
      method: 'oauth',
      provider: providerName,
      code,
    });

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    return c.json({
      token: result.token,
      method: result.method,
      session: toSessionResponse(result.session),
    });
  });

  return router;
}
