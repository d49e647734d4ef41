import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import type { TokenManager } from '../../services/token-service.js';

export interface JWKSRouteOptions {
  tokens: TokenManager;
}

/**
 * Create JWKS endpoint
 *
 * GET /.well-known/jwks.json
 */
export function createJWKSRoutes(options: JWKSRouteOptions) {
  const { tokens } = options;

  const router = new Hono<{ Variables: AuthVariables }>();

  router.get('/', async (c) => {
    const key = await tokens.getPublicJwk();

    // Cache for 1 hour
    c.header('Cache-Control', 'public, max-age=3600');

    return c.json({ keys: [key] });
  });

  return router;
}
