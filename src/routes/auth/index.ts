import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthServices } from './types.js';
import { createLoginRoutes } from './login.js';
import { createSessionRoutes } from './session.js';
import { createPasswordRoutes } from './password.js';
import { createRegisterRoutes } from './register.js';
import { loginRateLimiter } from '../../middleware/rate-limiter.js';

export interface AuthRoutesOptions {
  services: AuthServices;
  /**
   * Failed login attempts allowed per client per window
   */
  loginRateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
}

/**
 * Create all `/auth` routes
 */
export function createAuthRoutes(options: AuthRoutesOptions): Hono<{ Variables: AuthVariables }> {
  const { services, loginRateLimit } = options;
  const app = new Hono<{ Variables: AuthVariables }>();

  const limiter = loginRateLimiter(loginRateLimit?.windowMs, loginRateLimit?.maxRequests);
  app.use('/login', limiter);
  app.use('/password/*', limiter);

  app.route('/', createLoginRoutes({ services }));
  app.route('/', createSessionRoutes({ services }));
  app.route('/', createPasswordRoutes({ services }));
  app.route('/', createRegisterRoutes({ services }));

  return app;
}

export * from './types.js';
export { parseCredentials } from './login.js';
