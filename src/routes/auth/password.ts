import { Hono } from 'hono';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthServices } from './types.js';
import { jsonBody } from './validation.js';
import { sessionAuth, authenticated } from '../../middleware/session-auth.js';

const forgotPasswordSchema = z.object({
  email: z.string().email(),
});

const resetPasswordSchema = z.object({
  token: z.string().min(1),
  new_password: z.string().min(1),
});

const changePasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(1),
});

export interface PasswordRouteOptions {
  services: AuthServices;
}

/**
 * Create password routes
 *
 * - POST /password/forgot
 * - POST /password/reset
 * - POST /password/change (bearer)
 */
export function createPasswordRoutes(options: PasswordRouteOptions) {
  const { passwords, sessions } = options.services;

  const router = new Hono<{ Variables: AuthVariables }>();

  // Same response whether or not the address is known
  router.post('/password/forgot', jsonBody(forgotPasswordSchema), async (c) => {
    const { email } = c.req.valid('json');
    await passwords.initiateReset(email);
    return c.json({ status: 'ok' }, 202);
  });

  router.post('/password/reset', jsonBody(resetPasswordSchema), async (c) => {
    const input = c.req.valid('json');
    await passwords.completeReset(input.token, input.new_password);
    return c.json({ status: 'ok' });
  });

  router.post(
    '/password/change',
    sessionAuth({ sessions }),
    jsonBody(changePasswordSchema),
    async (c) => {
      const { session } = authenticated(c);
      const input = c.req.valid('json');
      await passwords.changePassword(session.userId, input.current_password, input.new_password);
      return c.json({ status: 'ok' });
    }
  );

  return router;
}
