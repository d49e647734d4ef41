import type { Context, MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import {
  DEFAULT_LOGIN_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from '../config/constants.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context) => string;
  skipSuccessfulRequests?: boolean; // Only count responses with status >= 400
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory rate limiter
 * For production, use Redis or similar distributed store
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { windowMs, maxRequests, keyGenerator = clientAddress, skipSuccessfulRequests = false } =
    options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      store.set(key, entry);
    }

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', '0');
      c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

      throw AuthError.tooManyRequests(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count - 1));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (!skipSuccessfulRequests) {
      entry.count++;
      await next();
      return;
    }

    try {
      await next();
    } catch (err) {
      entry.count++;
      throw err;
    }
    if (c.res.status >= 400) {
      entry.count++;
    }
  };
}

/**
 * Client address from proxy headers
 */
function clientAddress(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    'unknown'
  );
}

/**
 * Login endpoint rate limiter; counts failed attempts only
 */
export function loginRateLimiter(
  windowMs: number = DEFAULT_RATE_LIMIT_WINDOW_MS,
  maxRequests: number = DEFAULT_LOGIN_RATE_LIMIT_MAX_REQUESTS
): MiddlewareHandler<{ Variables: AuthVariables }> {
  return rateLimiter({
    windowMs,
    maxRequests,
    skipSuccessfulRequests: true,
    keyGenerator: (c) => `login:${clientAddress(c)}`,
  });
}
