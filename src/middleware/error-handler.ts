import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { AuthVariables } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { AuthError } from '../errors/auth-error.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../config/constants.js';

export interface ErrorHandlerOptions {
  logger: Logger;
  /**
   * Hide internal error messages from responses
   */
  production?: boolean;
}

/**
 * Global error handler
 *
 * Turns errors into `{ error, error_description }` JSON responses
 */
export function authErrorHandler(
  options: ErrorHandlerOptions
): ErrorHandler<{ Variables: AuthVariables }> {
  const { logger, production = false } = options;

  return (err, c) => {
    // Error responses must never be cached
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof AuthError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { code: err.code, error: err });
      } else {
        logger.debug('Request rejected', { code: err.code, description: err.description });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      const messages = err.errors.map((e) => e.message).join(', ');
      return c.json(AuthError.invalidRequest(messages || 'Validation failed').toJSON(), 400);
    }

    logger.error('Unhandled error', { error: err });

    const serverError = AuthError.serverError(
      production ? 'An unexpected error occurred' : err.message
    );
    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: { production?: boolean } = {}): MiddlewareHandler {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    if (options.production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // No headers or bodies: they carry credentials
    logger.info('Request handled', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      sessionId: c.get('session')?.id,
    });
  };
}
