import { zValidator } from '@hono/zod-validator';
import type { ZodSchema } from 'zod';

/**
 * JSON body validator that hands failures to the global error handler
 */
export function jsonBody<T extends ZodSchema>(schema: T) {
  return zValidator('json', schema, (result) => {
    if (!result.success) {
      throw result.error;
    }
  });
}
