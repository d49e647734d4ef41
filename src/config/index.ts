import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  return env[envVar];
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function readInt(value: string | undefined, fallback: number): number {
  return parseInt(value ?? String(fallback), 10);
}

const oauthClientSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    nodeEnv: z.string(),
    baseUrl: z.string().url(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
  secrets: z.object({
    jwtSigningKey: z.string().optional(),
  }),
  session: z.object({
    ttl: z.number().int().positive(),
    refreshThreshold: z.number().int().nonnegative(),
    cleanupInterval: z.number().int().positive(),
  }),
  token: z.object({
    issuer: z.string().min(1),
    audience: z.string().min(1),
    ttl: z.number().int().positive(),
    refreshThreshold: z.number().int().nonnegative(),
  }),
  password: z.object({
    resetTtl: z.number().int().positive(),
    bcryptCost: z.number().int(),
    secureTokenBytes: z.number().int(),
    policy: z.object({
      minLength: z.number().int().positive(),
      requireUppercase: z.boolean(),
      requireLowercase: z.boolean(),
      requireNumbers: z.boolean(),
      requireSpecial: z.boolean(),
    }),
  }),
  webIdOidc: z.object({
    timeoutMs: z.number().int().positive(),
    cacheTtl: z.number().int().nonnegative(),
  }),
  rateLimit: z.object({
    windowMs: z.number().int().positive(),
    maxRequests: z.number().int().positive(),
  }),
  oauth: z.object({
    google: oauthClientSchema.optional(),
    github: oauthClientSchema.optional(),
  }),
});

/**
 * Application configuration loaded from environment
 */
export type Config = z.infer<typeof configSchema>;

export type PasswordPolicyConfig = Config['password']['policy'];

function readOAuthClient(
  env: NodeJS.ProcessEnv,
  prefix: string
): { clientId: string; clientSecret: string } | undefined {
  const clientId = env[`${prefix}_CLIENT_ID`];
  const clientSecret = readSecret(env, `${prefix}_CLIENT_SECRET`);
  if (!clientId || !clientSecret) {
    return undefined;
  }
  return { clientId, clientSecret };
}

/**
 * Load configuration from environment variables
 *
 * Throws a ZodError when a value is out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = readInt(env['PORT'], 3000);
  const host = env['HOST'] ?? '0.0.0.0';
  const baseUrl =
    env['BASE_URL'] ?? `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}`;

  return configSchema.parse({
    server: {
      port,
      host,
      nodeEnv: env['NODE_ENV'] ?? 'development',
      baseUrl,
    },
    logging: {
      level: env['LOG_LEVEL'] ?? 'info',
    },
    secrets: {
      jwtSigningKey: readSecret(env, 'JWT_SIGNING_KEY'),
    },
    session: {
      ttl: readInt(env['SESSION_TTL'], constants.DEFAULT_SESSION_TTL),
      refreshThreshold: readInt(
        env['SESSION_REFRESH_THRESHOLD'],
        constants.DEFAULT_SESSION_REFRESH_THRESHOLD
      ),
      cleanupInterval: readInt(
        env['SESSION_CLEANUP_INTERVAL'],
        constants.DEFAULT_SESSION_CLEANUP_INTERVAL
      ),
    },
    token: {
      issuer: env['TOKEN_ISSUER'] ?? baseUrl,
      audience: env['TOKEN_AUDIENCE'] ?? constants.DEFAULT_TOKEN_AUDIENCE,
      ttl: readInt(env['TOKEN_TTL'], constants.DEFAULT_TOKEN_TTL),
      refreshThreshold: readInt(
        env['TOKEN_REFRESH_THRESHOLD'],
        constants.DEFAULT_TOKEN_REFRESH_THRESHOLD
      ),
    },
    password: {
      resetTtl: readInt(env['PASSWORD_RESET_TTL'], constants.DEFAULT_PASSWORD_RESET_TTL),
      bcryptCost: readInt(env['BCRYPT_COST'], constants.DEFAULT_BCRYPT_COST),
      secureTokenBytes: readInt(env['SECURE_TOKEN_BYTES'], constants.DEFAULT_SECURE_TOKEN_BYTES),
      policy: {
        minLength: readInt(env['PASSWORD_MIN_LENGTH'], constants.DEFAULT_PASSWORD_MIN_LENGTH),
        requireUppercase: readBoolean(env['PASSWORD_REQUIRE_UPPERCASE'], true),
        requireLowercase: readBoolean(env['PASSWORD_REQUIRE_LOWERCASE'], true),
        requireNumbers: readBoolean(env['PASSWORD_REQUIRE_NUMBER'], true),
        requireSpecial: readBoolean(env['PASSWORD_REQUIRE_SPECIAL'], true),
      },
    },
    webIdOidc: {
      timeoutMs: readInt(env['WEBID_OIDC_TIMEOUT_MS'], constants.DEFAULT_WEBID_OIDC_TIMEOUT_MS),
      cacheTtl: readInt(env['WEBID_OIDC_CACHE_TTL'], constants.DEFAULT_WEBID_OIDC_CACHE_TTL),
    },
    rateLimit: {
      windowMs: readInt(env['RATE_LIMIT_WINDOW_MS'], constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: readInt(env['RATE_LIMIT_MAX_REQUESTS'], constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    oauth: {
      google: readOAuthClient(env, 'GOOGLE'),
      github: readOAuthClient(env, 'GITHUB'),
    },
  });
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
