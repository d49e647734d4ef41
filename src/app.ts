import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthVariables } from './types/hono.js';
import type { SigningKey } from './types/token.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Config } from './config/index.js';
import type { Logger } from './logging/logger.js';
import { silentLogger } from './logging/logger.js';
import type { IMailer } from './services/mailer.js';
import type { FetchLike } from './services/webid-oidc-verifier.js';
import type { OAuthProvider } from './services/oauth-provider.js';
import { TokenManager } from './services/token-service.js';
import { SessionManager } from './services/session-service.js';
import { PasswordService } from './services/password-service.js';
import { PasswordPolicy } from './services/password-policy.js';
import { WebIdOidcVerifier } from './services/webid-oidc-verifier.js';
import { AuthenticationService } from './services/authentication-service.js';
import { RegistrationService } from './services/registration-service.js';
import { IdentityLinkingService } from './services/identity-linking-service.js';
import { OAuthStateStore, createOAuthProviders } from './services/oauth-provider.js';
import { authErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { createAuthRoutes, type AuthServices } from './routes/auth/index.js';
import { createJWKSRoutes } from './routes/discovery/jwks.js';

export interface CreateAuthServicesOptions {
  config: Config;
  storage: IStorage;
  signingKey: SigningKey;
  mailer: IMailer;
  /**
   * Overrides the providers built from `config.oauth`
   */
  providers?: Map<string, OAuthProvider>;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Wire every service from configuration and storage
 */
export function createAuthServices(options: CreateAuthServicesOptions): AuthServices {
  const { config, storage, signingKey, mailer, logger = silentLogger } = options;

  const tokens = new TokenManager({
    signingKey,
    issuer: config.token.issuer,
    audience: config.token.audience,
    ttl: config.token.ttl,
    refreshThreshold: config.token.refreshThreshold,
    revokedTokens: storage.revokedTokens,
    auditLog: storage.auditLog,
    logger,
  });

  const sessions = new SessionManager({
    storage: storage.sessions,
    tokens,
    ttl: config.session.ttl,
    refreshThreshold: config.session.refreshThreshold,
    logger,
  });

  const passwords = new PasswordService({
    credentials: storage.credentials,
    resets: storage.passwordResets,
    users: storage.users,
    mailer,
    baseUrl: config.server.baseUrl,
    policy: new PasswordPolicy(config.password.policy),
    resetTtl: config.password.resetTtl,
    bcryptCost: config.password.bcryptCost,
    secureTokenBytes: config.password.secureTokenBytes,
    logger,
  });

  const verifier = new WebIdOidcVerifier({
    timeoutMs: config.webIdOidc.timeoutMs,
    cacheTtl: config.webIdOidc.cacheTtl,
    fetch: options.fetch,
    logger,
  });

  const providers = options.providers ?? createOAuthProviders(config, options.fetch);

  const authentication = new AuthenticationService({
    users: storage.users,
    identities: storage.externalIdentities,
    passwords,
    sessions,
    verifier,
    providers,
    logger,
  });

  return {
    tokens,
    sessions,
    passwords,
    authentication,
    registration: new RegistrationService({
      identities: storage.externalIdentities,
      users: storage.users,
      logger,
    }),
    linking: new IdentityLinkingService({
      identities: storage.externalIdentities,
      users: storage.users,
      logger,
    }),
    oauthStates: new OAuthStateStore(),
  };
}

export interface AuthServerOptions {
  services: AuthServices;
  logger?: Logger;
  production?: boolean;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  loginRateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the authentication server application
 */
export function createAuthServer(options: AuthServerOptions): Hono<{ Variables: AuthVariables }> {
  const {
    services,
    logger = silentLogger,
    production = false,
    rateLimit = { windowMs: 60000, maxRequests: 100 },
    loginRateLimit,
    enableCors = true,
    enableLogging = true,
  } = options;

  const app = new Hono<{ Variables: AuthVariables }>();

  // Global error handler
  app.onError(authErrorHandler({ logger, production }));

  // Security headers
  app.use('*', securityHeaders({ production }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger.child({ component: 'http' })));
  }

  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/.well-known/jwks.json', createJWKSRoutes({ tokens: services.tokens }));

  app.route('/auth', createAuthRoutes({ services, loginRateLimit }));

  return app;
}
