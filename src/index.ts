import { serve } from '@hono/node-server';
import { createAuthServer, createAuthServices } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { LoggingMailer } from './services/mailer.js';
import { loadSigningKey } from './services/token-service.js';
import { CleanupScheduler } from './services/cleanup-scheduler.js';

// Load configuration
const config = getConfig();
const logger = createLogger({
  level: config.logging.level,
  silent: config.server.nodeEnv === 'test',
  fields: { service: 'webid-auth' },
});

if (!config.secrets.jwtSigningKey) {
  logger.warn('JWT_SIGNING_KEY not set; generated an ephemeral signing key');
}
const signingKey = await loadSigningKey(config.secrets.jwtSigningKey);

logger.info('Using in-memory storage; data will be lost on restart');
const storage = createMemoryStorage({ baseUrl: config.server.baseUrl });

const services = createAuthServices({
  config,
  storage,
  signingKey,
  mailer: new LoggingMailer(logger.child({ component: 'mailer' })),
  logger,
});

const app = createAuthServer({
  services,
  logger,
  production: config.server.nodeEnv === 'production',
  rateLimit: config.rateLimit,
  enableLogging: config.server.nodeEnv !== 'test',
});

const shutdown = new AbortController();

const scheduler = new CleanupScheduler({
  sessions: services.sessions,
  tokens: services.tokens,
  passwords: services.passwords,
  intervalMs: config.session.cleanupInterval * 1000,
  logger,
  signal: shutdown.signal,
});
scheduler.start();

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Authentication server listening', {
      address: info.address,
      port: info.port,
      baseUrl: config.server.baseUrl,
    });
  }
);

function stop(signal: string): void {
  logger.info('Shutting down', { signal });
  shutdown.abort();
  scheduler
    .stop()
    .then(
      () =>
        new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        })
    )
    .then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', { error: err });
        process.exit(1);
      }
    );
}

process.once('SIGINT', () => stop('SIGINT'));
process.once('SIGTERM', () => stop('SIGTERM'));

// Export for programmatic use
export { createAuthServer, createAuthServices } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './services/index.js';
export { createLogger, silentLogger, type Logger } from './logging/logger.js';
