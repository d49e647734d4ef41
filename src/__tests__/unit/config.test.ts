import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';
import { loadConfig } from '../../config/index.js';

describe('loadConfig', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 3000,
      host: '0.0.0.0',
      nodeEnv: 'development',
      baseUrl: 'http://localhost:3000',
    });
    expect(config.logging.level).toBe('info');
    expect(config.secrets.jwtSigningKey).toBeUndefined();
    expect(config.session).toEqual({ ttl: 86400, refreshThreshold: 3600, cleanupInterval: 3600 });
    expect(config.token).toEqual({
      issuer: 'http://localhost:3000',
      audience: 'solid-pod-server',
      ttl: 3600,
      refreshThreshold: 900,
    });
    expect(config.password).toEqual({
      resetTtl: 3600,
      bcryptCost: 10,
      secureTokenBytes: 32,
      policy: {
        minLength: 8,
        requireUppercase: true,
        requireLowercase: true,
        requireNumbers: true,
        requireSpecial: true,
      },
    });
    expect(config.webIdOidc).toEqual({ timeoutMs: 30000, cacheTtl: 3600 });
    expect(config.rateLimit).toEqual({ windowMs: 60000, maxRequests: 100 });
    expect(config.oauth).toEqual({ google: undefined, github: undefined });
  });

  it('should derive the base URL from a specific host', () => {
    const config = loadConfig({ HOST: 'auth.internal', PORT: '8080' });

    expect(config.server.baseUrl).toBe('http://auth.internal:8080');
    expect(config.token.issuer).toBe('http://auth.internal:8080');
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      BASE_URL: 'https://auth.example.test',
      TOKEN_ISSUER: 'https://issuer.example.test',
      SESSION_TTL: '7200',
      TOKEN_TTL: '600',
      BCRYPT_COST: '12',
      PASSWORD_MIN_LENGTH: '12',
      PASSWORD_REQUIRE_SPECIAL: 'false',
      PASSWORD_REQUIRE_NUMBER: '0',
      LOG_LEVEL: 'debug',
    });

    expect(config.server.baseUrl).toBe('https://auth.example.test');
    expect(config.token.issuer).toBe('https://issuer.example.test');
    expect(config.session.ttl).toBe(7200);
    expect(config.token.ttl).toBe(600);
    expect(config.password.bcryptCost).toBe(12);
    expect(config.password.policy).toMatchObject({
      minLength: 12,
      requireSpecial: false,
      requireNumbers: false,
      requireUppercase: true,
    });
    expect(config.logging.level).toBe('debug');
  });

  it('should configure OAuth clients only when both values are present', () => {
    const config = loadConfig({
      GITHUB_CLIENT_ID: 'github-client',
      GITHUB_CLIENT_SECRET: 'test-secret',
      GOOGLE_CLIENT_ID: 'google-client',
    });

    expect(config.oauth.github).toEqual({ clientId: 'github-client', clientSecret: 'test-secret' });
    expect(config.oauth.google).toBeUndefined();
  });

  it('should read secrets from files', () => {
    const dir = mkdtempSync(join(tmpdir(), 'webid-auth-config-'));
    tempDirs.push(dir);
    const secretFile = join(dir, 'github-secret');
    writeFileSync(secretFile, 'file-secret\n');

    const config = loadConfig({
      GITHUB_CLIENT_ID: 'github-client',
      GITHUB_CLIENT_SECRET: 'env-secret',
      GITHUB_CLIENT_SECRET_FILE: secretFile,
    });

    expect(config.oauth.github?.clientSecret).toBe('file-secret');
  });

  it('should reject out-of-range values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(ZodError);
    expect(() => loadConfig({ SESSION_TTL: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
    expect(() => loadConfig({ BASE_URL: 'not a url' })).toThrow(ZodError);
  });
});
