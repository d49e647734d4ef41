import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { TokenManager, loadSigningKey } from '../../services/token-service.js';
import { MemoryRevokedTokenStorage, MemoryAuditLog } from '../../storage/memory/index.js';
import { signJwt, decodeJwt } from '../../crypto/jwt.js';
import type { Session } from '../../types/session.js';
import type { SigningKey, AuditEvent } from '../../types/token.js';
import type { IAuditLog } from '../../storage/interfaces/index.js';
import { getTestSigningKey } from '../test-setup.js';

const ISSUER = 'http://localhost:3000';
const T0 = new Date('2026-03-01T12:00:00Z');

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 'sess_0001',
    userId: 'user-1',
    webId: 'https://alice.example.test/profile/card#me',
    tokenHash: 'hash_0001',
    createdAt: T0,
    lastActivity: T0,
    expiresAt: new Date(T0.getTime() + 86400 * 1000),
    ...overrides,
  };
}

describe('TokenManager', () => {
  let signingKey: SigningKey;
  let revokedTokens: MemoryRevokedTokenStorage;
  let auditLog: MemoryAuditLog;
  let tokens: TokenManager;

  beforeAll(async () => {
    signingKey = await getTestSigningKey();
  });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);

    revokedTokens = new MemoryRevokedTokenStorage();
    auditLog = new MemoryAuditLog();
    tokens = new TokenManager({
      signingKey,
      issuer: ISSUER,
      ttl: 3600,
      refreshThreshold: 900,
      revokedTokens,
      auditLog,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('issue / validate', () => {
    it('should round-trip session claims', async () => {
      const token = await tokens.issue(makeSession());
      const claims = await tokens.validate(token);

      expect(claims).toMatchObject({
        iss: ISSUER,
        sub: 'user-1',
        aud: 'solid-pod-server',
        session_id: 'sess_0001',
        user_id: 'user-1',
        webid: 'https://alice.example.test/profile/card#me',
        iat: T0.getTime() / 1000,
        exp: T0.getTime() / 1000 + 3600,
      });
      expect(claims.account_id).toBeUndefined();
      expect(claims.role_id).toBeUndefined();
    });

    it('should carry account context only when both fields are set', async () => {
      const full = await tokens.validate(
        await tokens.issue(makeSession({ accountId: 'acct-1', roleId: 'owner' }))
      );
      expect(full.account_id).toBe('acct-1');
      expect(full.role_id).toBe('owner');

      const partial = await tokens.validate(await tokens.issue(makeSession({ accountId: 'acct-1' })));
      expect(partial.account_id).toBeUndefined();
      expect(partial.role_id).toBeUndefined();
    });

    it('should give every token its own identifier', async () => {
      const session = makeSession();
      const first = await tokens.validate(await tokens.issue(session));
      const second = await tokens.validate(await tokens.issue(session));

      expect(first.jti).not.toBe(second.jti);
      expect(first.jti).not.toBe(session.id);
    });

    it('should audit issuance and validation', async () => {
      await tokens.validate(await tokens.issue(makeSession()));

      const events = await auditLog.list();
      expect(events.map((event) => [event.type, event.userId, event.success])).toEqual([
        ['token_issued', 'user-1', true],
        ['token_validated', 'user-1', true],
      ]);
    });

    it('should reject a tampered token', async () => {
      const token = await tokens.issue(makeSession());
      const [header, , signature] = token.split('.');
      const forgedPayload = Buffer.from(
        JSON.stringify({ ...decodeJwt(token), user_id: 'mallory' })
      ).toString('base64url');

      await expect(tokens.validate(`${header}.${forgedPayload}.${signature}`)).rejects.toMatchObject({
        code: 'invalid_token',
        description: 'Token verification failed',
      });

      const failures = await auditLog.list({ type: 'token_validation_failed' });
      expect(failures).toHaveLength(1);
      expect(failures[0]?.userId).toBeUndefined();
    });

    it('should reject a token signed with another key', async () => {
      const otherKey = await loadSigningKey(undefined, 'test-key');
      const other = new TokenManager({ signingKey: otherKey, issuer: ISSUER });

      await expect(tokens.validate(await other.issue(makeSession()))).rejects.toMatchObject({
        code: 'invalid_token',
      });
    });

    it('should reject a token from another issuer and audit its user', async () => {
      const other = new TokenManager({ signingKey, issuer: 'https://elsewhere.example.test' });

      await expect(tokens.validate(await other.issue(makeSession()))).rejects.toMatchObject({
        code: 'invalid_token',
      });

      const failures = await auditLog.list({ type: 'token_validation_failed' });
      expect(failures[0]?.userId).toBe('user-1');
    });

    it('should report expiry distinctly', async () => {
      const token = await tokens.issue(makeSession());
      vi.setSystemTime(new Date(T0.getTime() + 3600 * 1000));

      await expect(tokens.validate(token)).rejects.toMatchObject({ code: 'token_expired' });

      const failures = await auditLog.list({ type: 'token_validation_failed' });
      expect(failures).toHaveLength(1);
      expect(failures[0]?.userId).toBe('user-1');
    });

    it('should reject tokens missing session claims', async () => {
      const now = T0.getTime() / 1000;
      const token = await signJwt({ user_id: 'user-1' }, signingKey, {
        issuer: ISSUER,
        subject: 'user-1',
        audience: 'solid-pod-server',
        issuedAt: now,
        expiresAt: now + 60,
      });

      await expect(tokens.validate(token)).rejects.toMatchObject({
        code: 'invalid_token',
        description: 'Missing required claims',
      });

      const events = await auditLog.list({ type: 'missing_required_claims' });
      expect(events).toHaveLength(1);
      expect(events[0]?.userId).toBe('user-1');
    });
  });

  describe('revoke', () => {
    it('should reject a revoked token until its expiry', async () => {
      const token = await tokens.issue(makeSession());
      await tokens.revoke(token, 'logout');

      await expect(tokens.validate(token)).rejects.toMatchObject({ code: 'token_revoked' });
      expect(await tokens.isRevoked(token)).toBe(true);
      expect(await auditLog.list({ type: 'revoked_token_used' })).toHaveLength(1);

      const claims = decodeJwt(token);
      const entry = await revokedTokens.isRevoked(String(claims?.jti));
      expect(entry).toBe(true);
    });

    it('should record the reason and expiry of the revoked token', async () => {
      const token = await tokens.issue(makeSession());
      await tokens.revoke(token, 'compromised');

      const events = await auditLog.list({ type: 'token_revoked' });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ userId: 'user-1', success: true, reason: 'compromised' });
    });

    it('should leave other tokens for the same session valid', async () => {
      const session = makeSession();
      const revoked = await tokens.issue(session);
      const kept = await tokens.issue(session);
      await tokens.revoke(revoked, 'logout');

      await expect(tokens.validate(kept)).resolves.toMatchObject({ session_id: 'sess_0001' });
    });

    it('should revoke an already expired token', async () => {
      const token = await tokens.issue(makeSession());
      vi.setSystemTime(new Date(T0.getTime() + 7200 * 1000));

      await expect(tokens.revoke(token, 'cleanup')).resolves.toBeUndefined();
    });

    it('should refuse to revoke a token it did not sign', async () => {
      await expect(tokens.revoke('not.a.token', 'logout')).rejects.toMatchObject({
        code: 'invalid_token',
      });
    });

    it('should audit bulk revocation for a user', async () => {
      await tokens.revokeAllForUser('user-1', 'password_changed');

      const events = await auditLog.list({ type: 'all_user_tokens_revoked' });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ userId: 'user-1', reason: 'password_changed' });
      await expect(tokens.revokeAllForUser('', 'x')).rejects.toMatchObject({
        code: 'invalid_request',
      });
    });

    it('should purge revocation entries once the token would have expired', async () => {
      await tokens.revoke(await tokens.issue(makeSession()), 'logout');

      expect(await tokens.cleanupExpiredRevocations()).toBe(0);

      vi.setSystemTime(new Date(T0.getTime() + 3600 * 1000));
      expect(await tokens.cleanupExpiredRevocations()).toBe(1);
    });
  });

  describe('refresh', () => {
    it('should refuse while more than the threshold remains', async () => {
      const token = await tokens.issue(makeSession());
      vi.setSystemTime(new Date(T0.getTime() + 2699 * 1000));

      await expect(tokens.refresh(token)).rejects.toMatchObject({
        code: 'token_refresh_not_needed',
        statusCode: 400,
      });
    });

    it('should mint a new token within the threshold', async () => {
      const token = await tokens.issue(makeSession({ accountId: 'acct-1', roleId: 'owner' }));
      vi.setSystemTime(new Date(T0.getTime() + 2700 * 1000));

      const refreshed = await tokens.refresh(token);
      const before = await tokens.validate(token);
      const after = await tokens.validate(refreshed);

      expect(after.jti).not.toBe(before.jti);
      expect(after.exp).toBe(T0.getTime() / 1000 + 2700 + 3600);
      expect(after).toMatchObject({
        session_id: 'sess_0001',
        user_id: 'user-1',
        account_id: 'acct-1',
        role_id: 'owner',
      });
      expect(await auditLog.list({ type: 'token_refreshed' })).toHaveLength(1);
    });
  });

  describe('audit sink', () => {
    it('should not fail token operations when the sink fails', async () => {
      const failingLog: IAuditLog = {
        record: async (_event: AuditEvent) => {
          throw new Error('audit store unavailable');
        },
        list: async () => [],
      };
      const withFailingSink = new TokenManager({ signingKey, issuer: ISSUER, auditLog: failingLog });

      const token = await withFailingSink.issue(makeSession());
      await expect(withFailingSink.validate(token)).resolves.toMatchObject({ user_id: 'user-1' });
    });
  });

  it('should publish its public key as a JWK', async () => {
    const jwk = await tokens.getPublicJwk();

    expect(jwk).toMatchObject({ kty: 'RSA', kid: 'test-key', alg: 'RS256', use: 'sig', e: 'AQAB' });
    expect(jwk.d).toBeUndefined();
  });
});
