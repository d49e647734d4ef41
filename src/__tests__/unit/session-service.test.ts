import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { SessionManager } from '../../services/session-service.js';
import { TokenManager } from '../../services/token-service.js';
import { MemorySessionStorage, MemoryRevokedTokenStorage } from '../../storage/memory/index.js';
import type { Session } from '../../types/session.js';
import type { SigningKey } from '../../types/token.js';
import { getTestSigningKey } from '../test-setup.js';

const T0 = new Date('2026-03-01T12:00:00Z');
const DAY_MS = 86400 * 1000;
const HOUR_MS = 3600 * 1000;
const WEBID = 'https://alice.example.test/profile/card#me';

class FailingTokenManager extends TokenManager {
  override async issue(_session: Session): Promise<string> {
    throw new Error('signer unavailable');
  }
}

describe('SessionManager', () => {
  let signingKey: SigningKey;
  let storage: MemorySessionStorage;
  let tokens: TokenManager;
  let sessions: SessionManager;

  beforeAll(async () => {
    signingKey = await getTestSigningKey();
  });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);

    storage = new MemorySessionStorage();
    tokens = new TokenManager({
      signingKey,
      issuer: 'http://localhost:3000',
      revokedTokens: new MemoryRevokedTokenStorage(),
    });
    sessions = new SessionManager({ storage, tokens, ttl: 86400, refreshThreshold: 3600 });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('should persist a session and issue a bound token', async () => {
      const { session, token } = await sessions.create('user-1', WEBID);

      expect(session.id).toMatch(/^sess_[0-9a-f]{32}$/);
      expect(session.tokenHash).toMatch(/^hash_[0-9a-f]{64}$/);
      expect(session.createdAt).toEqual(T0);
      expect(session.expiresAt).toEqual(new Date(T0.getTime() + DAY_MS));
      expect(await storage.findById(session.id)).toEqual(session);

      const claims = await tokens.validate(token);
      expect(claims).toMatchObject({ session_id: session.id, user_id: 'user-1', webid: WEBID });
    });

    it('should reject empty identifiers', async () => {
      await expect(sessions.create('', WEBID)).rejects.toMatchObject({ code: 'invalid_request' });
      await expect(sessions.create('user-1', '')).rejects.toMatchObject({ code: 'invalid_request' });
    });

    it('should delete the session when the token cannot be issued', async () => {
      const failing = new SessionManager({
        storage,
        tokens: new FailingTokenManager({ signingKey, issuer: 'http://localhost:3000' }),
      });

      await expect(failing.create('user-1', WEBID)).rejects.toThrow('signer unavailable');
      expect(await storage.findByUser('user-1')).toEqual([]);
    });

    it('should surface the issuance error even if the cleanup delete fails', async () => {
      vi.spyOn(storage, 'delete').mockRejectedValue(new Error('storage offline'));
      const failing = new SessionManager({
        storage,
        tokens: new FailingTokenManager({ signingKey, issuer: 'http://localhost:3000' }),
      });

      await expect(failing.create('user-1', WEBID)).rejects.toThrow('signer unavailable');
    });
  });

  describe('validate', () => {
    it('should fail for unknown sessions', async () => {
      await expect(sessions.validate('sess_missing')).rejects.toMatchObject({
        code: 'session_not_found',
        statusCode: 401,
      });
    });

    it('should record activity', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      const later = new Date(T0.getTime() + 60_000);
      vi.setSystemTime(later);

      const validated = await sessions.validate(session.id);

      expect(validated.lastActivity).toEqual(later);
      expect((await storage.findById(session.id))?.lastActivity).toEqual(later);
    });

    it('should delete an expired session and then report it missing', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(session.expiresAt);

      await expect(sessions.validate(session.id)).rejects.toMatchObject({ code: 'session_expired' });
      expect(await storage.findById(session.id)).toBeNull();
      await expect(sessions.validate(session.id)).rejects.toMatchObject({
        code: 'session_not_found',
      });
    });

    it('should report expiry even when the delete fails', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(session.expiresAt);
      vi.spyOn(storage, 'delete').mockRejectedValue(new Error('storage offline'));

      await expect(sessions.validate(session.id)).rejects.toMatchObject({ code: 'session_expired' });
    });

    it('should still succeed when the activity touch fails', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      vi.spyOn(storage, 'touchActivity').mockRejectedValue(new Error('write failed'));

      await expect(sessions.validate(session.id)).resolves.toMatchObject({ id: session.id });
    });
  });

  describe('validateToken', () => {
    it('should return the session behind a token', async () => {
      const { session, token } = await sessions.create('user-1', WEBID);

      await expect(sessions.validateToken(token)).resolves.toMatchObject({ id: session.id });
    });

    it('should reject a token whose claims disagree with the session', async () => {
      const { session, token } = await sessions.create('user-1', WEBID);
      await storage.save({ ...session, userId: 'user-2' });

      await expect(sessions.validateToken(token)).rejects.toMatchObject({
        code: 'invalid_token',
        description: 'Token claims do not match session',
      });
    });

    it('should reject a token once its session is gone', async () => {
      const { session, token } = await sessions.create('user-1', WEBID);
      await sessions.invalidate(session.id);

      await expect(sessions.validateToken(token)).rejects.toMatchObject({
        code: 'session_not_found',
      });
    });
  });

  describe('refresh', () => {
    it('should keep the expiry while far from it', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(new Date(T0.getTime() + 60_000));

      const refreshed = await sessions.refresh(session.id);

      expect(refreshed.session.expiresAt).toEqual(session.expiresAt);
      const claims = await tokens.validate(refreshed.token);
      expect(claims.session_id).toBe(session.id);
    });

    it('should extend the session within the refresh threshold', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      const now = new Date(session.expiresAt.getTime() - 3600 * 1000);
      vi.setSystemTime(now);

      const refreshed = await sessions.refresh(session.id);

      expect(refreshed.session.expiresAt).toEqual(new Date(now.getTime() + DAY_MS));
      expect((await storage.findById(session.id))?.expiresAt).toEqual(
        new Date(now.getTime() + DAY_MS)
      );
    });

    it('should not bring back a session invalidated during the refresh', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(new Date(session.expiresAt.getTime() - 3600 * 1000));

      const [refreshed] = await Promise.allSettled([
        sessions.refresh(session.id),
        sessions.invalidate(session.id),
      ]);

      expect(refreshed).toMatchObject({ status: 'rejected', reason: { code: 'session_not_found' } });
      expect(await storage.findById(session.id)).toBeNull();
    });

    it('should refresh through a bearer token', async () => {
      const { session, token } = await sessions.create('user-1', WEBID);

      const refreshed = await sessions.refreshToken(token);

      expect(refreshed.session.id).toBe(session.id);
      expect(refreshed.token).not.toBe(token);
    });
  });

  describe('invalidation', () => {
    it('should ignore unknown sessions', async () => {
      await expect(sessions.invalidate('sess_missing')).resolves.toBeUndefined();
    });

    it('should remove every session of a user', async () => {
      await sessions.create('user-1', WEBID);
      await sessions.create('user-1', WEBID);
      const { session: other } = await sessions.create('user-2', WEBID);

      expect(await sessions.invalidateAllForUser('user-1')).toBe(2);
      expect(await storage.findByUser('user-1')).toEqual([]);
      expect(await storage.findById(other.id)).not.toBeNull();
    });

    it('should list only live sessions and drop expired ones', async () => {
      const { session: live } = await sessions.create('user-1', WEBID);
      const { session: stale } = await sessions.create('user-1', WEBID);
      await storage.save({ ...stale, expiresAt: new Date(T0.getTime() - 1000) });

      const listed = await sessions.listForUser('user-1');

      expect(listed.map((session) => session.id)).toEqual([live.id]);
      expect(await storage.findById(stale.id)).toBeNull();
    });

    it('should sweep only the sessions past their expiry', async () => {
      const { session: first } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(new Date(T0.getTime() + HOUR_MS));
      const { session: second } = await sessions.create('user-2', WEBID);
      vi.setSystemTime(new Date(T0.getTime() + 2 * HOUR_MS));
      const { session: third } = await sessions.create('user-3', WEBID);

      vi.setSystemTime(new Date(T0.getTime() + DAY_MS + HOUR_MS));

      expect(await sessions.cleanupExpired()).toBe(2);
      expect(await storage.findById(first.id)).toBeNull();
      expect(await storage.findById(second.id)).toBeNull();
      expect(await storage.findById(third.id)).toEqual(third);
      expect(await sessions.cleanupExpired()).toBe(0);
    });
  });

  describe('account context', () => {
    it('should set both fields and carry them into refreshed tokens', async () => {
      const { session } = await sessions.create('user-1', WEBID);

      const updated = await sessions.setAccountContext(session.id, 'acct-1', 'owner');
      expect(updated).toMatchObject({ accountId: 'acct-1', roleId: 'owner' });
      expect(await storage.findByAccount('acct-1')).toHaveLength(1);
      expect(await storage.findByUserAndAccount('user-1', 'acct-1')).toHaveLength(1);

      const { token } = await sessions.refresh(session.id);
      await expect(tokens.validate(token)).resolves.toMatchObject({
        account_id: 'acct-1',
        role_id: 'owner',
      });
    });

    it('should require both fields', async () => {
      const { session } = await sessions.create('user-1', WEBID);

      await expect(sessions.setAccountContext(session.id, '', 'owner')).rejects.toMatchObject({
        code: 'invalid_request',
      });
      await expect(sessions.setAccountContext(session.id, 'acct-1', '')).rejects.toMatchObject({
        code: 'invalid_request',
      });
    });

    it('should refuse unknown and expired sessions', async () => {
      await expect(sessions.setAccountContext('sess_missing', 'acct-1', 'owner')).rejects.toMatchObject({
        code: 'session_not_found',
      });

      const { session } = await sessions.create('user-1', WEBID);
      vi.setSystemTime(session.expiresAt);
      await expect(sessions.setAccountContext(session.id, 'acct-1', 'owner')).rejects.toMatchObject({
        code: 'session_expired',
      });
    });

    it('should not bring back a session invalidated while the context changes', async () => {
      const { session } = await sessions.create('user-1', WEBID);

      const [updated] = await Promise.allSettled([
        sessions.setAccountContext(session.id, 'acct-1', 'owner'),
        sessions.invalidate(session.id),
      ]);

      expect(updated).toMatchObject({ status: 'rejected', reason: { code: 'session_not_found' } });
      expect(await storage.findById(session.id)).toBeNull();
      expect(await storage.findByAccount('acct-1')).toEqual([]);
    });

    it('should clear both fields together', async () => {
      const { session } = await sessions.create('user-1', WEBID);
      await sessions.setAccountContext(session.id, 'acct-1', 'owner');

      const cleared = await sessions.clearAccountContext(session.id);

      expect(cleared.accountId).toBeUndefined();
      expect(cleared.roleId).toBeUndefined();
      expect(await storage.findByAccount('acct-1')).toEqual([]);
    });
  });
});
