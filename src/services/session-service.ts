import type { Session } from '../types/session.js';
import type { SessionTokenClaims } from '../types/token.js';
import { isSessionValid, sessionTimeRemaining } from '../types/session.js';
import type { ISessionStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { TokenManager } from './token-service.js';
import { AuthError } from '../errors/index.js';
import { generateSessionId, generateTokenHash } from '../crypto/random.js';
import { DEFAULT_SESSION_TTL, DEFAULT_SESSION_REFRESH_THRESHOLD } from '../config/constants.js';

export interface SessionManagerOptions {
  storage: ISessionStorage;
  tokens: TokenManager;
  /**
   * Session lifetime in seconds
   */
  ttl?: number;
  /**
   * Sessions are extended once remaining lifetime drops to this many seconds
   */
  refreshThreshold?: number;
  logger?: Logger;
}

export interface SessionWithToken {
  session: Session;
  token: string;
}

export interface AuthenticatedToken {
  session: Session;
  claims: SessionTokenClaims;
}

/**
 * Session lifecycle: creation, validation, refresh and invalidation
 */
export class SessionManager {
  private readonly storage: ISessionStorage;
  private readonly tokens: TokenManager;
  private readonly ttl: number;
  private readonly refreshThreshold: number;
  private readonly logger: Logger;

  constructor(options: SessionManagerOptions) {
    this.storage = options.storage;
    this.tokens = options.tokens;
    this.ttl = options.ttl ?? DEFAULT_SESSION_TTL;
    this.refreshThreshold = options.refreshThreshold ?? DEFAULT_SESSION_REFRESH_THRESHOLD;
    this.logger = (options.logger ?? silentLogger).child({ component: 'session-manager' });
  }

  /**
   * Create a session and issue its first token
   *
   * The session is deleted again if the token cannot be issued.
   */
  async create(userId: string, webId: string): Promise<SessionWithToken> {
    if (userId === '' || webId === '') {
      throw AuthError.invalidRequest('User ID and WebID are required');
    }

    const now = new Date();
    const session: Session = {
      id: generateSessionId(),
      userId,
      webId,
      tokenHash: generateTokenHash(),
      createdAt: now,
      lastActivity: now,
      expiresAt: new Date(now.getTime() + this.ttl * 1000),
    };

    await this.storage.save(session);

    let token: string;
    try {
      token = await this.tokens.issue(session);
    } catch (err) {
      await this.storage.delete(session.id).catch((deleteErr: unknown) => {
        this.logger.warn('Failed to remove session after token issuance failure', {
          sessionId: session.id,
          error: deleteErr,
        });
      });
      throw err;
    }

    this.logger.info('Session created', { sessionId: session.id, userId });
    return { session, token };
  }

  /**
   * Load a live session and record activity on it
   *
   * Expired sessions are deleted on sight.
   */
  async validate(sessionId: string): Promise<Session> {
    const session = await this.storage.findById(sessionId);
    if (!session) {
      throw AuthError.sessionNotFound();
    }

    if (!isSessionValid(session)) {
      try {
        await this.storage.delete(session.id);
      } catch (err) {
        this.logger.warn('Failed to delete expired session', { sessionId, error: err });
      }
      throw AuthError.sessionExpired();
    }

    const now = new Date();
    try {
      await this.storage.touchActivity(session.id, now);
      session.lastActivity = now;
    } catch (err) {
      this.logger.warn('Failed to record session activity', { sessionId, error: err });
    }

    return session;
  }

  /**
   * Validate a bearer token and the session it is bound to
   */
  async validateToken(token: string): Promise<Session> {
    const { session } = await this.authenticateToken(token);
    return session;
  }

  /**
   * Like `validateToken`, also returning the verified claims
   */
  async authenticateToken(token: string): Promise<AuthenticatedToken> {
    const claims = await this.tokens.validate(token);
    const session = await this.validate(claims.session_id);

    if (session.userId !== claims.user_id || session.webId !== claims.webid) {
      throw AuthError.invalidToken('Token claims do not match session');
    }

    return { session, claims };
  }

  /**
   * Issue a fresh token, extending the session when it is close to expiry
   */
  async refresh(sessionId: string): Promise<SessionWithToken> {
    const session = await this.validate(sessionId);

    if (sessionTimeRemaining(session) > this.refreshThreshold) {
      const token = await this.tokens.issue(session);
      return { session, token };
    }

    const now = new Date();
    const extended: Session = {
      ...session,
      expiresAt: new Date(now.getTime() + this.ttl * 1000),
      lastActivity: now,
    };
    await this.storage.update(extended);

    const token = await this.tokens.issue(extended);
    this.logger.info('Session extended', { sessionId, expiresAt: extended.expiresAt });
    return { session: extended, token };
  }

  /**
   * Refresh the session behind a bearer token
   */
  async refreshToken(token: string): Promise<SessionWithToken> {
    const session = await this.validateToken(token);
    return this.refresh(session.id);
  }

  /**
   * Delete a session; unknown ids are ignored
   */
  async invalidate(sessionId: string): Promise<void> {
    await this.storage.delete(sessionId);
  }

  async invalidateAllForUser(userId: string): Promise<number> {
    const removed = await this.storage.deleteByUser(userId);
    this.logger.info('User sessions invalidated', { userId, count: removed });
    return removed;
  }

  /**
   * Active sessions for a user; expired ones are deleted on the way
   */
  async listForUser(userId: string): Promise<Session[]> {
    const sessions = await this.storage.findByUser(userId);
    const active: Session[] = [];

    for (const session of sessions) {
      if (isSessionValid(session)) {
        active.push(session);
      } else {
        await this.storage.delete(session.id);
      }
    }

    return active;
  }

  async setAccountContext(sessionId: string, accountId: string, roleId: string): Promise<Session> {
    if (accountId === '' || roleId === '') {
      throw AuthError.invalidRequest('Account ID and role ID are required');
    }

    const session = await this.requireLive(sessionId);
    const updated: Session = { ...session, accountId, roleId, lastActivity: new Date() };
    await this.storage.update(updated);
    return updated;
  }

  async clearAccountContext(sessionId: string): Promise<Session> {
    const session = await this.requireLive(sessionId);
    const updated: Session = { ...session, lastActivity: new Date() };
    delete updated.accountId;
    delete updated.roleId;
    await this.storage.update(updated);
    return updated;
  }

  /**
   * Delete every expired session
   */
  async cleanupExpired(): Promise<number> {
    const removed = await this.storage.deleteExpired(new Date());
    if (removed > 0) {
      this.logger.info('Expired sessions removed', { count: removed });
    }
    return removed;
  }

  private async requireLive(sessionId: string): Promise<Session> {
    const session = await this.storage.findById(sessionId);
    if (!session) {
      throw AuthError.sessionNotFound();
    }
    if (!isSessionValid(session)) {
      throw AuthError.sessionExpired();
    }
    return session;
  }
}
