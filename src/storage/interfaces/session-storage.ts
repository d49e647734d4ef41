import type { Session } from '../../types/session.js';

/**
 * Storage interface for sessions
 */
export interface ISessionStorage {
  /**
   * Insert or replace a session
   */
  save(session: Session): Promise<void>;

  /**
   * Replace an existing session
   * Throws `session_not_found` when the session has been deleted
   */
  update(session: Session): Promise<void>;

  findById(id: string): Promise<Session | null>;

  findByUser(userId: string): Promise<Session[]>;

  findByAccount(accountId: string): Promise<Session[]>;

  findByUserAndAccount(userId: string, accountId: string): Promise<Session[]>;

  /**
   * Delete a session; deleting an unknown id is not an error
   */
  delete(id: string): Promise<void>;

  /**
   * Delete all sessions for a user
   */
  deleteByUser(userId: string): Promise<number>;

  /**
   * Delete sessions with `expiresAt <= now` (cleanup)
   */
  deleteExpired(now?: Date): Promise<number>;

  /**
   * Record activity on a session
   */
  touchActivity(id: string, at: Date): Promise<void>;
}
