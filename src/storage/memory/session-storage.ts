import type { Session } from '../../types/session.js';
import type { ISessionStorage } from '../interfaces/session-storage.js';
import { AuthError } from '../../errors/index.js';

/**
 * In-memory session storage implementation
 */
export class MemorySessionStorage implements ISessionStorage {
  private sessions = new Map<string, Session>();

  async save(session: Session): Promise<void> {
    this.sessions.set(session.id, { ...session });
  }

  async update(session: Session): Promise<void> {
    if (!this.sessions.has(session.id)) {
      throw AuthError.sessionNotFound();
    }
    this.sessions.set(session.id, { ...session });
  }

  async findById(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async findByUser(userId: string): Promise<Session[]> {
    return this.filter((session) => session.userId === userId);
  }

  async findByAccount(accountId: string): Promise<Session[]> {
    return this.filter((session) => session.accountId === accountId);
  }

  async findByUserAndAccount(userId: string, accountId: string): Promise<Session[]> {
    return this.filter(
      (session) => session.userId === userId && session.accountId === accountId
    );
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  async deleteByUser(userId: string): Promise<number> {
    return this.deleteWhere((session) => session.userId === userId);
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    return this.deleteWhere((session) => session.expiresAt.getTime() <= now.getTime());
  }

  async touchActivity(id: string, at: Date): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) {
      throw AuthError.sessionNotFound();
    }
    this.sessions.set(id, { ...session, lastActivity: at });
  }

  private filter(predicate: (session: Session) => boolean): Session[] {
    return Array.from(this.sessions.values())
      .filter(predicate)
      .map((session) => ({ ...session }));
  }

  private deleteWhere(predicate: (session: Session) => boolean): number {
    let count = 0;
    for (const [id, session] of this.sessions) {
      if (predicate(session)) {
        this.sessions.delete(id);
        count++;
      }
    }
    return count;
  }
}
