import type { RevokedToken, AuditEvent } from '../../types/token.js';
import type { IRevokedTokenStorage, IAuditLog, AuditQuery } from '../interfaces/token-storage.js';

/**
 * In-memory revoked token storage implementation
 */
export class MemoryRevokedTokenStorage implements IRevokedTokenStorage {
  private revoked = new Map<string, RevokedToken>();

  async revoke(entry: RevokedToken): Promise<void> {
    this.revoked.set(entry.jti, { ...entry });
  }

  async isRevoked(jti: string): Promise<boolean> {
    return this.revoked.has(jti);
  }

  async remove(jti: string): Promise<void> {
    this.revoked.delete(jti);
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    let count = 0;
    for (const [jti, entry] of this.revoked) {
      if (entry.expiresAt.getTime() <= now.getTime()) {
        this.revoked.delete(jti);
        count++;
      }
    }
    return count;
  }
}

/**
 * In-memory audit log implementation
 */
export class MemoryAuditLog implements IAuditLog {
  private events: AuditEvent[] = [];

  async record(event: AuditEvent): Promise<void> {
    this.events.push({ ...event });
  }

  async list(query: AuditQuery = {}): Promise<AuditEvent[]> {
    return this.events.filter(
      (event) =>
        (query.type === undefined || event.type === query.type) &&
        (query.userId === undefined || event.userId === query.userId) &&
        (query.success === undefined || event.success === query.success)
    );
  }
}
