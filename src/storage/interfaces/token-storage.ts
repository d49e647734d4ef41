import type { RevokedToken, AuditEvent, AuditEventType } from '../../types/token.js';

/**
 * Storage interface for JWT revocation tracking
 */
export interface IRevokedTokenStorage {
  /**
   * Mark a JWT as revoked
   */
  revoke(entry: RevokedToken): Promise<void>;

  /**
   * Check if a JWT has been revoked
   */
  isRevoked(jti: string): Promise<boolean>;

  /**
   * Lift a revocation
   */
  remove(jti: string): Promise<void>;

  /**
   * Delete revocation records past their own expiry (cleanup)
   */
  deleteExpired(now?: Date): Promise<number>;
}

export interface AuditQuery {
  type?: AuditEventType;
  userId?: string;
  success?: boolean;
}

/**
 * Append-only audit event log
 */
export interface IAuditLog {
  record(event: AuditEvent): Promise<void>;

  list(query?: AuditQuery): Promise<AuditEvent[]>;
}
