/**
 * Signed session token payload
 */
export interface SessionTokenClaims {
  // Standard JWT claims
  iss: string; // Issuer
  sub: string; // Subject (user ID)
  aud: string | string[]; // Audience
  exp: number; // Expiration time
  iat: number; // Issued at
  jti: string; // JWT ID (unique identifier)

  // Session claims
  session_id: string;
  user_id: string;
  webid: string;
  account_id?: string;
  role_id?: string;

  // Allow additional claims
  [key: string]: unknown;
}

/**
 * RS256 signing key pair (PEM encoded)
 */
export interface SigningKey {
  kid: string;
  algorithm: 'RS256';
  publicKey: string;
  privateKey: string;
}

/**
 * Revoked token entry
 */
export interface RevokedToken {
  jti: string;
  userId?: string;
  reason: string;
  revokedAt: Date;
  /**
   * The token's own expiry; the entry is moot afterwards
   */
  expiresAt: Date;
}

export type AuditEventType =
  | 'token_issued'
  | 'token_validated'
  | 'token_validation_failed'
  | 'missing_required_claims'
  | 'revoked_token_used'
  | 'token_refreshed'
  | 'token_revoked'
  | 'all_user_tokens_revoked';

/**
 * Audit trail entry
 */
export interface AuditEvent {
  type: AuditEventType;
  userId?: string;
  success: boolean;
  reason?: string;
  timestamp: Date;
}
