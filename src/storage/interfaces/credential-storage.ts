import type { PasswordCredential, PasswordResetToken } from '../../types/credential.js';

/**
 * Storage interface for password credentials (one per user)
 */
export interface IPasswordCredentialStorage {
  save(credential: PasswordCredential): Promise<void>;

  /**
   * Replace hash and salt of an existing credential
   * Throws `credential_not_found` when the user has none
   */
  update(credential: PasswordCredential): Promise<void>;

  findByUser(userId: string): Promise<PasswordCredential | null>;

  delete(userId: string): Promise<void>;

  exists(userId: string): Promise<boolean>;
}

/**
 * Storage interface for password reset tokens
 */
export interface IPasswordResetStorage {
  save(token: PasswordResetToken): Promise<void>;

  findByToken(token: string): Promise<PasswordResetToken | null>;

  findByUser(userId: string): Promise<PasswordResetToken[]>;

  /**
   * Claim a token for redemption
   * Throws `password_reset_not_found` for unknown tokens and
   * `password_reset_used` when the token was already claimed
   */
  markUsed(token: string): Promise<void>;

  /**
   * Release a claim whose redemption failed; unknown tokens are ignored
   */
  markUnused(token: string): Promise<void>;

  delete(token: string): Promise<void>;

  deleteByUser(userId: string): Promise<number>;

  deleteExpired(now?: Date): Promise<number>;
}
