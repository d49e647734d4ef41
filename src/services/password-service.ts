import type { PasswordCredential, PasswordResetToken } from '../types/credential.js';
import { isResetTokenExpired } from '../types/credential.js';
import type {
  IPasswordCredentialStorage,
  IPasswordResetStorage,
  IUserDirectory,
} from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { IMailer } from './mailer.js';
import { PasswordPolicy } from './password-policy.js';
import { AuthError } from '../errors/index.js';
import { hashPassword, verifyPassword, generateSecureToken } from '../crypto/password.js';
import {
  DEFAULT_BCRYPT_COST,
  DEFAULT_PASSWORD_RESET_TTL,
  DEFAULT_SECURE_TOKEN_BYTES,
  TEMPLATE_PASSWORD_RESET,
} from '../config/constants.js';

export interface PasswordServiceOptions {
  credentials: IPasswordCredentialStorage;
  resets: IPasswordResetStorage;
  users: IUserDirectory;
  mailer: IMailer;
  baseUrl: string;
  policy?: PasswordPolicy;
  /**
   * Reset token lifetime in seconds
   */
  resetTtl?: number;
  bcryptCost?: number;
  secureTokenBytes?: number;
  logger?: Logger;
}

/**
 * Password management and the reset flow
 */
export class PasswordService {
  private readonly credentials: IPasswordCredentialStorage;
  private readonly resets: IPasswordResetStorage;
  private readonly users: IUserDirectory;
  private readonly mailer: IMailer;
  private readonly baseUrl: string;
  private readonly policy: PasswordPolicy;
  private readonly resetTtl: number;
  private readonly bcryptCost: number;
  private readonly secureTokenBytes: number;
  private readonly logger: Logger;

  constructor(options: PasswordServiceOptions) {
    this.credentials = options.credentials;
    this.resets = options.resets;
    this.users = options.users;
    this.mailer = options.mailer;
    this.baseUrl = options.baseUrl;
    this.policy = options.policy ?? new PasswordPolicy();
    this.resetTtl = options.resetTtl ?? DEFAULT_PASSWORD_RESET_TTL;
    this.bcryptCost = options.bcryptCost ?? DEFAULT_BCRYPT_COST;
    this.secureTokenBytes = options.secureTokenBytes ?? DEFAULT_SECURE_TOKEN_BYTES;
    this.logger = (options.logger ?? silentLogger).child({ component: 'password-service' });
  }

  /**
   * Validate, hash and store a password, replacing any existing one
   */
  async setPassword(userId: string, password: string): Promise<void> {
    if (userId === '') {
      throw AuthError.invalidRequest('User ID is required');
    }
    this.policy.validate(password);

    const { hash, salt } = await hashPassword(password, this.bcryptCost);
    const now = new Date();
    const credential: PasswordCredential = {
      userId,
      passwordHash: hash,
      salt,
      createdAt: now,
      updatedAt: now,
    };

    if (await this.credentials.exists(userId)) {
      await this.credentials.update(credential);
    } else {
      await this.credentials.save(credential);
    }
  }

  /**
   * Check a password against the stored credential
   * Throws `invalid_credentials` on any mismatch
   */
  async validatePassword(userId: string, password: string): Promise<void> {
    const credential = await this.credentials.findByUser(userId);
    if (!credential) {
      throw AuthError.invalidCredentials();
    }

    if (!(await verifyPassword(password, credential.passwordHash, credential.salt))) {
      throw AuthError.invalidCredentials();
    }
  }

  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    await this.validatePassword(userId, currentPassword);
    await this.setPassword(userId, newPassword);
  }

  /**
   * Start a password reset
   *
   * Unknown addresses return silently so callers cannot discover which accounts exist.
   */
  async initiateReset(email: string): Promise<void> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      this.logger.debug('Password reset requested for unknown email');
      return;
    }

    const now = new Date();
    const resetToken: PasswordResetToken = {
      token: generateSecureToken(this.secureTokenBytes),
      userId: user.id,
      email,
      expiresAt: new Date(now.getTime() + this.resetTtl * 1000),
      createdAt: now,
      used: false,
    };

    await this.resets.save(resetToken);

    const resetUrl = `${this.baseUrl}/auth/reset-password?token=${encodeURIComponent(resetToken.token)}`;
    await this.mailer.sendTemplate(
      TEMPLATE_PASSWORD_RESET,
      {
        userName: user.name ?? '',
        resetUrl,
        expiryTime: resetToken.expiresAt.toISOString(),
        supportUrl: `${this.baseUrl}/support`,
      },
      [email]
    );

    this.logger.info('Password reset initiated', { userId: user.id });
  }

  /**
   * Finish a reset with the emailed token
   */
  async completeReset(token: string, newPassword: string): Promise<void> {
    const resetToken = await this.resets.findByToken(token);
    if (!resetToken) {
      throw AuthError.passwordResetNotFound('Invalid password reset token');
    }
    if (resetToken.used) {
      throw AuthError.passwordResetUsed();
    }
    if (isResetTokenExpired(resetToken)) {
      throw AuthError.passwordResetExpired();
    }

    // A rejected password leaves the token usable
    this.policy.validate(newPassword);

    // Claim first so a concurrent redemption of the same token fails
    await this.resets.markUsed(token);
    try {
      await this.setPassword(resetToken.userId, newPassword);
    } catch (err) {
      await this.resets.markUnused(token).catch((releaseErr: unknown) => {
        this.logger.warn('Failed to release password reset token', {
          userId: resetToken.userId,
          error: releaseErr,
        });
      });
      throw err;
    }

    this.logger.info('Password reset completed', { userId: resetToken.userId });
  }

  async hasPassword(userId: string): Promise<boolean> {
    return this.credentials.exists(userId);
  }

  async cleanupExpiredTokens(): Promise<number> {
    const removed = await this.resets.deleteExpired(new Date());
    if (removed > 0) {
      this.logger.info('Expired password reset tokens removed', { count: removed });
    }
    return removed;
  }
}
