import type { PasswordCredential, PasswordResetToken } from '../../types/credential.js';
import type {
  IPasswordCredentialStorage,
  IPasswordResetStorage,
} from '../interfaces/credential-storage.js';
import { AuthError } from '../../errors/index.js';

/**
 * In-memory password credential storage implementation
 */
export class MemoryPasswordCredentialStorage implements IPasswordCredentialStorage {
  private credentials = new Map<string, PasswordCredential>();

  async save(credential: PasswordCredential): Promise<void> {
    this.credentials.set(credential.userId, { ...credential });
  }

  async update(credential: PasswordCredential): Promise<void> {
    const existing = this.credentials.get(credential.userId);
    if (!existing) {
      throw AuthError.credentialNotFound();
    }
    this.credentials.set(credential.userId, {
      ...existing,
      passwordHash: credential.passwordHash,
      salt: credential.salt,
      updatedAt: credential.updatedAt,
    });
  }

  async findByUser(userId: string): Promise<PasswordCredential | null> {
    const credential = this.credentials.get(userId);
    return credential ? { ...credential } : null;
  }

  async delete(userId: string): Promise<void> {
    this.credentials.delete(userId);
  }

  async exists(userId: string): Promise<boolean> {
    return this.credentials.has(userId);
  }
}

/**
 * In-memory password reset token storage implementation
 */
export class MemoryPasswordResetStorage implements IPasswordResetStorage {
  private tokens = new Map<string, PasswordResetToken>();

  async save(token: PasswordResetToken): Promise<void> {
    this.tokens.set(token.token, { ...token });
  }

  async findByToken(token: string): Promise<PasswordResetToken | null> {
    const entry = this.tokens.get(token);
    return entry ? { ...entry } : null;
  }

  async findByUser(userId: string): Promise<PasswordResetToken[]> {
    return Array.from(this.tokens.values())
      .filter((entry) => entry.userId === userId)
      .map((entry) => ({ ...entry }));
  }

  async markUsed(token: string): Promise<void> {
    const entry = this.tokens.get(token);
    if (!entry) {
      throw AuthError.passwordResetNotFound();
    }
    if (entry.used) {
      throw AuthError.passwordResetUsed();
    }
    this.tokens.set(token, { ...entry, used: true });
  }

  async markUnused(token: string): Promise<void> {
    const entry = this.tokens.get(token);
    if (entry) {
      this.tokens.set(token, { ...entry, used: false });
    }
  }

  async delete(token: string): Promise<void> {
    this.tokens.delete(token);
  }

  async deleteByUser(userId: string): Promise<number> {
    let count = 0;
    for (const [key, entry] of this.tokens) {
      if (entry.userId === userId) {
        this.tokens.delete(key);
        count++;
      }
    }
    return count;
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    let count = 0;
    for (const [key, entry] of this.tokens) {
      if (entry.expiresAt.getTime() <= now.getTime()) {
        this.tokens.delete(key);
        count++;
      }
    }
    return count;
  }
}
