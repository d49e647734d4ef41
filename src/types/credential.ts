/**
 * Password credential, one per user
 */
export interface PasswordCredential {
  userId: string;
  passwordHash: string;
  salt: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Single-use password reset token
 */
export interface PasswordResetToken {
  token: string;
  userId: string;
  email: string;
  expiresAt: Date;
  createdAt: Date;
  used: boolean;
}

export function isResetTokenExpired(token: PasswordResetToken, now: Date = new Date()): boolean {
  return now.getTime() >= token.expiresAt.getTime();
}
