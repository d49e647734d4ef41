import { randomBytes, createHash } from 'node:crypto';
import { SESSION_ID_PREFIX, TOKEN_HASH_PREFIX } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a session identifier: `sess_` + 32 hex chars
 */
export function generateSessionId(): string {
  const digest = createHash('sha256').update(randomBytes(32)).digest();
  return SESSION_ID_PREFIX + digest.subarray(0, 16).toString('hex');
}

/**
 * Generate a token-binding hash for a new session
 */
export function generateTokenHash(): string {
  const digest = createHash('sha256').update(randomBytes(32)).digest('hex');
  return TOKEN_HASH_PREFIX + digest;
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for stored records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate an OAuth state parameter
 */
export function generateState(): string {
  return generateRandomBase64Url(24);
}
