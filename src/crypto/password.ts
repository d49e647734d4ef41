import bcrypt from 'bcryptjs';
import { randomBytes } from 'node:crypto';
import {
  BCRYPT_MAX_INPUT_BYTES,
  BCRYPT_MIN_COST,
  BCRYPT_MAX_COST,
  DEFAULT_BCRYPT_COST,
  DEFAULT_SECURE_TOKEN_BYTES,
  PASSWORD_SALT_BYTES,
} from '../config/constants.js';
import { AuthError } from '../errors/index.js';
import { generateRandomBase64Url } from './random.js';

export interface HashedPassword {
  hash: string;
  salt: string;
}

/**
 * Combine password and salt, cut to the bcrypt input limit
 */
function bcryptInput(password: string, salt: string): string {
  const bytes = Buffer.from(password + salt, 'utf8');
  if (bytes.length <= BCRYPT_MAX_INPUT_BYTES) {
    return password + salt;
  }
  return bytes.subarray(0, BCRYPT_MAX_INPUT_BYTES).toString('utf8');
}

function normalizeCost(cost: number): number {
  if (!Number.isInteger(cost) || cost < BCRYPT_MIN_COST || cost > BCRYPT_MAX_COST) {
    return DEFAULT_BCRYPT_COST;
  }
  return cost;
}

/**
 * Hash a password with a fresh random salt
 */
export async function hashPassword(
  password: string,
  cost: number = DEFAULT_BCRYPT_COST
): Promise<HashedPassword> {
  if (password === '') {
    throw AuthError.invalidRequest('Password cannot be empty');
  }

  const salt = randomBytes(PASSWORD_SALT_BYTES).toString('base64');
  const hash = await bcrypt.hash(bcryptInput(password, salt), normalizeCost(cost));

  return { hash, salt };
}

/**
 * Verify a password against a stored hash and salt
 */
export async function verifyPassword(
  password: string,
  hash: string,
  salt: string
): Promise<boolean> {
  if (password === '' || hash === '' || salt === '') {
    return false;
  }

  try {
    return await bcrypt.compare(bcryptInput(password, salt), hash);
  } catch {
    // Malformed stored hash
    return false;
  }
}

/**
 * Generate a URL-safe secure token
 *
 * Non-positive lengths fall back to the default.
 */
export function generateSecureToken(length: number = DEFAULT_SECURE_TOKEN_BYTES): string {
  const size = Number.isInteger(length) && length > 0 ? length : DEFAULT_SECURE_TOKEN_BYTES;
  return generateRandomBase64Url(size);
}
