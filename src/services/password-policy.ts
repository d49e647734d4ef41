import type { PasswordPolicyConfig } from '../config/index.js';
import { DEFAULT_PASSWORD_MIN_LENGTH } from '../config/constants.js';
import { AuthError } from '../errors/index.js';

const WEAK_PATTERNS = [
  'password',
  '123456',
  'qwerty',
  'abc123',
  'letmein',
  'welcome',
  'monkey',
  'dragon',
  'master',
  'admin',
];

const SEQUENCE_LENGTH = 4;
const REPEAT_LENGTH = 3;

/**
 * All 4-character ascending runs of digits and lowercase letters
 */
function buildSequentialRuns(): string[] {
  const runs: string[] = [];
  for (const alphabet of ['0123456789', 'abcdefghijklmnopqrstuvwxyz']) {
    for (let i = 0; i + SEQUENCE_LENGTH <= alphabet.length; i++) {
      runs.push(alphabet.slice(i, i + SEQUENCE_LENGTH));
    }
  }
  return runs;
}

const SEQUENTIAL_RUNS = buildSequentialRuns();

function hasRepeatedRun(password: string): boolean {
  const chars = Array.from(password);
  for (let i = 0; i + REPEAT_LENGTH <= chars.length; i++) {
    if (chars[i] === chars[i + 1] && chars[i + 1] === chars[i + 2]) {
      return true;
    }
  }
  return false;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicyConfig = {
  minLength: DEFAULT_PASSWORD_MIN_LENGTH,
  requireUppercase: true,
  requireLowercase: true,
  requireNumbers: true,
  requireSpecial: true,
};

/**
 * Password strength rules
 */
export class PasswordPolicy {
  private readonly rules: PasswordPolicyConfig;

  constructor(rules: Partial<PasswordPolicyConfig> = {}) {
    this.rules = { ...DEFAULT_PASSWORD_POLICY, ...rules };
  }

  /**
   * List every unmet requirement (empty when the password is acceptable)
   */
  check(password: string): string[] {
    const violations: string[] = [];
    const { minLength, requireUppercase, requireLowercase, requireNumbers, requireSpecial } =
      this.rules;

    if (Array.from(password).length < minLength) {
      violations.push(`must be at least ${minLength} characters long`);
    }
    if (requireUppercase && !/\p{Lu}/u.test(password)) {
      violations.push('must contain at least one uppercase letter');
    }
    if (requireLowercase && !/\p{Ll}/u.test(password)) {
      violations.push('must contain at least one lowercase letter');
    }
    if (requireNumbers && !/\p{N}/u.test(password)) {
      violations.push('must contain at least one number');
    }
    if (requireSpecial && !/[\p{P}\p{S}]/u.test(password)) {
      violations.push('must contain at least one special character');
    }

    const lower = password.toLowerCase();

    const weak = WEAK_PATTERNS.find((pattern) => lower.includes(pattern));
    if (weak) {
      violations.push(`contains common weak pattern "${weak}"`);
    }
    if (SEQUENTIAL_RUNS.some((run) => lower.includes(run))) {
      violations.push('contains sequential characters');
    }
    if (hasRepeatedRun(password)) {
      violations.push('contains too many repeated characters');
    }

    return violations;
  }

  /**
   * Throws `weak_password` listing all violations
   */
  validate(password: string): void {
    const violations = this.check(password);
    if (violations.length > 0) {
      throw AuthError.weakPassword(violations);
    }
  }
}
