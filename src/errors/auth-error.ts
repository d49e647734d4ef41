import {
  type AuthErrorCode,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_SESSION_NOT_FOUND,
  ERROR_CREDENTIAL_NOT_FOUND,
  ERROR_PASSWORD_RESET_NOT_FOUND,
  ERROR_EXTERNAL_IDENTITY_NOT_FOUND,
  ERROR_USER_NOT_FOUND,
  ERROR_SESSION_EXPIRED,
  ERROR_TOKEN_EXPIRED,
  ERROR_PASSWORD_RESET_EXPIRED,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CREDENTIALS,
  ERROR_INVALID_TOKEN,
  ERROR_WEAK_PASSWORD,
  ERROR_ALREADY_LINKED,
  ERROR_TOKEN_REVOKED,
  ERROR_PASSWORD_RESET_USED,
  ERROR_TOKEN_REFRESH_NOT_NEEDED,
  ERROR_UNSUPPORTED_PROVIDER,
  ERROR_UNSUPPORTED_AUTH_METHOD,
  ERROR_WEBID_VERIFICATION_FAILED,
  ERROR_TOO_MANY_REQUESTS,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Error response body
 */
export interface AuthErrorResponse {
  error: AuthErrorCode;
  error_description?: string;
  violations?: string[];
}

/**
 * Authentication error
 *
 * `code` is stable across wrapping, so callers can branch on it.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly description: string;
  /**
   * Unmet password requirements (weak_password only)
   */
  public readonly violations: string[];

  constructor(
    code: AuthErrorCode,
    description?: string,
    options?: {
      cause?: unknown;
      violations?: string[];
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;
    this.violations = options?.violations ?? [];

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    const response: AuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.violations.length > 0) {
      response.violations = this.violations;
    }

    return response;
  }

  /**
   * Add operation context to an error while keeping its code
   */
  static wrap(err: unknown, context: string): AuthError {
    if (err instanceof AuthError) {
      return new AuthError(err.code, `${context}: ${err.description}`, {
        cause: err,
        violations: err.violations,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new AuthError(ERROR_SERVER_ERROR, `${context}: ${message}`, { cause: err });
  }

  static is(err: unknown, code: AuthErrorCode): err is AuthError {
    return err instanceof AuthError && err.code === code;
  }

  // Factory methods for common errors

  static sessionNotFound(description?: string): AuthError {
    return new AuthError(ERROR_SESSION_NOT_FOUND, description);
  }

  static credentialNotFound(description?: string): AuthError {
    return new AuthError(ERROR_CREDENTIAL_NOT_FOUND, description);
  }

  static passwordResetNotFound(description?: string): AuthError {
    return new AuthError(ERROR_PASSWORD_RESET_NOT_FOUND, description);
  }

  static externalIdentityNotFound(description?: string): AuthError {
    return new AuthError(ERROR_EXTERNAL_IDENTITY_NOT_FOUND, description);
  }

  static userNotFound(description?: string): AuthError {
    return new AuthError(ERROR_USER_NOT_FOUND, description);
  }

  static sessionExpired(description?: string): AuthError {
    return new AuthError(ERROR_SESSION_EXPIRED, description);
  }

  static tokenExpired(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_TOKEN_EXPIRED, description, { cause });
  }

  static passwordResetExpired(description?: string): AuthError {
    return new AuthError(ERROR_PASSWORD_RESET_EXPIRED, description);
  }

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static invalidCredentials(cause?: unknown): AuthError {
    return new AuthError(ERROR_INVALID_CREDENTIALS, undefined, { cause });
  }

  static invalidToken(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, description, { cause });
  }

  static weakPassword(violations: string[]): AuthError {
    return new AuthError(
      ERROR_WEAK_PASSWORD,
      `Password does not meet security requirements: ${violations.join(', ')}`,
      { violations }
    );
  }

  static alreadyLinked(description?: string): AuthError {
    return new AuthError(ERROR_ALREADY_LINKED, description);
  }

  static tokenRevoked(): AuthError {
    return new AuthError(ERROR_TOKEN_REVOKED);
  }

  static passwordResetUsed(): AuthError {
    return new AuthError(ERROR_PASSWORD_RESET_USED);
  }

  static tokenRefreshNotNeeded(): AuthError {
    return new AuthError(ERROR_TOKEN_REFRESH_NOT_NEEDED);
  }

  static unsupportedProvider(provider: string): AuthError {
    return new AuthError(ERROR_UNSUPPORTED_PROVIDER, `Unsupported OAuth provider: ${provider}`);
  }

  static unsupportedAuthMethod(method: string): AuthError {
    return new AuthError(
      ERROR_UNSUPPORTED_AUTH_METHOD,
      `Unsupported authentication method: ${method}`
    );
  }

  static webIdVerificationFailed(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_WEBID_VERIFICATION_FAILED, description, { cause });
  }

  static tooManyRequests(description?: string): AuthError {
    return new AuthError(ERROR_TOO_MANY_REQUESTS, description);
  }

  static serverError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
