/**
 * Authentication error codes
 */

// Not found
export const ERROR_SESSION_NOT_FOUND = 'session_not_found' as const;
export const ERROR_CREDENTIAL_NOT_FOUND = 'credential_not_found' as const;
export const ERROR_PASSWORD_RESET_NOT_FOUND = 'password_reset_not_found' as const;
export const ERROR_EXTERNAL_IDENTITY_NOT_FOUND = 'external_identity_not_found' as const;
export const ERROR_USER_NOT_FOUND = 'user_not_found' as const;

// Expired
export const ERROR_SESSION_EXPIRED = 'session_expired' as const;
export const ERROR_TOKEN_EXPIRED = 'token_expired' as const;
export const ERROR_PASSWORD_RESET_EXPIRED = 'password_reset_expired' as const;

// Input and credentials
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_WEAK_PASSWORD = 'weak_password' as const;

// Conflicts and state
export const ERROR_ALREADY_LINKED = 'already_linked' as const;
export const ERROR_TOKEN_REVOKED = 'token_revoked' as const;
export const ERROR_PASSWORD_RESET_USED = 'password_reset_used' as const;
export const ERROR_TOKEN_REFRESH_NOT_NEEDED = 'token_refresh_not_needed' as const;

// Unsupported
export const ERROR_UNSUPPORTED_PROVIDER = 'unsupported_provider' as const;
export const ERROR_UNSUPPORTED_AUTH_METHOD = 'unsupported_auth_method' as const;

// Trust verification
export const ERROR_WEBID_VERIFICATION_FAILED = 'webid_verification_failed' as const;

// Throttling
export const ERROR_TOO_MANY_REQUESTS = 'too_many_requests' as const;

// Server
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All authentication error codes
 */
export type AuthErrorCode =
  | typeof ERROR_SESSION_NOT_FOUND
  | typeof ERROR_CREDENTIAL_NOT_FOUND
  | typeof ERROR_PASSWORD_RESET_NOT_FOUND
  | typeof ERROR_EXTERNAL_IDENTITY_NOT_FOUND
  | typeof ERROR_USER_NOT_FOUND
  | typeof ERROR_SESSION_EXPIRED
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_PASSWORD_RESET_EXPIRED
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_WEAK_PASSWORD
  | typeof ERROR_ALREADY_LINKED
  | typeof ERROR_TOKEN_REVOKED
  | typeof ERROR_PASSWORD_RESET_USED
  | typeof ERROR_TOKEN_REFRESH_NOT_NEEDED
  | typeof ERROR_UNSUPPORTED_PROVIDER
  | typeof ERROR_UNSUPPORTED_AUTH_METHOD
  | typeof ERROR_WEBID_VERIFICATION_FAILED
  | typeof ERROR_TOO_MANY_REQUESTS
  | typeof ERROR_SERVER_ERROR;

export type AuthErrorStatus = 400 | 401 | 404 | 409 | 429 | 500;

/**
 * HTTP status codes for authentication errors
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, AuthErrorStatus> = {
  [ERROR_SESSION_NOT_FOUND]: 401,
  [ERROR_CREDENTIAL_NOT_FOUND]: 404,
  [ERROR_PASSWORD_RESET_NOT_FOUND]: 400,
  [ERROR_EXTERNAL_IDENTITY_NOT_FOUND]: 401,
  [ERROR_USER_NOT_FOUND]: 404,
  [ERROR_SESSION_EXPIRED]: 401,
  [ERROR_TOKEN_EXPIRED]: 401,
  [ERROR_PASSWORD_RESET_EXPIRED]: 400,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_WEAK_PASSWORD]: 400,
  [ERROR_ALREADY_LINKED]: 409,
  [ERROR_TOKEN_REVOKED]: 401,
  [ERROR_PASSWORD_RESET_USED]: 400,
  [ERROR_TOKEN_REFRESH_NOT_NEEDED]: 400,
  [ERROR_UNSUPPORTED_PROVIDER]: 400,
  [ERROR_UNSUPPORTED_AUTH_METHOD]: 400,
  [ERROR_WEBID_VERIFICATION_FAILED]: 401,
  [ERROR_TOO_MANY_REQUESTS]: 429,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_SESSION_NOT_FOUND]: 'Session not found',
  [ERROR_CREDENTIAL_NOT_FOUND]: 'Password credential not found',
  [ERROR_PASSWORD_RESET_NOT_FOUND]: 'Password reset token not found',
  [ERROR_EXTERNAL_IDENTITY_NOT_FOUND]: 'External identity not found',
  [ERROR_USER_NOT_FOUND]: 'User not found',
  [ERROR_SESSION_EXPIRED]: 'Session expired',
  [ERROR_TOKEN_EXPIRED]: 'Token expired',
  [ERROR_PASSWORD_RESET_EXPIRED]: 'Password reset token expired',
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed',
  [ERROR_INVALID_CREDENTIALS]: 'Invalid credentials',
  [ERROR_INVALID_TOKEN]: 'The token is invalid',
  [ERROR_WEAK_PASSWORD]: 'Password does not meet security requirements',
  [ERROR_ALREADY_LINKED]: 'External identity already linked',
  [ERROR_TOKEN_REVOKED]: 'Token has been revoked',
  [ERROR_PASSWORD_RESET_USED]: 'Password reset token already used',
  [ERROR_TOKEN_REFRESH_NOT_NEEDED]: 'token does not need refresh yet',
  [ERROR_UNSUPPORTED_PROVIDER]: 'Unsupported OAuth provider',
  [ERROR_UNSUPPORTED_AUTH_METHOD]: 'Unsupported authentication method',
  [ERROR_WEBID_VERIFICATION_FAILED]: 'WebID-OIDC verification failed',
  [ERROR_TOO_MANY_REQUESTS]: 'Too many requests',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition',
};
