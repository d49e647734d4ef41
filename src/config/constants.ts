/**
 * Authentication & session constants
 */

// Authentication methods
export const SUPPORTED_AUTH_METHODS = ['password', 'webid-oidc', 'oauth'] as const;

// Signing (asymmetric only)
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;
export const SESSION_TOKEN_TYPE = 'JWT' as const;
export const DEFAULT_SIGNING_KEY_ID = 'default';
export const DEFAULT_TOKEN_AUDIENCE = 'solid-pod-server';

// Accepted algorithms for WebID-OIDC tokens
export const WEBID_OIDC_ALGORITHMS = ['RS256', 'RS384', 'RS512'] as const;

// Default lifetimes (in seconds)
export const DEFAULT_SESSION_TTL = 86400; // 24 hours
export const DEFAULT_SESSION_REFRESH_THRESHOLD = 3600; // 1 hour
export const DEFAULT_SESSION_CLEANUP_INTERVAL = 3600; // 1 hour
export const DEFAULT_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_TOKEN_REFRESH_THRESHOLD = 900; // 15 minutes
export const DEFAULT_PASSWORD_RESET_TTL = 3600; // 1 hour
export const DEFAULT_WEBID_OIDC_CACHE_TTL = 3600; // 1 hour
export const DEFAULT_WEBID_OIDC_TIMEOUT_MS = 30000; // 30 seconds

// Rate limiting
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;
export const DEFAULT_LOGIN_RATE_LIMIT_MAX_REQUESTS = 20;

// Secure token generation
export const DEFAULT_SECURE_TOKEN_BYTES = 32;
export const SESSION_ID_PREFIX = 'sess_';
export const TOKEN_HASH_PREFIX = 'hash_';
export const PASSWORD_SALT_BYTES = 16;

// bcrypt
export const BCRYPT_MAX_INPUT_BYTES = 72;
export const BCRYPT_MIN_COST = 4;
export const BCRYPT_MAX_COST = 31;
export const DEFAULT_BCRYPT_COST = 10;

// Password policy defaults
export const DEFAULT_PASSWORD_MIN_LENGTH = 8;

// WebID-OIDC discovery
export const OIDC_DISCOVERY_PATH = '/.well-known/openid-configuration';
export const WEBID_DOCUMENT_ACCEPT =
  'text/turtle, application/rdf+xml, application/ld+json, */*';

// Mail templates
export const TEMPLATE_PASSWORD_RESET = 'password_reset';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
