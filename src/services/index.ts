export * from './token-service.js';
export * from './session-service.js';
export * from './password-policy.js';
export * from './password-service.js';
export * from './webid-oidc-verifier.js';
export * from './oauth-provider.js';
export * from './mailer.js';
export * from './authentication-service.js';
export * from './registration-service.js';
export * from './identity-linking-service.js';
export * from './cleanup-scheduler.js';
