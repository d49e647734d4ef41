export * from './session.js';
export * from './token.js';
export * from './credential.js';
export * from './identity.js';
export * from './oidc.js';
export * from './user.js';
export * from './auth.js';
export * from './hono.js';
