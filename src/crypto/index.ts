export * from './random.js';
export * from './password.js';
export * from './jwt.js';
