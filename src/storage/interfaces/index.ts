export * from './session-storage.js';
export * from './credential-storage.js';
export * from './external-identity-storage.js';
export * from './token-storage.js';
export * from './user-storage.js';

import type { ISessionStorage } from './session-storage.js';
import type { IPasswordCredentialStorage, IPasswordResetStorage } from './credential-storage.js';
import type { IExternalIdentityStorage } from './external-identity-storage.js';
import type { IRevokedTokenStorage, IAuditLog } from './token-storage.js';
import type { IUserDirectory } from './user-storage.js';

/**
 * Complete storage interface for the authentication server
 */
export interface IStorage {
  sessions: ISessionStorage;
  credentials: IPasswordCredentialStorage;
  passwordResets: IPasswordResetStorage;
  externalIdentities: IExternalIdentityStorage;
  revokedTokens: IRevokedTokenStorage;
  auditLog: IAuditLog;
  users: IUserDirectory;
}
