import type { IStorage } from '../interfaces/index.js';
import { MemorySessionStorage } from './session-storage.js';
import {
  MemoryPasswordCredentialStorage,
  MemoryPasswordResetStorage,
} from './credential-storage.js';
import { MemoryExternalIdentityStorage } from './external-identity-storage.js';
import { MemoryRevokedTokenStorage, MemoryAuditLog } from './token-storage.js';
import { MemoryUserDirectory } from './user-storage.js';

export { MemorySessionStorage } from './session-storage.js';
export {
  MemoryPasswordCredentialStorage,
  MemoryPasswordResetStorage,
} from './credential-storage.js';
export { MemoryExternalIdentityStorage } from './external-identity-storage.js';
export { MemoryRevokedTokenStorage, MemoryAuditLog } from './token-storage.js';
export { MemoryUserDirectory } from './user-storage.js';

export interface MemoryStorageOptions {
  /**
   * Base URL for generated WebIDs
   */
  baseUrl?: string;
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: MemoryStorageOptions = {}): IStorage {
  return {
    sessions: new MemorySessionStorage(),
    credentials: new MemoryPasswordCredentialStorage(),
    passwordResets: new MemoryPasswordResetStorage(),
    externalIdentities: new MemoryExternalIdentityStorage(),
    revokedTokens: new MemoryRevokedTokenStorage(),
    auditLog: new MemoryAuditLog(),
    users: new MemoryUserDirectory(options.baseUrl),
  };
}
