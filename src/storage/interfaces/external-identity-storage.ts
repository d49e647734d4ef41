import type { ExternalIdentity, LinkStatus } from '../../types/identity.js';

/**
 * Storage interface for external identity links
 */
export interface IExternalIdentityStorage {
  /**
   * Link an external identity to a local user
   *
   * (provider, externalId) is globally unique; a second link fails with
   * `already_linked` even under concurrent callers.
   */
  link(userId: string, provider: string, externalId: string): Promise<ExternalIdentity>;

  /**
   * Find the link for a provider identity
   */
  findByExternalId(provider: string, externalId: string): Promise<ExternalIdentity | null>;

  /**
   * All links held by a user
   */
  findByUser(userId: string): Promise<ExternalIdentity[]>;

  /**
   * Remove a link held by the user
   * Throws `external_identity_not_found` when the user holds no such link
   */
  unlink(userId: string, provider: string, externalId: string): Promise<void>;

  unlinkAllForUser(userId: string): Promise<number>;

  isLinked(provider: string, externalId: string): Promise<LinkStatus>;

  findByProvider(provider: string): Promise<ExternalIdentity[]>;
}
