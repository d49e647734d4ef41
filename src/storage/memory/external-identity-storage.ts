import type { ExternalIdentity, LinkStatus } from '../../types/identity.js';
import type { IExternalIdentityStorage } from '../interfaces/external-identity-storage.js';
import { AuthError } from '../../errors/index.js';
import { generateId } from '../../crypto/index.js';

function providerKey(provider: string, externalId: string): string {
  return `${provider}:${externalId}`;
}

/**
 * In-memory external identity storage implementation
 */
export class MemoryExternalIdentityStorage implements IExternalIdentityStorage {
  private identities = new Map<string, ExternalIdentity>();
  // Index for looking up by provider identity: `${provider}:${externalId}` -> id
  private providerIndex = new Map<string, string>();

  async link(userId: string, provider: string, externalId: string): Promise<ExternalIdentity> {
    const key = providerKey(provider, externalId);
    // Check and insert happen in one synchronous step
    if (this.providerIndex.has(key)) {
      throw AuthError.alreadyLinked();
    }

    const identity: ExternalIdentity = {
      id: generateId(),
      userId,
      provider,
      externalId,
      createdAt: new Date(),
    };

    this.identities.set(identity.id, identity);
    this.providerIndex.set(key, identity.id);

    return { ...identity };
  }

  async findByExternalId(provider: string, externalId: string): Promise<ExternalIdentity | null> {
    const id = this.providerIndex.get(providerKey(provider, externalId));
    if (!id) return null;
    const identity = this.identities.get(id);
    return identity ? { ...identity } : null;
  }

  async findByUser(userId: string): Promise<ExternalIdentity[]> {
    return this.filter((identity) => identity.userId === userId);
  }

  async unlink(userId: string, provider: string, externalId: string): Promise<void> {
    const key = providerKey(provider, externalId);
    const id = this.providerIndex.get(key);
    const identity = id ? this.identities.get(id) : undefined;
    if (!identity || identity.userId !== userId) {
      throw AuthError.externalIdentityNotFound();
    }
    this.providerIndex.delete(key);
    this.identities.delete(identity.id);
  }

  async unlinkAllForUser(userId: string): Promise<number> {
    const toDelete = this.filter((identity) => identity.userId === userId);

    for (const identity of toDelete) {
      this.providerIndex.delete(providerKey(identity.provider, identity.externalId));
      this.identities.delete(identity.id);
    }

    return toDelete.length;
  }

  async isLinked(provider: string, externalId: string): Promise<LinkStatus> {
    const identity = await this.findByExternalId(provider, externalId);
    return identity ? { linked: true, userId: identity.userId } : { linked: false };
  }

  async findByProvider(provider: string): Promise<ExternalIdentity[]> {
    return this.filter((identity) => identity.provider === provider);
  }

  private filter(predicate: (identity: ExternalIdentity) => boolean): ExternalIdentity[] {
    return Array.from(this.identities.values())
      .filter(predicate)
      .map((identity) => ({ ...identity }));
  }
}
