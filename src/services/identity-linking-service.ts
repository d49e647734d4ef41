import type { ExternalIdentity, ExternalProfile, LinkStatus } from '../types/identity.js';
import type { IExternalIdentityStorage, IUserDirectory } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AuthError } from '../errors/index.js';

/**
 * A profile is usable when it names its ID, provider and email
 */
export function isValidExternalProfile(profile: ExternalProfile): boolean {
  return profile.id !== '' && profile.provider !== '' && profile.email !== '';
}

export interface IdentityLinkingServiceOptions {
  identities: IExternalIdentityStorage;
  users: IUserDirectory;
  logger?: Logger;
}

/**
 * Manages links between local users and external provider accounts
 */
export class IdentityLinkingService {
  private readonly identities: IExternalIdentityStorage;
  private readonly users: IUserDirectory;
  private readonly logger: Logger;

  constructor(options: IdentityLinkingServiceOptions) {
    this.identities = options.identities;
    this.users = options.users;
    this.logger = (options.logger ?? silentLogger).child({ component: 'identity-linking' });
  }

  async link(userId: string, provider: string, profile: ExternalProfile): Promise<ExternalIdentity> {
    if (userId === '') {
      throw AuthError.invalidRequest('User ID is required');
    }
    if (provider === '') {
      throw AuthError.invalidRequest('Provider is required');
    }
    if (!isValidExternalProfile(profile)) {
      throw AuthError.invalidRequest('Invalid external profile: missing required fields');
    }

    await this.requireUser(userId);

    const status = await this.identities.isLinked(provider, profile.id);
    if (status.linked) {
      throw AuthError.alreadyLinked();
    }

    const identity = await this.identities.link(userId, provider, profile.id);
    this.logger.info('External identity linked', { userId, provider });
    return identity;
  }

  async unlink(userId: string, provider: string, externalId: string): Promise<void> {
    if (userId === '' || provider === '' || externalId === '') {
      throw AuthError.invalidRequest('User ID, provider and external ID are required');
    }

    await this.requireUser(userId);

    const existing = await this.identities.findByExternalId(provider, externalId);
    if (!existing) {
      throw AuthError.externalIdentityNotFound();
    }
    if (existing.userId !== userId) {
      throw AuthError.invalidRequest('External identity is not linked to this user');
    }

    await this.identities.unlink(userId, provider, externalId);
    this.logger.info('External identity unlinked', { userId, provider });
  }

  async listLinked(userId: string): Promise<ExternalIdentity[]> {
    if (userId === '') {
      throw AuthError.invalidRequest('User ID is required');
    }
    await this.requireUser(userId);
    return this.identities.findByUser(userId);
  }

  async unlinkAll(userId: string): Promise<number> {
    if (userId === '') {
      throw AuthError.invalidRequest('User ID is required');
    }
    await this.requireUser(userId);
    return this.identities.unlinkAllForUser(userId);
  }

  async isLinked(provider: string, externalId: string): Promise<LinkStatus> {
    if (provider === '' || externalId === '') {
      throw AuthError.invalidRequest('Provider and external ID are required');
    }
    return this.identities.isLinked(provider, externalId);
  }

  async listByProvider(provider: string): Promise<ExternalIdentity[]> {
    if (provider === '') {
      throw AuthError.invalidRequest('Provider is required');
    }
    return this.identities.findByProvider(provider);
  }

  private async requireUser(userId: string): Promise<void> {
    if (!(await this.users.findById(userId))) {
      throw AuthError.userNotFound();
    }
  }
}
