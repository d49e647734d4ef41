import type { ExternalProfile } from '../types/identity.js';
import type { User } from '../types/user.js';
import type { IExternalIdentityStorage, IUserDirectory } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { isValidExternalProfile } from './identity-linking-service.js';
import { AuthError } from '../errors/index.js';

export interface RegistrationServiceOptions {
  identities: IExternalIdentityStorage;
  users: IUserDirectory;
  logger?: Logger;
}

/**
 * Creates local accounts for new external identities
 */
export class RegistrationService {
  private readonly identities: IExternalIdentityStorage;
  private readonly users: IUserDirectory;
  private readonly logger: Logger;

  constructor(options: RegistrationServiceOptions) {
    this.identities = options.identities;
    this.users = options.users;
    this.logger = (options.logger ?? silentLogger).child({ component: 'registration' });
  }

  /**
   * Register a new user from an external profile and link the identity
   *
   * A link failure after the account was created is reported as is; the
   * account is not rolled back.
   */
  async registerWithExternalIdentity(provider: string, profile: ExternalProfile): Promise<User> {
    if (provider === '' || !isValidExternalProfile(profile)) {
      throw AuthError.invalidRequest('Invalid external profile: missing required fields');
    }

    const existing = await this.identities.findByExternalId(provider, profile.id);
    if (existing) {
      throw AuthError.alreadyLinked();
    }

    let user: User;
    try {
      user = await this.users.create({ email: profile.email, name: profile.name });
    } catch (err) {
      throw AuthError.wrap(err, 'Failed to register user');
    }

    try {
      await this.identities.link(user.id, provider, profile.id);
    } catch (err) {
      this.logger.error('External identity link failed after account creation', {
        userId: user.id,
        provider,
        error: err,
      });
      throw AuthError.wrap(err, 'Failed to link external identity');
    }

    this.logger.info('User registered with external identity', { userId: user.id, provider });
    return user;
  }
}
