import type { AuthMethod, AuthPrincipal, AuthenticationResult, Credentials } from '../types/auth.js';
import type { ExternalProfile } from '../types/identity.js';
import type { IExternalIdentityStorage, IUserDirectory } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { PasswordService } from './password-service.js';
import type { SessionManager, SessionWithToken } from './session-service.js';
import type { WebIdOidcVerifier } from './webid-oidc-verifier.js';
import type { OAuthProvider } from './oauth-provider.js';
import { AuthError } from '../errors/index.js';

export interface AuthenticationServiceOptions {
  users: IUserDirectory;
  identities: IExternalIdentityStorage;
  passwords: PasswordService;
  sessions: SessionManager;
  verifier: WebIdOidcVerifier;
  providers: Map<string, OAuthProvider>;
  logger?: Logger;
}

/**
 * Read the method name off a value that fell through the credentials union
 */
function methodName(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'method' in value) {
    return String(value.method);
  }
  return 'unknown';
}

/**
 * Single entry point for password, WebID-OIDC and OAuth logins
 *
 * Every method resolves a principal and then creates a session through
 * the same call, so the result has the same shape whatever the method.
 */
export class AuthenticationService {
  private readonly users: IUserDirectory;
  private readonly identities: IExternalIdentityStorage;
  private readonly passwords: PasswordService;
  private readonly sessions: SessionManager;
  private readonly verifier: WebIdOidcVerifier;
  private readonly providers: Map<string, OAuthProvider>;
  private readonly logger: Logger;

  constructor(options: AuthenticationServiceOptions) {
    this.users = options.users;
    this.identities = options.identities;
    this.passwords = options.passwords;
    this.sessions = options.sessions;
    this.verifier = options.verifier;
    this.providers = options.providers;
    this.logger = (options.logger ?? silentLogger).child({ component: 'authentication' });
  }

  async authenticate(credentials: Credentials): Promise<AuthenticationResult> {
    const principal = await this.resolvePrincipal(credentials);
    const method: AuthMethod = credentials.method;

    let created: SessionWithToken;
    try {
      created = await this.sessions.create(principal.userId, principal.webId);
    } catch (err) {
      throw AuthError.wrap(err, 'Failed to create session');
    }

    this.logger.info('User authenticated', {
      method,
      userId: principal.userId,
      sessionId: created.session.id,
    });

    return { method, session: created.session, token: created.token };
  }

  /**
   * Providers that can be used for OAuth logins
   */
  listProviders(): string[] {
    return [...this.providers.keys()];
  }

  getProvider(name: string): OAuthProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw AuthError.unsupportedProvider(name);
    }
    return provider;
  }

  /**
   * Exchange an authorization code and fetch the provider profile
   */
  async exchangeProfile(providerName: string, code: string): Promise<ExternalProfile> {
    const provider = this.getProvider(providerName);
    try {
      const token = await provider.exchangeCode(code);
      return await provider.getProfile(token);
    } catch (err) {
      this.logger.warn('OAuth exchange failed', { provider: providerName, error: err });
      throw AuthError.invalidCredentials(err);
    }
  }

  private async resolvePrincipal(credentials: Credentials): Promise<AuthPrincipal> {
    switch (credentials.method) {
      case 'password':
        return this.verifyPassword(credentials.email, credentials.password);
      case 'webid-oidc':
        return this.verifyWebId(credentials.webId, credentials.token);
      case 'oauth':
        return this.verifyOAuth(credentials.provider, credentials.code);
      default: {
        const unknownMethod: never = credentials;
        const name = methodName(unknownMethod);
        this.logger.warn('Unsupported authentication method', { method: name });
        throw AuthError.unsupportedAuthMethod(name);
      }
    }
  }

  /**
   * Unknown users and wrong passwords fail the same way
   */
  private async verifyPassword(email: string, password: string): Promise<AuthPrincipal> {
    try {
      const user = await this.users.findByEmail(email);
      if (!user) {
        throw AuthError.invalidCredentials();
      }
      await this.passwords.validatePassword(user.id, password);
      return { userId: user.id, webId: user.webId };
    } catch (err) {
      this.logger.debug('Password authentication failed', { error: err });
      throw AuthError.invalidCredentials(err);
    }
  }

  private async verifyWebId(webId: string, token: string): Promise<AuthPrincipal> {
    try {
      const claims = await this.verifier.verify(token);
      if (claims.webId !== webId) {
        throw AuthError.webIdVerificationFailed('Verified WebID does not match the supplied WebID');
      }

      const user = await this.users.findByWebId(webId);
      if (!user) {
        throw AuthError.userNotFound(`No user for WebID ${webId}`);
      }
      return { userId: user.id, webId: user.webId };
    } catch (err) {
      throw AuthError.wrap(err, 'WebID-OIDC authentication failed');
    }
  }

  /**
   * Existing links only; unlinked accounts are never created here
   */
  private async verifyOAuth(providerName: string, code: string): Promise<AuthPrincipal> {
    const profile = await this.exchangeProfile(providerName, code);

    try {
      const identity = await this.identities.findByExternalId(providerName, profile.id);
      if (!identity) {
        throw AuthError.externalIdentityNotFound(
          `No local account is linked to this ${providerName} account`
        );
      }

      const user = await this.users.findById(identity.userId);
      if (!user) {
        throw AuthError.userNotFound();
      }
      return { userId: user.id, webId: user.webId };
    } catch (err) {
      throw AuthError.wrap(err, 'OAuth authentication failed');
    }
  }
}
