import type { Session } from '../../types/session.js';
import { hasAccountContext } from '../../types/session.js';
import type { User } from '../../types/user.js';
import type { TokenManager } from '../../services/token-service.js';
import type { SessionManager } from '../../services/session-service.js';
import type { PasswordService } from '../../services/password-service.js';
import type { AuthenticationService } from '../../services/authentication-service.js';
import type { RegistrationService } from '../../services/registration-service.js';
import type { IdentityLinkingService } from '../../services/identity-linking-service.js';
import type { OAuthStateStore } from '../../services/oauth-provider.js';

/**
 * Services the auth routes are built on
 */
export interface AuthServices {
  tokens: TokenManager;
  sessions: SessionManager;
  passwords: PasswordService;
  authentication: AuthenticationService;
  registration: RegistrationService;
  linking: IdentityLinkingService;
  oauthStates: OAuthStateStore;
}

export interface SessionResponse {
  id: string;
  user_id: string;
  webid: string;
  account_id?: string;
  role_id?: string;
  created_at: string;
  last_activity: string;
  expires_at: string;
}

export function toSessionResponse(session: Session): SessionResponse {
  const response: SessionResponse = {
    id: session.id,
    user_id: session.userId,
    webid: session.webId,
    created_at: session.createdAt.toISOString(),
    last_activity: session.lastActivity.toISOString(),
    expires_at: session.expiresAt.toISOString(),
  };

  if (hasAccountContext(session)) {
    response.account_id = session.accountId;
    response.role_id = session.roleId;
  }

  return response;
}

export interface UserResponse {
  id: string;
  email: string;
  webid: string;
  name?: string;
}

export function toUserResponse(user: User): UserResponse {
  return { id: user.id, email: user.email, webid: user.webId, name: user.name };
}
