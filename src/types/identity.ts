/**
 * Link between a local user and an external provider account
 */
export interface ExternalIdentity {
  id: string;
  userId: string;
  provider: string;
  externalId: string;
  createdAt: Date;
}

/**
 * Profile returned by an external identity provider
 */
export interface ExternalProfile {
  id: string;
  provider: string;
  email: string;
  name?: string;
  username?: string;
  avatarUrl?: string;
}

/**
 * Result of an `isLinked` lookup
 */
export interface LinkStatus {
  linked: boolean;
  userId?: string;
}

/**
 * Token returned by an OAuth provider's token endpoint
 */
export interface OAuthToken {
  accessToken: string;
  tokenType: string;
  refreshToken?: string;
  expiresIn?: number;
  scope?: string;
}
