import { z } from 'zod';
import type { Config } from '../config/index.js';
import type { ExternalProfile, OAuthToken } from '../types/identity.js';
import type { FetchLike } from './webid-oidc-verifier.js';
import { generateState } from '../crypto/random.js';
import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON } from '../config/constants.js';

/**
 * OAuth 2.0 identity provider
 */
export interface OAuthProvider {
  readonly name: string;
  getAuthUrl(state: string): string;
  exchangeCode(code: string): Promise<OAuthToken>;
  getProfile(token: OAuthToken): Promise<ExternalProfile>;
}

/**
 * Where each profile field lives in the provider's userinfo response
 */
export interface ProfileMapping {
  id: string;
  email: string;
  name?: string;
  username?: string;
  avatarUrl?: string;
  /**
   * Boolean field that must be true for the email to be accepted
   */
  emailVerified?: string;
}

export interface ProviderTemplate {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userinfoEndpoint: string;
  /**
   * Secondary endpoint listing addresses when the profile has none
   */
  emailsEndpoint?: string;
  defaultScopes: string[];
  mapping: ProfileMapping;
}

/**
 * Pre-configured provider endpoints and settings
 */
export const providerTemplates = {
  google: {
    authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenEndpoint: 'https://oauth2.googleapis.com/token',
    userinfoEndpoint: 'https://openidconnect.googleapis.com/v1/userinfo',
    defaultScopes: ['openid', 'profile', 'email'],
    mapping: {
      id: 'sub',
      email: 'email',
      name: 'name',
      username: 'email',
      avatarUrl: 'picture',
      emailVerified: 'email_verified',
    },
  },
  github: {
    authorizationEndpoint: 'https://github.com/login/oauth/authorize',
    tokenEndpoint: 'https://github.com/login/oauth/access_token',
    userinfoEndpoint: 'https://api.github.com/user',
    emailsEndpoint: 'https://api.github.com/user/emails',
    defaultScopes: ['read:user', 'user:email'],
    mapping: {
      id: 'id',
      email: 'email',
      name: 'name',
      username: 'login',
      avatarUrl: 'avatar_url',
    },
  },
} satisfies Record<string, ProviderTemplate>;

export interface StandardOAuthProviderOptions extends ProviderTemplate {
  name: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes?: string[];
  fetch?: FetchLike;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('bearer'),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  scope: z.string().optional(),
});

const emailListSchema = z.array(
  z.object({
    email: z.string(),
    primary: z.boolean(),
    verified: z.boolean(),
  })
);

const recordSchema = z.record(z.unknown());

/**
 * Extract user attribute using dot notation path
 */
function extractAttribute(data: Record<string, unknown>, path: string): unknown {
  let value: unknown = data;
  for (const part of path.split('.')) {
    const parsed = recordSchema.safeParse(value);
    if (!parsed.success || !(part in parsed.data)) {
      return undefined;
    }
    value = parsed.data[part];
  }
  return value;
}

function stringAttribute(data: Record<string, unknown>, path?: string): string | undefined {
  if (!path) return undefined;
  const value = extractAttribute(data, path);
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Authorization-code provider driven by a template
 */
export class StandardOAuthProvider implements OAuthProvider {
  readonly name: string;
  private readonly options: StandardOAuthProviderOptions;
  private readonly fetchFn: FetchLike;

  constructor(options: StandardOAuthProviderOptions) {
    this.name = options.name;
    this.options = options;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  getAuthUrl(state: string): string {
    const params = new URLSearchParams();
    params.set('client_id', this.options.clientId);
    params.set('redirect_uri', this.options.redirectUri);
    params.set('scope', (this.options.scopes ?? this.options.defaultScopes).join(' '));
    params.set('response_type', 'code');
    params.set('state', state);
    return `${this.options.authorizationEndpoint}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<OAuthToken> {
    if (code === '') {
      throw new Error('Authorization code is required');
    }

    const tokenParams = new URLSearchParams();
    tokenParams.set('grant_type', 'authorization_code');
    tokenParams.set('code', code);
    tokenParams.set('redirect_uri', this.options.redirectUri);
    tokenParams.set('client_id', this.options.clientId);
    tokenParams.set('client_secret', this.options.clientSecret);

    const response = await this.fetchFn(this.options.tokenEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': CONTENT_TYPE_FORM,
        Accept: CONTENT_TYPE_JSON,
      },
      body: tokenParams.toString(),
    });

    if (!response.ok) {
      throw new Error(`${this.name} token exchange failed with status ${response.status}`);
    }

    const contentType = response.headers.get('content-type') ?? '';
    const body: unknown = contentType.includes(CONTENT_TYPE_FORM)
      ? Object.fromEntries(new URLSearchParams(await response.text()))
      : await response.json();

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`${this.name} returned no access token`);
    }

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      refreshToken: parsed.data.refresh_token,
      expiresIn: parsed.data.expires_in,
      scope: parsed.data.scope,
    };
  }

  async getProfile(token: OAuthToken): Promise<ExternalProfile> {
    const userInfo = recordSchema.parse(await this.getJson(this.options.userinfoEndpoint, token));
    const { mapping } = this.options;

    const id = stringAttribute(userInfo, mapping.id);
    if (!id) {
      throw new Error(`${this.name} profile has no user ID`);
    }

    if (mapping.emailVerified && extractAttribute(userInfo, mapping.emailVerified) !== true) {
      throw new Error(`${this.name} email is not verified`);
    }

    let email = stringAttribute(userInfo, mapping.email);
    if (!email && this.options.emailsEndpoint) {
      email = await this.getPrimaryEmail(this.options.emailsEndpoint, token);
    }
    if (!email) {
      throw new Error(`${this.name} profile has no email address`);
    }

    return {
      id,
      provider: this.name,
      email,
      name: stringAttribute(userInfo, mapping.name),
      username: stringAttribute(userInfo, mapping.username),
      avatarUrl: stringAttribute(userInfo, mapping.avatarUrl),
    };
  }

  private async getPrimaryEmail(url: string, token: OAuthToken): Promise<string | undefined> {
    const emails = emailListSchema.parse(await this.getJson(url, token));
    return emails.find((entry) => entry.primary && entry.verified)?.email;
  }

  private async getJson(url: string, token: OAuthToken): Promise<unknown> {
    const response = await this.fetchFn(url, {
      headers: {
        Authorization: `Bearer ${token.accessToken}`,
        Accept: CONTENT_TYPE_JSON,
      },
    });
    if (!response.ok) {
      throw new Error(`${this.name} request to ${url} failed with status ${response.status}`);
    }
    const body: unknown = await response.json();
    return body;
  }
}

/**
 * Build the providers that have client credentials configured
 */
export function createOAuthProviders(
  config: Pick<Config, 'oauth' | 'server'>,
  fetchFn?: FetchLike
): Map<string, OAuthProvider> {
  const providers = new Map<string, OAuthProvider>();

  for (const name of ['google', 'github'] as const) {
    const client = config.oauth[name];
    if (!client) continue;

    providers.set(
      name,
      new StandardOAuthProvider({
        ...providerTemplates[name],
        name,
        clientId: client.clientId,
        clientSecret: client.clientSecret,
        redirectUri: `${config.server.baseUrl}/auth/oauth/${name}/callback`,
        fetch: fetchFn,
      })
    );
  }

  return providers;
}

const STATE_MAX_AGE_MS = 10 * 60 * 1000; // 10 minutes

/**
 * One-time OAuth state values, kept in memory
 */
export class OAuthStateStore {
  private states = new Map<string, { provider: string; createdAt: number }>();

  create(provider: string): string {
    this.prune();
    const state = generateState();
    this.states.set(state, { provider, createdAt: Date.now() });
    return state;
  }

  /**
   * Consume a state; true only for a fresh state issued for this provider
   */
  consume(state: string, provider: string): boolean {
    const entry = this.states.get(state);
    if (!entry) {
      return false;
    }
    this.states.delete(state); // One-time use
    return entry.provider === provider && Date.now() - entry.createdAt <= STATE_MAX_AGE_MS;
  }

  private prune(): void {
    const now = Date.now();
    for (const [key, entry] of this.states) {
      if (now - entry.createdAt > STATE_MAX_AGE_MS) {
        this.states.delete(key);
      }
    }
  }
}
