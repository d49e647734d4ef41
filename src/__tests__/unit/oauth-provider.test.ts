import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import {
  StandardOAuthProvider,
  OAuthStateStore,
  createOAuthProviders,
  type StandardOAuthProviderOptions,
} from '../../services/oauth-provider.js';
import { createTestConfig, routeFetch } from '../test-setup.js';

const PROVIDER_ORIGIN = 'https://provider.example.test';
const REDIRECT_URI = 'http://localhost:3000/auth/oauth/example/callback';

/**
 * Authorization server and user API for one test user
 */
function createProviderApp(userInfo: Record<string, unknown>): Hono {
  const app = new Hono();

  app.post('/token', async (c) => {
    const params = new URLSearchParams(await c.req.text());
    if (
      params.get('grant_type') !== 'authorization_code' ||
      params.get('client_id') !== 'client-1' ||
      params.get('client_secret') !== 'test-secret' ||
      params.get('redirect_uri') !== REDIRECT_URI
    ) {
      return c.json({ error: 'invalid_client' }, 401);
    }

    switch (params.get('code')) {
      case 'good-code':
        return c.json({ access_token: 'at-1', token_type: 'bearer', expires_in: 3600, scope: 'read' });
      case 'form-code':
        return c.body('access_token=at-1&token_type=bearer&expires_in=60', 200, {
          'Content-Type': 'application/x-www-form-urlencoded',
        });
      case 'empty-code':
        return c.json({ error: 'server_busy' });
      default:
        return c.json({ error: 'invalid_grant' }, 400);
    }
  });

  app.use('/user/*', async (c, next) => {
    if (c.req.header('Authorization') !== 'Bearer at-1') {
      return c.json({ message: 'Bad credentials' }, 401);
    }
    await next();
  });
  app.get('/user/profile', (c) => c.json(userInfo));
  app.get('/user/emails', (c) =>
    c.json([
      { email: 'old@example.com', primary: false, verified: true },
      { email: 'alice@example.com', primary: true, verified: true },
    ])
  );

  return app;
}

function createProvider(
  userInfo: Record<string, unknown>,
  overrides: Partial<StandardOAuthProviderOptions> = {}
): StandardOAuthProvider {
  return new StandardOAuthProvider({
    name: 'example',
    clientId: 'client-1',
    clientSecret: 'test-secret',
    redirectUri: REDIRECT_URI,
    authorizationEndpoint: `${PROVIDER_ORIGIN}/authorize`,
    tokenEndpoint: `${PROVIDER_ORIGIN}/token`,
    userinfoEndpoint: `${PROVIDER_ORIGIN}/user/profile`,
    emailsEndpoint: `${PROVIDER_ORIGIN}/user/emails`,
    defaultScopes: ['read:user', 'user:email'],
    mapping: { id: 'id', email: 'email', name: 'name', username: 'login', avatarUrl: 'avatar_url' },
    fetch: routeFetch({ [PROVIDER_ORIGIN]: createProviderApp(userInfo) }),
    ...overrides,
  });
}

const token = { accessToken: 'at-1', tokenType: 'bearer' };

describe('StandardOAuthProvider', () => {
  describe('getAuthUrl', () => {
    it('should build the authorization request', () => {
      const url = new URL(createProvider({}).getAuthUrl('state-1'));

      expect(url.origin + url.pathname).toBe(`${PROVIDER_ORIGIN}/authorize`);
      expect(Object.fromEntries(url.searchParams)).toEqual({
        client_id: 'client-1',
        redirect_uri: REDIRECT_URI,
        scope: 'read:user user:email',
        response_type: 'code',
        state: 'state-1',
      });
    });

    it('should prefer configured scopes', () => {
      const url = new URL(createProvider({}, { scopes: ['openid'] }).getAuthUrl('s'));

      expect(url.searchParams.get('scope')).toBe('openid');
    });
  });

  describe('exchangeCode', () => {
    it('should read a JSON token response', async () => {
      await expect(createProvider({}).exchangeCode('good-code')).resolves.toEqual({
        accessToken: 'at-1',
        tokenType: 'bearer',
        refreshToken: undefined,
        expiresIn: 3600,
        scope: 'read',
      });
    });

    it('should read a form-encoded token response', async () => {
      await expect(createProvider({}).exchangeCode('form-code')).resolves.toMatchObject({
        accessToken: 'at-1',
        tokenType: 'bearer',
        expiresIn: 60,
      });
    });

    it('should fail on a rejected code', async () => {
      await expect(createProvider({}).exchangeCode('bad-code')).rejects.toThrow(
        'example token exchange failed with status 400'
      );
    });

    it('should fail when no access token is returned', async () => {
      await expect(createProvider({}).exchangeCode('empty-code')).rejects.toThrow(
        'example returned no access token'
      );
    });

    it('should require a code', async () => {
      await expect(createProvider({}).exchangeCode('')).rejects.toThrow(
        'Authorization code is required'
      );
    });
  });

  describe('getProfile', () => {
    it('should map the user info response', async () => {
      const provider = createProvider({
        id: 42,
        login: 'alice',
        name: 'Alice',
        email: 'alice@example.com',
        avatar_url: 'https://provider.example.test/avatars/42',
      });

      await expect(provider.getProfile(token)).resolves.toEqual({
        id: '42',
        provider: 'example',
        email: 'alice@example.com',
        name: 'Alice',
        username: 'alice',
        avatarUrl: 'https://provider.example.test/avatars/42',
      });
    });

    it('should fall back to the primary verified address', async () => {
      const provider = createProvider({ id: 42, login: 'alice', email: null });

      await expect(provider.getProfile(token)).resolves.toMatchObject({
        email: 'alice@example.com',
        name: undefined,
      });
    });

    it('should follow nested attribute paths', async () => {
      const provider = createProvider(
        { data: { user: { id: 'u-7', mail: 'alice@example.com' } } },
        { mapping: { id: 'data.user.id', email: 'data.user.mail' } }
      );

      await expect(provider.getProfile(token)).resolves.toMatchObject({
        id: 'u-7',
        email: 'alice@example.com',
      });
    });

    it('should require a verified email where the provider reports it', async () => {
      const provider = createProvider(
        { sub: 'g-1', email: 'alice@example.com', email_verified: false },
        { mapping: { id: 'sub', email: 'email', emailVerified: 'email_verified' } }
      );

      await expect(provider.getProfile(token)).rejects.toThrow('example email is not verified');
    });

    it('should require a user ID', async () => {
      await expect(createProvider({ email: 'alice@example.com' }).getProfile(token)).rejects.toThrow(
        'example profile has no user ID'
      );
    });

    it('should require an email address', async () => {
      const provider = createProvider({ id: 42 }, { emailsEndpoint: undefined });

      await expect(provider.getProfile(token)).rejects.toThrow('example profile has no email address');
    });

    it('should fail when the API rejects the access token', async () => {
      await expect(
        createProvider({ id: 42 }).getProfile({ accessToken: 'stale', tokenType: 'bearer' })
      ).rejects.toThrow(`example request to ${PROVIDER_ORIGIN}/user/profile failed with status 401`);
    });
  });
});

describe('createOAuthProviders', () => {
  it('should build only providers with credentials', () => {
    const config = createTestConfig({
      GITHUB_CLIENT_ID: 'github-client',
      GITHUB_CLIENT_SECRET: 'test-secret',
    });

    const providers = createOAuthProviders(config);

    expect([...providers.keys()]).toEqual(['github']);
    const url = new URL(providers.get('github')?.getAuthUrl('s') ?? '');
    expect(url.origin + url.pathname).toBe('https://github.com/login/oauth/authorize');
    expect(url.searchParams.get('redirect_uri')).toBe(
      'http://localhost:3000/auth/oauth/github/callback'
    );
  });
});

describe('OAuthStateStore', () => {
  let states: OAuthStateStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
    states = new OAuthStateStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should accept a state once', () => {
    const state = states.create('github');

    expect(states.consume(state, 'github')).toBe(true);
    expect(states.consume(state, 'github')).toBe(false);
  });

  it('should bind a state to its provider', () => {
    const state = states.create('github');

    expect(states.consume(state, 'google')).toBe(false);
    expect(states.consume(state, 'github')).toBe(false);
  });

  it('should expire states after ten minutes', () => {
    const fresh = states.create('github');
    const stale = states.create('github');
    vi.setSystemTime(new Date('2026-03-01T12:10:00Z'));
    expect(states.consume(fresh, 'github')).toBe(true);

    vi.setSystemTime(new Date('2026-03-01T12:10:00.001Z'));
    expect(states.consume(stale, 'github')).toBe(false);
  });

  it('should reject unknown states', () => {
    expect(states.consume('forged', 'github')).toBe(false);
  });
});
