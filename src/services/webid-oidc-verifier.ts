import type { JWK } from 'jose';
import { z } from 'zod';
import type { OidcConfiguration, WebIdClaims } from '../types/oidc.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AuthError } from '../errors/index.js';
import { decodeJwt, getJwtHeader, verifyJwtWithJwk } from '../crypto/jwt.js';
import {
  CONTENT_TYPE_JSON,
  DEFAULT_WEBID_OIDC_CACHE_TTL,
  DEFAULT_WEBID_OIDC_TIMEOUT_MS,
  OIDC_DISCOVERY_PATH,
  WEBID_DOCUMENT_ACCEPT,
  WEBID_OIDC_ALGORITHMS,
} from '../config/constants.js';

/**
 * Minimal fetch signature, so tests can route requests in process
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const oidcConfigurationSchema = z.object({
  issuer: z.string().min(1),
  authorization_endpoint: z.string().min(1),
  token_endpoint: z.string().min(1),
  jwks_uri: z.string().min(1),
  userinfo_endpoint: z.string().optional(),
  scopes_supported: z.array(z.string()).optional(),
  response_types_supported: z.array(z.string()).optional(),
});

const jwksSchema = z.object({
  keys: z.array(
    z.object({
      kty: z.string(),
      kid: z.string().optional(),
      alg: z.string().optional(),
      use: z.string().optional(),
      n: z.string().optional(),
      e: z.string().optional(),
    })
  ),
});

export interface WebIdOidcVerifierOptions {
  /**
   * Per-request timeout in milliseconds
   */
  timeoutMs?: number;
  /**
   * Discovery cache lifetime in seconds (0 disables caching)
   */
  cacheTtl?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

interface CachedConfiguration {
  config: OidcConfiguration;
  expiresAt: number;
}

/**
 * Verifies WebID-OIDC tokens against the WebID host's own provider
 */
export class WebIdOidcVerifier {
  private readonly timeoutMs: number;
  private readonly cacheTtl: number;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CachedConfiguration>();

  constructor(options: WebIdOidcVerifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBID_OIDC_TIMEOUT_MS;
    this.cacheTtl = options.cacheTtl ?? DEFAULT_WEBID_OIDC_CACHE_TTL;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? silentLogger).child({ component: 'webid-oidc' });
  }

  /**
   * Verify a WebID-OIDC token
   *
   * Every failure surfaces as `webid_verification_failed`.
   */
  async verify(token: string): Promise<WebIdClaims> {
    try {
      return await this.verifyToken(token);
    } catch (err) {
      this.logger.warn('WebID-OIDC verification failed', { error: err });
      if (AuthError.is(err, 'webid_verification_failed')) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw AuthError.webIdVerificationFailed(message, err);
    }
  }

  /**
   * Discover the OpenID configuration of the host serving a WebID
   */
  async discover(webId: string): Promise<OidcConfiguration> {
    const cached = this.cache.get(webId);
    if (cached && Date.now() < cached.expiresAt) {
      return cached.config;
    }

    let origin: string;
    try {
      origin = new URL(webId).origin;
    } catch {
      throw AuthError.webIdVerificationFailed(`Invalid WebID URL: ${webId}`);
    }

    const response = await this.get(origin + OIDC_DISCOVERY_PATH, CONTENT_TYPE_JSON);
    const parsed = oidcConfigurationSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw AuthError.webIdVerificationFailed('Invalid OIDC configuration');
    }

    const config: OidcConfiguration = parsed.data;
    if (this.cacheTtl > 0) {
      this.pruneCache();
      this.cache.set(webId, { config, expiresAt: Date.now() + this.cacheTtl * 1000 });
    }
    return config;
  }

  /**
   * Check that the WebID document mentions the WebID itself
   */
  async checkWebIdDocument(webId: string): Promise<void> {
    const response = await this.get(webId, WEBID_DOCUMENT_ACCEPT);
    const document = await response.text();
    if (!document.includes(webId)) {
      throw AuthError.webIdVerificationFailed('WebID document does not contain the WebID');
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private pruneCache(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }

  private async verifyToken(token: string): Promise<WebIdClaims> {
    const unverified = decodeJwt(token);
    if (!unverified) {
      throw AuthError.webIdVerificationFailed('Malformed token');
    }

    const webIdClaim = unverified['webid'];
    if (typeof webIdClaim !== 'string' || webIdClaim === '') {
      throw AuthError.webIdVerificationFailed('WebID claim not found in token');
    }

    const config = await this.discover(webIdClaim);
    await this.checkWebIdDocument(webIdClaim);

    const jwk = await this.findSigningKey(config.jwks_uri, token);
    const payload = await verifyJwtWithJwk(token, jwk, WEBID_OIDC_ALGORITHMS);

    const webId = payload['webid'];
    const audience = payload.aud === undefined ? [] : [payload.aud].flat();
    if (
      typeof webId !== 'string' ||
      !payload.sub ||
      !webId ||
      !payload.iss ||
      payload.exp === undefined
    ) {
      throw AuthError.webIdVerificationFailed('Invalid WebID claims');
    }

    const claims: WebIdClaims = {
      subject: payload.sub,
      webId,
      issuer: payload.iss,
      audience,
      expiresAt: new Date(payload.exp * 1000),
      issuedAt: new Date((payload.iat ?? 0) * 1000),
    };

    if (Date.now() >= claims.expiresAt.getTime()) {
      throw AuthError.webIdVerificationFailed('Token expired');
    }

    return claims;
  }

  private async findSigningKey(jwksUri: string, token: string): Promise<JWK> {
    const header = getJwtHeader(token);
    const kid = header?.kid;
    if (!kid) {
      throw AuthError.webIdVerificationFailed('Key ID not found in token header');
    }

    const response = await this.get(jwksUri, CONTENT_TYPE_JSON);
    const parsed = jwksSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw AuthError.webIdVerificationFailed('Invalid JWKS document');
    }

    const key = parsed.data.keys.find((candidate) => candidate.kid === kid);
    if (!key) {
      throw AuthError.webIdVerificationFailed(`Public key not found for key ID: ${kid}`);
    }
    if (key.kty !== 'RSA') {
      throw AuthError.webIdVerificationFailed(`Unsupported key type: ${key.kty}`);
    }

    return { kty: key.kty, kid: key.kid, alg: key.alg, use: key.use, n: key.n, e: key.e };
  }

  private async get(url: string, accept: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { Accept: accept },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw AuthError.webIdVerificationFailed(`Request to ${url} timed out`, err);
      }
      throw err;
    }

    if (response.status !== 200) {
      throw AuthError.webIdVerificationFailed(`GET ${url} failed with status ${response.status}`);
    }
    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw AuthError.webIdVerificationFailed('Response is not valid JSON', err);
    }
  }
}
