import type { JWK, JWTPayload } from 'jose';
import { errors as joseErrors } from 'jose';
import { z } from 'zod';
import type { Session } from '../types/session.js';
import type { SessionTokenClaims, SigningKey, AuditEventType } from '../types/token.js';
import type { IRevokedTokenStorage, IAuditLog } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AuthError } from '../errors/index.js';
import {
  signJwt,
  verifyJwt,
  generateRsaKeyPair,
  derivePublicKeyPem,
  publicKeyToJwk,
} from '../crypto/jwt.js';
import {
  DEFAULT_SIGNING_KEY_ID,
  DEFAULT_TOKEN_AUDIENCE,
  DEFAULT_TOKEN_TTL,
  DEFAULT_TOKEN_REFRESH_THRESHOLD,
  SIGNING_ALGORITHM_RS256,
} from '../config/constants.js';

const sessionClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  exp: z.number(),
  iat: z.number(),
  jti: z.string(),
  session_id: z.string().optional(),
  user_id: z.string().optional(),
  webid: z.string().optional(),
  account_id: z.string().optional(),
  role_id: z.string().optional(),
});

export interface TokenManagerOptions {
  signingKey: SigningKey;
  issuer: string;
  audience?: string;
  /**
   * Token lifetime in seconds
   */
  ttl?: number;
  /**
   * Refresh is allowed once remaining lifetime drops to this many seconds
   */
  refreshThreshold?: number;
  revokedTokens?: IRevokedTokenStorage;
  auditLog?: IAuditLog;
  logger?: Logger;
}

/**
 * Build a signing key from a PKCS#8 PEM, or generate a fresh pair
 */
export async function loadSigningKey(
  privateKeyPem?: string,
  kid: string = DEFAULT_SIGNING_KEY_ID
): Promise<SigningKey> {
  if (privateKeyPem) {
    return {
      kid,
      algorithm: SIGNING_ALGORITHM_RS256,
      privateKey: privateKeyPem,
      publicKey: derivePublicKeyPem(privateKeyPem),
    };
  }

  const { publicKey, privateKey } = await generateRsaKeyPair(SIGNING_ALGORITHM_RS256);
  return { kid, algorithm: SIGNING_ALGORITHM_RS256, publicKey, privateKey };
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Issues, validates, refreshes and revokes signed session tokens
 */
export class TokenManager {
  private readonly signingKey: SigningKey;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly ttl: number;
  private readonly refreshThreshold: number;
  private readonly revokedTokens?: IRevokedTokenStorage;
  private readonly auditLog?: IAuditLog;
  private readonly logger: Logger;

  constructor(options: TokenManagerOptions) {
    this.signingKey = options.signingKey;
    this.issuer = options.issuer;
    this.audience = options.audience ?? DEFAULT_TOKEN_AUDIENCE;
    this.ttl = options.ttl ?? DEFAULT_TOKEN_TTL;
    this.refreshThreshold = options.refreshThreshold ?? DEFAULT_TOKEN_REFRESH_THRESHOLD;
    this.revokedTokens = options.revokedTokens;
    this.auditLog = options.auditLog;
    this.logger = (options.logger ?? silentLogger).child({ component: 'token-manager' });
  }

  /**
   * Issue a token bound to a session
   */
  async issue(session: Session): Promise<string> {
    const token = await this.sign({
      session_id: session.id,
      user_id: session.userId,
      webid: session.webId,
      account_id: session.accountId,
      role_id: session.roleId,
    });

    await this.audit('token_issued', { userId: session.userId, success: true });
    return token;
  }

  /**
   * Validate a token and return its claims
   */
  async validate(token: string): Promise<SessionTokenClaims> {
    let payload: JWTPayload;
    try {
      payload = await verifyJwt(token, this.signingKey.publicKey, this.signingKey.algorithm, {
        issuer: this.issuer,
        audience: this.audience,
      });
    } catch (err) {
      const userId = this.peekUserId(err);
      await this.audit('token_validation_failed', {
        userId,
        success: false,
        reason: errorMessage(err),
      });
      if (err instanceof joseErrors.JWTExpired) {
        throw AuthError.tokenExpired(undefined, err);
      }
      throw AuthError.invalidToken('Token verification failed', err);
    }

    const parsed = sessionClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      await this.audit('token_validation_failed', {
        success: false,
        reason: 'malformed token claims',
      });
      throw AuthError.invalidToken('Malformed token claims');
    }

    const data = parsed.data;
    if (!data.session_id || !data.user_id || !data.webid) {
      await this.audit('missing_required_claims', {
        userId: data.user_id,
        success: false,
        reason: 'missing required claims',
      });
      throw AuthError.invalidToken('Missing required claims');
    }

    if (this.revokedTokens && (await this.revokedTokens.isRevoked(data.jti))) {
      await this.audit('revoked_token_used', {
        userId: data.user_id,
        success: false,
        reason: 'token is revoked',
      });
      throw AuthError.tokenRevoked();
    }

    await this.audit('token_validated', { userId: data.user_id, success: true });

    return {
      iss: data.iss,
      sub: data.sub,
      aud: data.aud,
      exp: data.exp,
      iat: data.iat,
      jti: data.jti,
      session_id: data.session_id,
      user_id: data.user_id,
      webid: data.webid,
      account_id: data.account_id,
      role_id: data.role_id,
    };
  }

  /**
   * Mint a replacement token once the current one is close to expiry
   *
   * Fails with `token_refresh_not_needed` while more than the refresh
   * threshold remains.
   */
  async refresh(token: string): Promise<string> {
    const claims = await this.validate(token);

    const remaining = claims.exp - nowSeconds();
    if (remaining > this.refreshThreshold) {
      throw AuthError.tokenRefreshNotNeeded();
    }

    const refreshed = await this.sign({
      session_id: claims.session_id,
      user_id: claims.user_id,
      webid: claims.webid,
      account_id: claims.account_id,
      role_id: claims.role_id,
    });

    await this.audit('token_refreshed', { userId: claims.user_id, success: true });
    return refreshed;
  }

  /**
   * Revoke a token until its own expiry
   */
  async revoke(token: string, reason: string): Promise<void> {
    const claims = await this.verifySignatureOnly(token);

    if (this.revokedTokens) {
      await this.revokedTokens.revoke({
        jti: claims.jti,
        userId: claims.user_id,
        reason,
        revokedAt: new Date(),
        expiresAt: new Date(claims.exp * 1000),
      });
    }

    await this.audit('token_revoked', { userId: claims.user_id, success: true, reason });
  }

  /**
   * Record bulk revocation intent for a user
   *
   * Tokens are not indexed per user; callers kill the user's sessions,
   * which makes their tokens fail session validation.
   */
  async revokeAllForUser(userId: string, reason: string): Promise<void> {
    if (userId === '') {
      throw AuthError.invalidRequest('User ID is required');
    }
    await this.audit('all_user_tokens_revoked', { userId, success: true, reason });
  }

  async isRevoked(token: string): Promise<boolean> {
    const claims = await this.verifySignatureOnly(token);
    if (!this.revokedTokens) {
      return false;
    }
    return this.revokedTokens.isRevoked(claims.jti);
  }

  /**
   * Drop revocation entries whose tokens have expired anyway
   */
  async cleanupExpiredRevocations(): Promise<number> {
    if (!this.revokedTokens) {
      return 0;
    }
    const removed = await this.revokedTokens.deleteExpired(new Date());
    if (removed > 0) {
      this.logger.info('Expired revocations removed', { count: removed });
    }
    return removed;
  }

  /**
   * Public signing key for the JWKS endpoint
   */
  async getPublicJwk(): Promise<JWK> {
    return publicKeyToJwk(
      this.signingKey.publicKey,
      this.signingKey.kid,
      this.signingKey.algorithm
    );
  }

  private async sign(claims: {
    session_id: string;
    user_id: string;
    webid: string;
    account_id?: string;
    role_id?: string;
  }): Promise<string> {
    const payload: JWTPayload = {
      session_id: claims.session_id,
      user_id: claims.user_id,
      webid: claims.webid,
    };
    if (claims.account_id && claims.role_id) {
      payload['account_id'] = claims.account_id;
      payload['role_id'] = claims.role_id;
    }

    const issuedAt = nowSeconds();
    return signJwt(payload, this.signingKey, {
      issuer: this.issuer,
      subject: claims.user_id,
      audience: this.audience,
      issuedAt,
      expiresAt: issuedAt + this.ttl,
    });
  }

  private async verifySignatureOnly(
    token: string
  ): Promise<{ jti: string; exp: number; user_id?: string }> {
    let payload: JWTPayload;
    try {
      payload = await verifyJwt(token, this.signingKey.publicKey, this.signingKey.algorithm, {
        ignoreExpiry: true,
      });
    } catch (err) {
      throw AuthError.invalidToken('Token verification failed', err);
    }

    const { jti, exp } = payload;
    if (!jti || exp === undefined) {
      throw AuthError.invalidToken('Token has no identifier or expiry');
    }
    const userId = payload['user_id'];
    return { jti, exp, user_id: typeof userId === 'string' ? userId : undefined };
  }

  /**
   * User ID from a token that failed verification (expired tokens still carry one)
   */
  private peekUserId(err: unknown): string | undefined {
    if (err instanceof joseErrors.JWTClaimValidationFailed) {
      const userId = err.payload['user_id'];
      return typeof userId === 'string' ? userId : undefined;
    }
    return undefined;
  }

  private async audit(
    type: AuditEventType,
    event: { userId?: string; success: boolean; reason?: string }
  ): Promise<void> {
    const fields = { event: type, userId: event.userId, success: event.success, reason: event.reason };
    if (event.success) {
      this.logger.debug('Token audit event', fields);
    } else {
      this.logger.warn('Token audit event', fields);
    }

    if (!this.auditLog) {
      return;
    }

    try {
      await this.auditLog.record({ type, ...event, timestamp: new Date() });
    } catch (err) {
      this.logger.error('Failed to record audit event', { event: type, error: err });
    }
  }
}
