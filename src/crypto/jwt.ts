import { createPrivateKey, createPublicKey } from 'node:crypto';
import * as jose from 'jose';
import type { SigningKey } from '../types/token.js';
import { generateJti } from './random.js';
import { SESSION_TOKEN_TYPE } from '../config/constants.js';

/**
 * JWT signing and verification utilities using jose library
 */

type RsaAlgorithm = 'RS256' | 'RS384' | 'RS512';

/**
 * Import a private key from PEM format
 */
async function importPrivateKey(pem: string, algorithm: RsaAlgorithm): Promise<jose.KeyLike> {
  return jose.importPKCS8(pem, algorithm);
}

/**
 * Import a public key from PEM format
 */
async function importPublicKey(pem: string, algorithm: RsaAlgorithm): Promise<jose.KeyLike> {
  return jose.importSPKI(pem, algorithm);
}

export interface SignOptions {
  issuer: string;
  subject: string;
  audience: string | string[];
  issuedAt: number;
  expiresAt: number;
  jti?: string;
}

/**
 * Sign a JWT with an RSA signing key
 */
export async function signJwt(
  claims: jose.JWTPayload,
  signingKey: SigningKey,
  options: SignOptions
): Promise<string> {
  const privateKey = await importPrivateKey(signingKey.privateKey, signingKey.algorithm);

  return new jose.SignJWT(claims)
    .setProtectedHeader({
      alg: signingKey.algorithm,
      kid: signingKey.kid,
      typ: SESSION_TOKEN_TYPE,
    })
    .setIssuer(options.issuer)
    .setSubject(options.subject)
    .setAudience(options.audience)
    .setIssuedAt(options.issuedAt)
    .setExpirationTime(options.expiresAt)
    .setJti(options.jti ?? generateJti())
    .sign(privateKey);
}

export interface VerifyOptions {
  issuer?: string;
  audience?: string | string[];
  clockTolerance?: number;
  /**
   * Skip the `exp` check (revocation of already-expired tokens)
   */
  ignoreExpiry?: boolean;
}

/**
 * Verify a JWT against a PEM public key
 *
 * Only the key's own algorithm is accepted.
 */
export async function verifyJwt(
  token: string,
  publicKey: string,
  algorithm: RsaAlgorithm,
  options: VerifyOptions = {}
): Promise<jose.JWTPayload> {
  const key = await importPublicKey(publicKey, algorithm);

  const verifyOptions: jose.JWTVerifyOptions = {
    algorithms: [algorithm],
    clockTolerance: options.clockTolerance ?? 0,
  };

  if (options.issuer) {
    verifyOptions.issuer = options.issuer;
  }

  if (options.audience) {
    verifyOptions.audience = options.audience;
  }

  if (options.ignoreExpiry) {
    // Signature only
    await jose.compactVerify(token, key, { algorithms: [algorithm] });
    return jose.decodeJwt(token);
  }

  const { payload } = await jose.jwtVerify(token, key, verifyOptions);
  return payload;
}

/**
 * Verify a JWT against a JWK from a remote key set
 */
export async function verifyJwtWithJwk(
  token: string,
  jwk: jose.JWK,
  algorithms: readonly string[]
): Promise<jose.JWTPayload> {
  const header = jose.decodeProtectedHeader(token);
  const alg = header.alg ?? jwk.alg;
  if (!alg || !algorithms.includes(alg)) {
    throw new jose.errors.JOSEAlgNotAllowed(`Unsupported signing algorithm: ${alg ?? 'none'}`);
  }

  const key = await jose.importJWK(jwk, alg);
  const { payload } = await jose.jwtVerify(token, key, { algorithms: [...algorithms] });
  return payload;
}

/**
 * Decode a JWT without verification
 * WARNING: Only use this when you've already verified the token or for debugging
 */
export function decodeJwt(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

/**
 * Get the JWT header without verification
 */
export function getJwtHeader(token: string): jose.ProtectedHeaderParameters | null {
  try {
    return jose.decodeProtectedHeader(token);
  } catch {
    return null;
  }
}

/**
 * Generate a new RSA key pair for signing
 */
export async function generateRsaKeyPair(
  algorithm: RsaAlgorithm = 'RS256'
): Promise<{ publicKey: string; privateKey: string }> {
  const modulusLength = algorithm === 'RS512' ? 4096 : 2048;

  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    modulusLength,
    extractable: true,
  });

  const publicKeyPem = await jose.exportSPKI(publicKey);
  const privateKeyPem = await jose.exportPKCS8(privateKey);

  return {
    publicKey: publicKeyPem,
    privateKey: privateKeyPem,
  };
}

/**
 * Derive the SPKI public key from a PKCS#8 private key
 */
export function derivePublicKeyPem(privateKeyPem: string): string {
  const publicKey = createPublicKey(createPrivateKey(privateKeyPem));
  return publicKey.export({ type: 'spki', format: 'pem' }).toString();
}

/**
 * Convert a PEM public key to JWK format (for JWKS endpoint)
 */
export async function publicKeyToJwk(
  publicKeyPem: string,
  kid: string,
  algorithm: RsaAlgorithm
): Promise<jose.JWK> {
  const publicKey = await importPublicKey(publicKeyPem, algorithm);
  const jwk = await jose.exportJWK(publicKey);

  return {
    ...jwk,
    kid,
    alg: algorithm,
    use: 'sig',
  };
}
