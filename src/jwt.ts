/**
 * JWT Tenant Extraction
 *
 * Internal callers present a signed JWT carrying `projectId` and
 * `environment` claims. This is the primary way a request is tagged with a
 * tenant before it reaches the client pool.
 */

import * as jose from 'jose';
import { TenantMissingError } from './errors.js';
import { toTenantIdentity } from './tenant-key.js';
import type { TenantIdentity } from './types.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface JwtTenantConfig {
  /** Expected JWT issuer */
  issuer?: string;

  /** Expected JWT audience */
  audience?: string;

  /** Environment used when the token carries none */
  defaultEnvironment?: string;
}

/**
 * Tenant claims carried by internal service tokens
 */
export interface TenantJwtPayload {
  sub?: string;
  projectId: string;
  environment?: string;
}

// =============================================================================
// KEY MANAGEMENT
// =============================================================================

let cachedPublicKey: jose.KeyLike | null = null;
let cachedJwks: ReturnType<typeof jose.createRemoteJWKSet> | null = null;

/**
 * Initialize JWT verification with a public key (SPKI PEM format)
 */
export async function initializeWithPublicKey(publicKeyPem: string, alg = 'RS256'): Promise<void> {
  cachedPublicKey = await jose.importSPKI(publicKeyPem, alg);
  cachedJwks = null;
}

/**
 * Initialize JWT verification with JWKS endpoint
 */
export function initializeWithJwks(jwksUrl: string): void {
  cachedJwks = jose.createRemoteJWKSet(new URL(jwksUrl));
  cachedPublicKey = null;
}

/**
 * Forget any configured key (tests, key rotation)
 */
export function resetJwtVerification(): void {
  cachedPublicKey = null;
  cachedJwks = null;
}

export function isJwtVerificationInitialized(): boolean {
  return cachedPublicKey !== null || cachedJwks !== null;
}

// =============================================================================
// JWT EXTRACTION
// =============================================================================

/**
 * Verify JWT and return its payload (does NOT validate tenant claims)
 */
export async function verifyJwt(
  token: string,
  config?: Pick<JwtTenantConfig, 'issuer' | 'audience'>
): Promise<jose.JWTPayload> {
  const options: jose.JWTVerifyOptions = {
    issuer: config?.issuer,
    audience: config?.audience,
  };

  if (cachedJwks) {
    const { payload } = await jose.jwtVerify(token, cachedJwks, options);
    return payload;
  }

  if (cachedPublicKey) {
    const { payload } = await jose.jwtVerify(token, cachedPublicKey, options);
    return payload;
  }

  throw new Error('JWT verification not initialized. Call initializeWithPublicKey() or initializeWithJwks() first.');
}

/**
 * Verify a token and pull out its tenant claims
 *
 * @throws TenantMissingError when projectId is absent or not a string
 */
export async function extractTenantPayload(token: string, config?: JwtTenantConfig): Promise<TenantJwtPayload> {
  const payload = await verifyJwt(token, config);

  const { projectId, environment } = payload;
  if (typeof projectId !== 'string' || !projectId) {
    throw new TenantMissingError('JWT does not contain a projectId claim');
  }

  return {
    sub: payload.sub,
    projectId,
    environment: typeof environment === 'string' ? environment : undefined,
  };
}

/**
 * Build the tenant identity from verified claims
 */
export function resolveTenantFromJwt(payload: TenantJwtPayload, defaultEnvironment?: string): TenantIdentity {
  return toTenantIdentity(payload.projectId, payload.environment, defaultEnvironment);
}

/**
 * Verify, extract and resolve in one call
 */
export async function getTenantFromJwt(token: string, config?: JwtTenantConfig): Promise<TenantIdentity> {
  const payload = await extractTenantPayload(token, config);
  return resolveTenantFromJwt(payload, config?.defaultEnvironment);
}
