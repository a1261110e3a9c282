/**
 * Tests for JWT tenant extraction
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as jose from 'jose';
import { TenantMissingError } from './errors.js';
import {
  extractTenantPayload,
  getTenantFromJwt,
  initializeWithPublicKey,
  isJwtVerificationInitialized,
  resetJwtVerification,
  verifyJwt,
} from './jwt.js';

let privateKey: jose.KeyLike;

async function sign(claims: jose.JWTPayload, issuer = 'platform-auth'): Promise<string> {
  return new jose.SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256' })
    .setIssuer(issuer)
    .setSubject('service-catalog')
    .setIssuedAt()
    .setExpirationTime('5m')
    .sign(privateKey);
}

describe('JWT tenant extraction', () => {
  beforeAll(async () => {
    const pair = await jose.generateKeyPair('RS256');
    privateKey = pair.privateKey;
    await initializeWithPublicKey(await jose.exportSPKI(pair.publicKey));
  });

  afterAll(() => {
    resetJwtVerification();
  });

  it('is initialized after loading a public key', () => {
    expect(isJwtVerificationInitialized()).toBe(true);
  });

  it('extracts project and environment claims', async () => {
    const token = await sign({ projectId: 'proj_1', environment: 'staging' });

    await expect(extractTenantPayload(token, { issuer: 'platform-auth' })).resolves.toEqual({
      sub: 'service-catalog',
      projectId: 'proj_1',
      environment: 'staging',
    });
  });

  it('defaults the environment', async () => {
    const token = await sign({ projectId: 'proj_1' });

    await expect(getTenantFromJwt(token, { defaultEnvironment: 'development' })).resolves.toEqual({
      projectId: 'proj_1',
      environment: 'development',
      tenantKey: 'proj_1:development',
    });
  });

  it('rejects a token without projectId', async () => {
    const token = await sign({ environment: 'staging' });

    await expect(extractTenantPayload(token)).rejects.toThrow(TenantMissingError);
  });

  it('rejects a non-string projectId', async () => {
    const token = await sign({ projectId: 42 });

    await expect(extractTenantPayload(token)).rejects.toThrow('JWT does not contain a projectId claim');
  });

  it('rejects the wrong issuer', async () => {
    const token = await sign({ projectId: 'proj_1' }, 'someone-else');

    await expect(verifyJwt(token, { issuer: 'platform-auth' })).rejects.toThrow();
  });

  it('rejects a token signed by another key', async () => {
    const other = await jose.generateKeyPair('RS256');
    const token = await new jose.SignJWT({ projectId: 'proj_1' })
      .setProtectedHeader({ alg: 'RS256' })
      .sign(other.privateKey);

    await expect(verifyJwt(token)).rejects.toThrow();
  });
});

describe('uninitialized verification', () => {
  it('refuses to verify', async () => {
    resetJwtVerification();

    expect(isJwtVerificationInitialized()).toBe(false);
    await expect(verifyJwt('a.b.c')).rejects.toThrow('JWT verification not initialized');
  });
});
