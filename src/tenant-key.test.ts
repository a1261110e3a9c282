import { describe, it, expect } from 'vitest';
import { TenantMissingError } from './errors.js';
import { buildTenantKey, toTenantIdentity } from './tenant-key.js';

describe('buildTenantKey', () => {
  it('joins project and environment', () => {
    expect(buildTenantKey('proj_123', 'staging')).toBe('proj_123:staging');
  });

  it('defaults to production', () => {
    expect(buildTenantKey('proj_123')).toBe('proj_123:production');
    expect(buildTenantKey('proj_123', '  ')).toBe('proj_123:production');
  });

  it('trims whitespace', () => {
    expect(buildTenantKey(' proj_123 ', ' dev ')).toBe('proj_123:dev');
  });

  it('keeps hyphenated projects and environments apart', () => {
    const first = buildTenantKey('acme', 'eu-prod');
    const second = buildTenantKey('acme-eu', 'prod');

    expect(first).toBe('acme:eu-prod');
    expect(second).toBe('acme-eu:prod');
    expect(first).not.toBe(second);
  });

  it('encodes the separator inside either part', () => {
    expect(buildTenantKey('a:b', 'c')).toBe('a%3Ab:c');
    expect(buildTenantKey('a', 'b:c')).toBe('a:b%3Ac');
  });

  it('requires a project', () => {
    expect(() => buildTenantKey('')).toThrow(TenantMissingError);
    expect(() => buildTenantKey('   ', 'staging')).toThrow('projectId is required to build a tenant key');
  });
});

describe('toTenantIdentity', () => {
  it('builds a full identity', () => {
    expect(toTenantIdentity('proj_1', 'staging')).toEqual({
      projectId: 'proj_1',
      environment: 'staging',
      tenantKey: 'proj_1:staging',
    });
  });

  it('uses the supplied default environment', () => {
    expect(toTenantIdentity('proj_1', undefined, 'development').tenantKey).toBe('proj_1:development');
    expect(toTenantIdentity('proj_1', '').environment).toBe('production');
  });
});
