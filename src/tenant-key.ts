/**
 * Tenant Keys
 *
 * A tenant is one project in one environment. Its key scopes the cached
 * upstream client.
 */

import { TenantMissingError } from './errors.js';
import type { TenantIdentity, TenantKey } from './types.js';

export const DEFAULT_ENVIRONMENT = 'production';

/**
 * Build the cache key for a project + environment
 *
 * Both parts are URI-encoded around a ":" separator, so no two
 * (project, environment) pairs share a key.
 *
 * @example
 * buildTenantKey('proj_123', 'staging') // "proj_123:staging"
 */
export function buildTenantKey(projectId: string, environment: string = DEFAULT_ENVIRONMENT): TenantKey {
  const project = projectId.trim();
  if (!project) {
    throw new TenantMissingError('projectId is required to build a tenant key');
  }
  const env = environment.trim() || DEFAULT_ENVIRONMENT;
  return `${encodeURIComponent(project)}:${encodeURIComponent(env)}`;
}

/**
 * Build a full tenant identity, defaulting the environment
 */
export function toTenantIdentity(
  projectId: string,
  environment?: string,
  defaultEnvironment: string = DEFAULT_ENVIRONMENT
): TenantIdentity {
  const env = environment?.trim() || defaultEnvironment;
  return {
    projectId: projectId.trim(),
    environment: env,
    tenantKey: buildTenantKey(projectId, env),
  };
}
