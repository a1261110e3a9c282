/**
 * Tenant Credentials Service
 *
 * Stores tenant app credentials encrypted, and resolves a tenant's cached
 * client from them. Saving or deleting credentials is the one place a
 * cached client is rotated: both invalidate the tenant's pool entry.
 */

import { TenantNotConfiguredError } from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import type { TenantClientPool } from './client-pool.js';
import { DEFAULT_ENVIRONMENT, toTenantIdentity } from './tenant-key.js';
import type {
  CredentialsRepository,
  SecretCipher,
  StoredCredentials,
  TenantCredentials,
} from './types.js';

export interface CredentialsServiceOptions<TClient> {
  repository: CredentialsRepository;
  cipher: SecretCipher;
  pool: TenantClientPool<TClient>;
  defaultEnvironment?: string;
  logger?: Logger;
  now?: () => Date;
}

export class TenantCredentialsService<TClient> {
  private readonly repository: CredentialsRepository;
  private readonly cipher: SecretCipher;
  private readonly pool: TenantClientPool<TClient>;
  private readonly defaultEnvironment: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CredentialsServiceOptions<TClient>) {
    this.repository = options.repository;
    this.cipher = options.cipher;
    this.pool = options.pool;
    this.defaultEnvironment = options.defaultEnvironment ?? DEFAULT_ENVIRONMENT;
    this.logger = componentLogger('credentials', options.logger);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Encrypt and persist credentials, then drop any client built from the
   * previous ones
   */
  async saveCredentials(
    projectId: string,
    environment: string | undefined,
    apiKey: string,
    apiSecret: string
  ): Promise<StoredCredentials> {
    const tenant = toTenantIdentity(projectId, environment, this.defaultEnvironment);
    const existing = await this.repository.getCredentials(tenant.projectId, tenant.environment);
    const timestamp = this.now();

    const stored: StoredCredentials = {
      projectId: tenant.projectId,
      environment: tenant.environment,
      apiKey,
      encryptedSecret: this.cipher.encrypt(apiSecret),
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };

    await this.repository.saveCredentials(stored);
    this.pool.invalidateClient(tenant.tenantKey);

    this.logger.info(
      { projectId: tenant.projectId, environment: tenant.environment, rotated: existing !== null },
      'Credentials saved successfully'
    );
    return stored;
  }

  /**
   * Load and decrypt credentials, or null when none are stored
   */
  async getCredentials(projectId: string, environment?: string): Promise<TenantCredentials | null> {
    const tenant = toTenantIdentity(projectId, environment, this.defaultEnvironment);
    const stored = await this.repository.getCredentials(tenant.projectId, tenant.environment);
    if (!stored) {
      return null;
    }

    return {
      apiKey: stored.apiKey,
      apiSecret: this.cipher.decrypt(stored.encryptedSecret),
    };
  }

  async deleteCredentials(projectId: string, environment?: string): Promise<void> {
    const tenant = toTenantIdentity(projectId, environment, this.defaultEnvironment);
    await this.repository.deleteCredentials(tenant.projectId, tenant.environment);
    this.pool.invalidateClient(tenant.tenantKey);

    this.logger.info(
      { projectId: tenant.projectId, environment: tenant.environment },
      'Credentials deleted successfully'
    );
  }

  /**
   * Resolve the tenant's client from the pool, building it from stored
   * credentials on first use
   *
   * @throws TenantNotConfiguredError when no credentials are stored
   */
  async getClientForTenant(projectId: string, environment?: string): Promise<TClient> {
    const tenant = toTenantIdentity(projectId, environment, this.defaultEnvironment);

    const credentials = await this.getCredentials(tenant.projectId, tenant.environment);
    if (!credentials) {
      throw new TenantNotConfiguredError(tenant.projectId, tenant.environment);
    }

    return this.pool.getClient(tenant.tenantKey, credentials);
  }
}
