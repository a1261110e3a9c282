/**
 * Tenant Client Pool
 *
 * Creates and caches one authenticated upstream client per tenant key.
 *
 * - At most one construction per key, even under concurrent first use: the
 *   first caller stores a construction promise that later callers await
 * - Failed constructions are never cached; the next call tries again
 * - Cached clients live until invalidated. Passing different credentials for
 *   a cached key does NOT rebuild the client; rotate by calling
 *   `invalidateClient()` first
 */

import { DEFAULT_RETRY_POLICY } from './config.js';
import { ClientConstructionFailedError } from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import type { RetryPolicy, TenantCredentials, TenantKey } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Everything a factory needs to build a tenant's client
 */
export interface ClientFactoryContext {
  tenantKey: TenantKey;
  credentials: Readonly<TenantCredentials>;
  rateLimiter: RateLimiter;
  retryPolicy: RetryPolicy;
  logger: Logger;
}

export type ClientFactory<TClient> = (context: ClientFactoryContext) => TClient | Promise<TClient>;

export interface ClientPoolOptions<TClient> {
  /** Builds the upstream client for a tenant */
  factory: ClientFactory<TClient>;

  /** Shared across every client (default: new RateLimiter()) */
  rateLimiter?: RateLimiter;

  retryPolicy?: RetryPolicy;

  logger?: Logger;
}

// =============================================================================
// POOL
// =============================================================================

export class TenantClientPool<TClient> {
  private readonly clients = new Map<TenantKey, TClient>();
  private readonly inflight = new Map<TenantKey, Promise<TClient>>();
  private readonly factory: ClientFactory<TClient>;
  private readonly logger: Logger;

  readonly rateLimiter: RateLimiter;
  readonly retryPolicy: RetryPolicy;

  constructor(options: ClientPoolOptions<TClient>) {
    this.factory = options.factory;
    this.logger = componentLogger('client-pool', options.logger);
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ logger: options.logger });
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Return the tenant's cached client, or build it exactly once.
   *
   * Concurrent callers for the same key share one construction and receive
   * the same client instance or the same error.
   *
   * @throws ClientConstructionFailedError on empty credentials or factory failure
   */
  async getClient(tenantKey: TenantKey, credentials: TenantCredentials): Promise<TClient> {
    if (!credentials.apiKey || !credentials.apiSecret) {
      throw new ClientConstructionFailedError(tenantKey, 'apiKey and apiSecret are required');
    }

    const cached = this.clients.get(tenantKey);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inflight.get(tenantKey);
    if (pending) {
      return pending;
    }

    return this.construct(tenantKey, credentials);
  }

  /**
   * Drop the cached client and any in-flight construction guard.
   * Idempotent. A construction already in flight still resolves for its
   * waiters but is not cached.
   */
  invalidateClient(tenantKey: TenantKey): void {
    const hadClient = this.clients.delete(tenantKey);
    const hadInflight = this.inflight.delete(tenantKey);

    if (hadClient || hadInflight) {
      this.logger.info({ tenantKey }, 'Invalidated commerce client for tenant');
    }
  }

  has(tenantKey: TenantKey): boolean {
    return this.clients.has(tenantKey);
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Drop every cached client (shutdown / tests)
   */
  clear(): void {
    this.clients.clear();
    this.inflight.clear();
  }

  private construct(tenantKey: TenantKey, credentials: TenantCredentials): Promise<TClient> {
    // The factory runs on a later tick, after this promise is registered.
    // Only the registered construction may publish to the cache, so one that
    // raced an invalidation cannot resurrect a stale client.
    const construction: Promise<TClient> = Promise.resolve().then(async () => {
      let client: TClient;
      try {
        client = await this.factory({
          tenantKey,
          credentials: Object.freeze({ ...credentials }),
          rateLimiter: this.rateLimiter,
          retryPolicy: this.retryPolicy,
          logger: this.logger.child({ tenantKey }),
        });
      } catch (error) {
        if (this.inflight.get(tenantKey) === construction) {
          this.inflight.delete(tenantKey);
        }
        this.logger.error({ tenantKey, err: error }, 'Failed to construct commerce client');
        throw error instanceof ClientConstructionFailedError
          ? error
          : new ClientConstructionFailedError(tenantKey, errorMessage(error), error);
      }

      if (this.inflight.get(tenantKey) === construction) {
        this.inflight.delete(tenantKey);
        this.clients.set(tenantKey, client);
        this.logger.info({ tenantKey }, 'Created new commerce client for tenant');
      }

      return client;
    });

    this.inflight.set(tenantKey, construction);
    return construction;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
