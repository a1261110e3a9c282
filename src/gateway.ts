/**
 * Gateway Composition
 *
 * Wires the shared pieces into one object an application can hold: a single
 * rate limiter and retry policy for every tenant's client, the credentials
 * service that owns client rotation, and the webhook pipeline.
 */

import type { Router } from 'express';
import { CredentialCipher } from './cipher.js';
import { TenantClientPool } from './client-pool.js';
import { createCommerceClientFactory, type CommerceClient } from './commerce-client.js';
import type { GatewayConfig } from './config.js';
import { ConfigError } from './errors.js';
import { TenantCredentialsService } from './credentials.js';
import { webhookRouter, type WebhookSecretResolver } from './express/webhook-router.js';
import { createLogger, type Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import { toTenantIdentity } from './tenant-key.js';
import type { FetchFn } from './transport.js';
import type { CredentialsRepository, WebhookEventStore, WebhookHandler } from './types.js';
import { WebhookDispatcher } from './webhooks/dispatcher.js';
import {
  AppUninstalledHandler,
  CustomerHandler,
  OrderHandler,
  ProductHandler,
} from './webhooks/handlers/index.js';
import { subscribeToWebhooks, type WebhookSubscription } from './webhooks/subscriptions.js';

export interface GatewayOptions {
  repository: CredentialsRepository;
  store?: WebhookEventStore;
  /** Extra handlers, registered after the built-in ones */
  handlers?: WebhookHandler[];
  logger?: Logger;
  fetch?: FetchFn;
}

export interface Gateway {
  logger: Logger;
  rateLimiter: RateLimiter;
  pool: TenantClientPool<CommerceClient>;
  credentials: TenantCredentialsService<CommerceClient>;
  dispatcher: WebhookDispatcher;
  resolveWebhookSecret: WebhookSecretResolver;
  webhookRouter(): Router;
  /**
   * Register `<appUrl>/webhooks/<projectId>/<environment>` with a shop for
   * each topic (the default set when none are given)
   */
  subscribeToWebhooks(
    projectId: string,
    environment: string | undefined,
    shopDomain: string,
    accessToken: string,
    topics?: readonly string[],
    signal?: AbortSignal
  ): Promise<WebhookSubscription[]>;
}

export function createGateway(config: GatewayConfig, options: GatewayOptions): Gateway {
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const rateLimiter = new RateLimiter({ ...config.rateLimit, logger });
  const pool = new TenantClientPool<CommerceClient>({
    factory: createCommerceClientFactory({
      apiVersion: config.apiVersion,
      appUrl: config.appUrl,
      fetch: options.fetch,
    }),
    rateLimiter,
    retryPolicy: config.retry,
    logger,
  });

  const credentials = new TenantCredentialsService<CommerceClient>({
    repository: options.repository,
    cipher: new CredentialCipher(config.encryptionKey),
    pool,
    defaultEnvironment: config.defaultEnvironment,
    logger,
  });

  const dispatcher = new WebhookDispatcher({ logger });
  dispatcher.registerHandler(new OrderHandler(logger));
  dispatcher.registerHandler(new ProductHandler(logger));
  dispatcher.registerHandler(new CustomerHandler(logger));
  dispatcher.registerHandler(
    new AppUninstalledHandler((event) => {
      if (event.tenantKey) {
        pool.invalidateClient(event.tenantKey);
      }
    }, logger)
  );
  for (const handler of options.handlers ?? []) {
    dispatcher.registerHandler(handler);
  }

  // Callbacks are signed with the tenant's app secret
  const resolveWebhookSecret: WebhookSecretResolver = async (tenant) => {
    const stored = await credentials.getCredentials(tenant.projectId, tenant.environment);
    return stored?.apiSecret ?? null;
  };

  return {
    logger,
    rateLimiter,
    pool,
    credentials,
    dispatcher,
    resolveWebhookSecret,
    webhookRouter: () =>
      webhookRouter({
        dispatcher,
        resolveSecret: resolveWebhookSecret,
        store: options.store,
        defaultEnvironment: config.defaultEnvironment,
        logger,
      }),
    subscribeToWebhooks: async (projectId, environment, shopDomain, accessToken, topics, signal) => {
      const appUrl = config.appUrl;
      if (!appUrl) {
        throw new ConfigError(['GATEWAY_APP_URL: required to subscribe to webhooks']);
      }
      const tenant = toTenantIdentity(projectId, environment, config.defaultEnvironment);
      const client = await credentials.getClientForTenant(tenant.projectId, tenant.environment);
      return subscribeToWebhooks(client, tenant, shopDomain, accessToken, {
        webhookUrl: `${appUrl.replace(/\/+$/, '')}/webhooks`,
        topics,
        signal,
        logger,
      });
    },
  };
}
