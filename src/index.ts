/**
 * Commerce Gateway
 *
 * Multi-tenant access to a commerce platform API: one cached client per
 * tenant, per-account rate limiting, retries with backoff, encrypted
 * credentials and verified webhook dispatch.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { createGateway, loadConfig } from 'commerce-gateway';
 *
 * const gateway = createGateway(loadConfig(), { repository });
 * app.use(gateway.webhookRouter());
 *
 * const client = await gateway.credentials.getClientForTenant('proj_123', 'staging');
 * const products = await client.get(shop, accessToken, 'products.json');
 * ```
 */

// Types
export type {
  TenantKey,
  TenantIdentity,
  TenantCredentials,
  StoredCredentials,
  RetryPolicy,
  AttemptResult,
  RateLimitConfig,
  WebhookEvent,
  WebhookHandler,
  DispatchReport,
  CredentialsRepository,
  WebhookEventStore,
  SecretCipher,
} from './types.js';

// Errors
export {
  GatewayError,
  ClientConstructionFailedError,
  CipherKeyError,
  DecryptionError,
  ConfigError,
  UpstreamHttpError,
  RetriesExhaustedError,
  MissingHeaderError,
  SignatureDecodeError,
  InvalidSignatureError,
  WebhookSubscriptionError,
  OperationCancelledError,
  TenantMissingError,
  TenantNotConfiguredError,
  isGatewayError,
  isCancellationError,
  isAuthenticationError,
} from './errors.js';

// Headers
export {
  WEBHOOK_HEADERS,
  UPSTREAM_HEADERS,
  TENANT_HEADERS,
  getHeader,
  parseCallLimit,
} from './headers.js';

// Configuration and logging
export {
  DEFAULT_RATE_LIMIT,
  DEFAULT_RETRY_POLICY,
  DEFAULT_API_VERSION,
  loadConfig,
  createRetryPolicy,
} from './config.js';
export type { GatewayConfig } from './config.js';
export { createLogger, componentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Tenants
export { DEFAULT_ENVIRONMENT, buildTenantKey, toTenantIdentity } from './tenant-key.js';

// Traffic control
export { RateLimiter, MIN_WAIT_MS } from './rate-limiter.js';
export type { RateLimiterOptions, BucketSnapshot } from './rate-limiter.js';
export {
  executeWithRetry,
  backoffDelay,
  isRetryableError,
  isTransientNetworkError,
} from './retry.js';
export type { AttemptFn, RetryOptions } from './retry.js';
export { sleep } from './sleep.js';

// Clients
export { TenantClientPool } from './client-pool.js';
export type { ClientFactory, ClientFactoryContext, ClientPoolOptions } from './client-pool.js';
export { UpstreamTransport } from './transport.js';
export type { FetchFn, UpstreamRequest, UpstreamResponse } from './transport.js';
export {
  HttpCommerceClient,
  createCommerceClientFactory,
  normalizeShopDomain,
} from './commerce-client.js';
export type { CommerceClient, CommerceRequest, HttpMethod, AuthUrlOptions } from './commerce-client.js';

// Credentials
export { CredentialCipher } from './cipher.js';
export { TenantCredentialsService } from './credentials.js';
export type { CredentialsServiceOptions } from './credentials.js';

// JWT
export {
  initializeWithPublicKey,
  initializeWithJwks,
  resetJwtVerification,
  verifyJwt,
  extractTenantPayload,
  resolveTenantFromJwt,
  getTenantFromJwt,
} from './jwt.js';
export type { JwtTenantConfig, TenantJwtPayload } from './jwt.js';

// Webhooks
export { WebhookDispatcher } from './webhooks/dispatcher.js';
export type { DispatcherOptions } from './webhooks/dispatcher.js';
export { verifyWebhookSignature, signWebhookPayload, decodeSignature } from './webhooks/verifier.js';
export { WEBHOOK_TOPICS, DEFAULT_WEBHOOK_TOPICS } from './webhooks/topics.js';
export type { WebhookTopic } from './webhooks/topics.js';
export { buildWebhookAddress, subscribeToWebhooks } from './webhooks/subscriptions.js';
export type { SubscribeOptions, WebhookSubscription } from './webhooks/subscriptions.js';
export * from './webhooks/handlers/index.js';

// Composition
export { createGateway } from './gateway.js';
export type { Gateway, GatewayOptions } from './gateway.js';
