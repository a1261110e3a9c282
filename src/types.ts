/**
 * Gateway Types
 *
 * Core type definitions shared by the client pool, the traffic-control layer
 * and the webhook pipeline.
 */

// =============================================================================
// TENANT IDENTITY
// =============================================================================

/**
 * Opaque key scoping one cached client to one project + environment.
 * Built with `buildTenantKey()`.
 */
export type TenantKey = string;

/**
 * Tenant identity attached to every inbound request
 */
export interface TenantIdentity {
  /** Platform project identifier */
  projectId: string;

  /** Deployment environment (e.g. "production", "staging") */
  environment: string;

  /** Derived cache key */
  tenantKey: TenantKey;
}

/**
 * API key/secret pair for one tenant's upstream app
 */
export interface TenantCredentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Credentials as persisted by the external repository. The secret is stored
 * encrypted (see CredentialCipher).
 */
export interface StoredCredentials {
  projectId: string;
  environment: string;
  apiKey: string;
  encryptedSecret: string;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// RETRY POLICY
// =============================================================================

/**
 * Immutable retry configuration. `maxRetries` counts retries, so a call makes
 * at most `maxRetries + 1` attempts.
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffFactor: number;
  readonly retryableStatuses: readonly number[];
}

/**
 * What a single attempt reports back to the retry executor
 */
export interface AttemptResult<T> {
  /** HTTP status observed for this attempt */
  status: number;
  value: T;
}

// =============================================================================
// RATE LIMITING
// =============================================================================

export interface RateLimitConfig {
  /** Requests admitted per window (default: 35) */
  maxRequests: number;

  /** Window length in milliseconds (default: 60000) */
  windowMs: number;
}

// =============================================================================
// WEBHOOKS
// =============================================================================

/**
 * One inbound callback from the commerce platform
 */
export interface WebhookEvent {
  /** Provider-assigned delivery id, when sent */
  id?: string;

  /** Event topic, e.g. "orders/create" */
  topic: string;

  /** Originating shop domain */
  shopDomain: string;

  /** Tenant the callback was addressed to */
  tenantKey?: TenantKey;

  /** Raw, unparsed request body */
  payload: Buffer;

  /** Whether the HMAC signature matched */
  verified: boolean;

  receivedAt: Date;
}

/**
 * Capability pair implemented by every topic handler
 */
export interface WebhookHandler {
  /** Used in logs and dispatch reports */
  readonly name: string;

  canHandle(topic: string): boolean;

  handle(event: WebhookEvent, signal?: AbortSignal): Promise<void>;
}

/**
 * Outcome of one dispatch
 */
export interface DispatchReport {
  topic: string;
  matched: string[];
  succeeded: string[];
  failed: Array<{ handler: string; error: string }>;
}

// =============================================================================
// EXTERNAL COLLABORATORS
// =============================================================================

/**
 * Persistence of tenant credentials (implemented outside this package)
 */
export interface CredentialsRepository {
  getCredentials(projectId: string, environment: string): Promise<StoredCredentials | null>;
  saveCredentials(credentials: StoredCredentials): Promise<void>;
  deleteCredentials(projectId: string, environment: string): Promise<void>;
}

/**
 * Persistence of received webhook events (implemented outside this package)
 */
export interface WebhookEventStore {
  save(event: WebhookEvent): Promise<void>;
}

/**
 * Symmetric encrypt/decrypt capability for secrets at rest
 */
export interface SecretCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}
