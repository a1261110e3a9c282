/**
 * Gateway Errors
 *
 * Error classes for the tenant client pool, traffic control and webhook
 * pipeline. Every error carries a stable code and an HTTP status so the
 * Express surfaces can answer consistently.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

export interface GatewayErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for all gateway errors
 */
export class GatewayError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    options: GatewayErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

// =============================================================================
// CONSTRUCTION ERRORS
// =============================================================================

/**
 * Thrown when an upstream client cannot be built for a tenant.
 * Never cached: the next call for the same tenant retries construction.
 */
export class ClientConstructionFailedError extends GatewayError {
  constructor(tenantKey: string, reason: string, cause?: unknown) {
    super(
      'CLIENT_CONSTRUCTION_FAILED',
      `Failed to construct client for tenant "${tenantKey}": ${reason}`,
      500,
      { details: { tenantKey }, cause }
    );
    this.name = 'ClientConstructionFailedError';
  }
}

/**
 * Thrown at cipher construction when the key is not exactly 32 bytes
 */
export class CipherKeyError extends GatewayError {
  constructor(actualLength: number) {
    super(
      'CIPHER_KEY_INVALID',
      `Encryption key must be exactly 32 bytes, got ${actualLength}`,
      500,
      { details: { actualLength } }
    );
    this.name = 'CipherKeyError';
  }
}

/**
 * Thrown when a stored secret cannot be decrypted
 */
export class DecryptionError extends GatewayError {
  constructor(reason: string, cause?: unknown) {
    super('DECRYPTION_FAILED', `Failed to decrypt: ${reason}`, 500, { cause });
    this.name = 'DecryptionError';
  }
}

/**
 * Thrown when environment configuration fails validation
 */
export class ConfigError extends GatewayError {
  constructor(issues: string[]) {
    super(
      'CONFIG_INVALID',
      `Invalid configuration: ${issues.join('; ')}`,
      500,
      { details: { issues } }
    );
    this.name = 'ConfigError';
  }
}

// =============================================================================
// UPSTREAM ERRORS
// =============================================================================

/**
 * Non-success response from the commerce API
 */
export class UpstreamHttpError extends GatewayError {
  public readonly upstreamStatus: number;

  constructor(upstreamStatus: number, message: string, body?: string) {
    super(
      'UPSTREAM_HTTP_ERROR',
      message,
      upstreamStatus,
      { details: { upstreamStatus, body } }
    );
    this.name = 'UpstreamHttpError';
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * Thrown once the retry budget is spent. The last failure is the `cause`.
 */
export class RetriesExhaustedError extends GatewayError {
  public readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(
      'RETRIES_EXHAUSTED',
      `Max retries exceeded after ${attempts} attempts: ${describeError(lastError)}`,
      502,
      { details: { attempts }, cause: lastError }
    );
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
  }
}

// =============================================================================
// AUTHENTICATION ERRORS
// =============================================================================

/**
 * Thrown when a required webhook header is absent
 */
export class MissingHeaderError extends GatewayError {
  constructor(header: string) {
    super(
      'WEBHOOK_HEADER_MISSING',
      `Missing required header: ${header}`,
      400,
      { details: { header } }
    );
    this.name = 'MissingHeaderError';
  }
}

/**
 * Thrown when the signature header is neither valid base64 nor valid hex
 */
export class SignatureDecodeError extends GatewayError {
  constructor() {
    super(
      'SIGNATURE_DECODE_FAILED',
      'Webhook signature header could not be decoded as base64 or hex',
      401
    );
    this.name = 'SignatureDecodeError';
  }
}

/**
 * Thrown when the computed HMAC does not match the signature header
 */
export class InvalidSignatureError extends GatewayError {
  constructor() {
    super('INVALID_SIGNATURE', 'Webhook signature verification failed', 401);
    this.name = 'InvalidSignatureError';
  }
}

/**
 * Thrown when the commerce API refuses to register a webhook topic
 */
export class WebhookSubscriptionError extends GatewayError {
  constructor(topic: string, cause?: unknown) {
    super(
      'WEBHOOK_SUBSCRIPTION_FAILED',
      `Failed to create webhook for topic ${topic}`,
      502,
      { details: { topic }, cause }
    );
    this.name = 'WebhookSubscriptionError';
  }
}

// =============================================================================
// CANCELLATION
// =============================================================================

/**
 * Thrown when the caller's AbortSignal fires during a wait or a retry
 */
export class OperationCancelledError extends GatewayError {
  constructor(operation: string, cause?: unknown) {
    super(
      'OPERATION_CANCELLED',
      `Operation cancelled: ${operation}`,
      499,
      { details: { operation }, cause }
    );
    this.name = 'OperationCancelledError';
  }
}

// =============================================================================
// TENANT ERRORS
// =============================================================================

/**
 * Thrown when tenant identity is required but not present
 */
export class TenantMissingError extends GatewayError {
  constructor(message = 'Tenant identity is required for this operation') {
    super('TENANT_MISSING', message, 400);
    this.name = 'TenantMissingError';
  }
}

/**
 * Thrown when no upstream credentials are stored for a tenant
 */
export class TenantNotConfiguredError extends GatewayError {
  constructor(projectId: string, environment: string) {
    super(
      'TENANT_NOT_CONFIGURED',
      `Commerce API not configured for project ${projectId} and environment ${environment}`,
      404,
      { details: { projectId, environment } }
    );
    this.name = 'TenantNotConfiguredError';
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is a GatewayError
 */
export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Check if an error means the caller gave up (our own cancellation, or a
 * platform AbortError / TimeoutError raised by an aborted signal)
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof OperationCancelledError) {
    return true;
  }
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

/**
 * Check if an error is an authentication rejection (never retried)
 */
export function isAuthenticationError(error: unknown): boolean {
  return (
    error instanceof MissingHeaderError ||
    error instanceof SignatureDecodeError ||
    error instanceof InvalidSignatureError
  );
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
