/**
 * Gateway Configuration
 *
 * Environment-driven settings, validated with zod. Defaults follow the
 * commerce API's published limits with headroom.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { RateLimitConfig, RetryPolicy } from './types.js';

// =============================================================================
// DEFAULTS
// =============================================================================

/** Provider allows 40 requests/minute per store; stay under it */
export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxRequests: 35,
  windowMs: 60_000,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 5_000,
  backoffFactor: 2,
  retryableStatuses: Object.freeze([429, 500, 502, 503, 504]),
});

export const DEFAULT_API_VERSION = '2024-01';

// =============================================================================
// SCHEMA
// =============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  GATEWAY_ENCRYPTION_KEY: z
    .string({ required_error: 'GATEWAY_ENCRYPTION_KEY is required' })
    .refine((key) => Buffer.byteLength(key, 'utf8') === 32, {
      message: 'GATEWAY_ENCRYPTION_KEY must be exactly 32 bytes',
    }),
  GATEWAY_RATE_LIMIT_MAX_REQUESTS: positiveInt(DEFAULT_RATE_LIMIT.maxRequests),
  GATEWAY_RATE_LIMIT_WINDOW_MS: positiveInt(DEFAULT_RATE_LIMIT.windowMs),
  GATEWAY_RETRY_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
  GATEWAY_RETRY_INITIAL_DELAY_MS: positiveInt(DEFAULT_RETRY_POLICY.initialDelayMs),
  GATEWAY_RETRY_MAX_DELAY_MS: positiveInt(DEFAULT_RETRY_POLICY.maxDelayMs),
  GATEWAY_RETRY_BACKOFF_FACTOR: z.coerce.number().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
  GATEWAY_API_VERSION: z.string().regex(/^\d{4}-\d{2}$/).default(DEFAULT_API_VERSION),
  GATEWAY_APP_URL: z.string().url().optional(),
  GATEWAY_DEFAULT_ENVIRONMENT: z.string().min(1).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

// =============================================================================
// CONFIG
// =============================================================================

export interface GatewayConfig {
  encryptionKey: string;
  rateLimit: RateLimitConfig;
  retry: RetryPolicy;
  apiVersion: string;
  appUrl?: string;
  defaultEnvironment: string;
  logLevel: string;
}

/**
 * Load and validate configuration from environment variables
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  if (values.GATEWAY_RETRY_MAX_DELAY_MS < values.GATEWAY_RETRY_INITIAL_DELAY_MS) {
    throw new ConfigError([
      'GATEWAY_RETRY_MAX_DELAY_MS: must be greater than or equal to GATEWAY_RETRY_INITIAL_DELAY_MS',
    ]);
  }

  return {
    encryptionKey: values.GATEWAY_ENCRYPTION_KEY,
    rateLimit: {
      maxRequests: values.GATEWAY_RATE_LIMIT_MAX_REQUESTS,
      windowMs: values.GATEWAY_RATE_LIMIT_WINDOW_MS,
    },
    retry: createRetryPolicy({
      maxRetries: values.GATEWAY_RETRY_MAX_RETRIES,
      initialDelayMs: values.GATEWAY_RETRY_INITIAL_DELAY_MS,
      maxDelayMs: values.GATEWAY_RETRY_MAX_DELAY_MS,
      backoffFactor: values.GATEWAY_RETRY_BACKOFF_FACTOR,
    }),
    apiVersion: values.GATEWAY_API_VERSION,
    appUrl: values.GATEWAY_APP_URL,
    defaultEnvironment: values.GATEWAY_DEFAULT_ENVIRONMENT,
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Build a frozen retry policy from partial overrides
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return Object.freeze({
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
    retryableStatuses: Object.freeze([
      ...(overrides.retryableStatuses ?? DEFAULT_RETRY_POLICY.retryableStatuses),
    ]),
  });
}
