/**
 * Retry Executor
 *
 * Retries a single safe-to-repeat call with capped exponential backoff.
 *
 * - Retryable: statuses in the policy (429, 5xx by default) and transient
 *   network failures (timeouts, resets)
 * - Never retried: cancellation/deadline errors and any other error
 * - Delay starts at initialDelayMs, is multiplied by backoffFactor after each
 *   wait and capped at maxDelayMs
 */

import { DEFAULT_RETRY_POLICY } from './config.js';
import {
  OperationCancelledError,
  RetriesExhaustedError,
  UpstreamHttpError,
  isCancellationError,
} from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import { sleep, throwIfAborted } from './sleep.js';
import type { AttemptResult, RetryPolicy } from './types.js';

export interface RetryOptions {
  signal?: AbortSignal;
  logger?: Logger;
  /** Included in log lines */
  operation?: string;
}

export type AttemptFn<T> = (attempt: number) => Promise<AttemptResult<T>>;

/** Error codes Node and undici use for transient network failures */
const TRANSIENT_NETWORK_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Whether a thrown error is worth another attempt under this policy
 */
export function isRetryableError(error: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): boolean {
  if (isCancellationError(error)) {
    return false;
  }

  if (error instanceof UpstreamHttpError) {
    return policy.retryableStatuses.includes(error.upstreamStatus);
  }

  return isTransientNetworkError(error);
}

/**
 * Walks the `cause` chain looking for a transient network error code
 * (fetch wraps socket errors in a TypeError)
 */
export function isTransientNetworkError(error: unknown): boolean {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }

  return false;
}

/**
 * Backoff delay before retry number `retry` (1-based)
 */
export function backoffDelay(retry: number, policy: RetryPolicy): number {
  let delay = policy.initialDelayMs;
  for (let i = 1; i < retry; i++) {
    delay = Math.min(delay * policy.backoffFactor, policy.maxDelayMs);
  }
  return Math.min(delay, policy.maxDelayMs);
}

// =============================================================================
// EXECUTOR
// =============================================================================

/**
 * Run `attemptFn` until it returns a non-retryable status, throws a
 * non-retryable error, or the retry budget runs out.
 *
 * A result whose status is not retryable is returned as-is, even when it is
 * not a 2xx; the caller decides what a 404 means.
 *
 * @throws RetriesExhaustedError with the last failure as `cause`
 * @throws OperationCancelledError when the signal aborts
 */
export async function executeWithRetry<T>(
  attemptFn: AttemptFn<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<AttemptResult<T>> {
  const { signal, operation = 'upstream call' } = options;
  const logger = componentLogger('retry', options.logger);

  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = backoffDelay(attempt, policy);
      logger.warn({ operation, attempt, delayMs, err: lastError }, 'Retrying commerce API call');
      await sleep(delayMs, signal, operation);
    }

    throwIfAborted(signal, operation);

    try {
      const result = await attemptFn(attempt);

      if (!policy.retryableStatuses.includes(result.status)) {
        return result;
      }

      lastError = new UpstreamHttpError(
        result.status,
        `Commerce API responded with retryable status ${result.status}`
      );
    } catch (error) {
      if (signal?.aborted || isCancellationError(error)) {
        throw error instanceof OperationCancelledError
          ? error
          : new OperationCancelledError(operation, error);
      }
      if (!isRetryableError(error, policy)) {
        throw error;
      }
      lastError = error;
    }
  }

  const attempts = policy.maxRetries + 1;
  logger.error({ operation, attempts, err: lastError }, 'All retry attempts exhausted');
  throw new RetriesExhaustedError(attempts, lastError);
}
