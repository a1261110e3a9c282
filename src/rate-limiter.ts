/**
 * Rate Limiter
 *
 * Per-account token bucket for outbound commerce API calls. The provider
 * allows 40 requests per store per minute (leaky bucket); we default to 35 to
 * absorb clock skew and concurrent callers.
 *
 * Algorithm: lazy linear refill
 * - Tokens accrue at maxTokens / window, computed on each access
 * - No timers run for idle buckets
 * - Response headers ("used/limit") overwrite the local estimate
 *
 * Bucket reads and writes never span an `await`, so each refill-and-take is
 * exclusive for its bucket while other buckets proceed independently.
 */

import { DEFAULT_RATE_LIMIT } from './config.js';
import { parseCallLimit } from './headers.js';
import { componentLogger, type Logger } from './logger.js';
import { sleep, throwIfAborted } from './sleep.js';
import type { RateLimitConfig } from './types.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Floor for a single wait so an empty bucket is never polled in a tight loop */
export const MIN_WAIT_MS = 100;

export interface RateLimiterOptions extends Partial<RateLimitConfig> {
  logger?: Logger;
  /** Clock override for tests */
  now?: () => number;
}

export interface BucketSnapshot {
  tokens: number;
  maxTokens: number;
  windowMs: number;
  lastRefill: number;
}

// =============================================================================
// BUCKET
// =============================================================================

class RateBucket {
  private tokens: number;
  private maxTokens: number;
  private lastRefill: number;

  constructor(
    maxTokens: number,
    private readonly windowMs: number,
    private readonly now: () => number
  ) {
    this.tokens = maxTokens;
    this.maxTokens = maxTokens;
    this.lastRefill = now();
  }

  /**
   * Take one token if available. Returns 0 on success, otherwise the time in
   * ms until the next whole token accrues.
   */
  tryTake(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    return Math.ceil((1 - this.tokens) / this.refillPerMs());
  }

  reconcile(used: number, limit: number): void {
    this.refill();
    this.maxTokens = limit;
    this.tokens = Math.max(0, limit - used);
    if (this.tokens === 0) {
      this.lastRefill = this.now();
    }
  }

  remaining(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  snapshot(): BucketSnapshot {
    this.refill();
    return {
      tokens: this.tokens,
      maxTokens: this.maxTokens,
      windowMs: this.windowMs,
      lastRefill: this.lastRefill,
    };
  }

  private refillPerMs(): number {
    return this.maxTokens / this.windowMs;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;

    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillPerMs());
    this.lastRefill = now;
  }
}

// =============================================================================
// LIMITER
// =============================================================================

export class RateLimiter {
  private readonly buckets = new Map<string, RateBucket>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: RateLimiterOptions = {}) {
    const {
      maxRequests = DEFAULT_RATE_LIMIT.maxRequests,
      windowMs = DEFAULT_RATE_LIMIT.windowMs,
      now = Date.now,
    } = options;

    if (maxRequests <= 0 || windowMs <= 0) {
      throw new RangeError('maxRequests and windowMs must be positive');
    }

    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.now = now;
    this.logger = componentLogger('rate-limiter', options.logger);
  }

  /**
   * Wait until a request may be made for the account.
   *
   * Each time the bucket is found empty, sleeps once for the time until the
   * next token (at least MIN_WAIT_MS) and then rechecks.
   *
   * @throws OperationCancelledError if the signal aborts while waiting
   */
  async wait(accountKey: string, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'rate-limit wait');
    const bucket = this.getBucket(accountKey);

    for (;;) {
      const waitMs = bucket.tryTake();
      if (waitMs === 0) return;

      const delayMs = Math.max(MIN_WAIT_MS, waitMs);
      this.logger.debug({ accountKey, delayMs }, 'Rate limit reached, waiting for token');
      await sleep(delayMs, signal, 'rate-limit wait');
    }
  }

  /**
   * Overwrite the local estimate with the provider's authoritative counter
   */
  updateFromResponse(accountKey: string, used: number, limit: number): void {
    if (!Number.isFinite(used) || !Number.isFinite(limit) || used < 0 || limit <= 0) {
      this.logger.debug({ accountKey, used, limit }, 'Ignoring invalid rate-limit metadata');
      return;
    }
    this.getBucket(accountKey).reconcile(used, limit);
  }

  /**
   * Reconcile from a "used/limit" header value; malformed values are ignored
   */
  updateFromHeader(accountKey: string, headerValue: string | null | undefined): void {
    const parsed = parseCallLimit(headerValue);
    if (!parsed) {
      if (headerValue) {
        this.logger.debug({ accountKey, headerValue }, 'Ignoring malformed call-limit header');
      }
      return;
    }
    this.updateFromResponse(accountKey, parsed.used, parsed.limit);
  }

  /**
   * Whole tokens currently available for an account (for monitoring)
   */
  getRemainingTokens(accountKey: string): number {
    return this.getBucket(accountKey).remaining();
  }

  /**
   * Point-in-time bucket state, or undefined if the account was never seen
   */
  inspect(accountKey: string): BucketSnapshot | undefined {
    return this.buckets.get(accountKey)?.snapshot();
  }

  private getBucket(accountKey: string): RateBucket {
    let bucket = this.buckets.get(accountKey);
    if (!bucket) {
      bucket = new RateBucket(this.maxRequests, this.windowMs, this.now);
      this.buckets.set(accountKey, bucket);
    }
    return bucket;
  }
}
