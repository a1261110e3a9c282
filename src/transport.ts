/**
 * Upstream Transport
 *
 * Sends one HTTP request to the commerce API with per-account throttling and
 * retries. Every attempt (including retries) takes a rate-limit token, and
 * every response reconciles the bucket from the call-limit header.
 */

import { DEFAULT_RETRY_POLICY } from './config.js';
import { UPSTREAM_HEADERS } from './headers.js';
import { componentLogger, type Logger } from './logger.js';
import { RateLimiter } from './rate-limiter.js';
import { executeWithRetry } from './retry.js';
import type { RetryPolicy } from './types.js';

export type FetchFn = typeof fetch;

export interface UpstreamRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface UpstreamResponse {
  status: number;
  headers: Headers;
  body: string;
}

export interface TransportOptions {
  rateLimiter: RateLimiter;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

export class UpstreamTransport {
  private readonly rateLimiter: RateLimiter;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;

  constructor(options: TransportOptions) {
    this.rateLimiter = options.rateLimiter;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.logger = componentLogger('transport', options.logger);
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Send a request on behalf of an upstream account.
   *
   * Resolves with the first response whose status is not retryable (which
   * may still be a 4xx); rejects with RetriesExhaustedError or
   * OperationCancelledError.
   */
  async send(accountKey: string, request: UpstreamRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
    const operation = `${request.method} ${new URL(request.url).pathname}`;

    const { value } = await executeWithRetry<UpstreamResponse>(
      async (attempt) => {
        await this.rateLimiter.wait(accountKey, signal);

        const response = await this.fetchFn(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
          signal,
        });

        this.rateLimiter.updateFromHeader(accountKey, response.headers.get(UPSTREAM_HEADERS.CALL_LIMIT));

        const body = await response.text();
        this.logger.debug({ accountKey, operation, attempt, status: response.status }, 'Commerce API responded');

        return {
          status: response.status,
          value: { status: response.status, headers: response.headers, body },
        };
      },
      this.retryPolicy,
      { signal, logger: this.logger, operation }
    );

    return value;
  }
}
