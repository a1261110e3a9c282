import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createRetryPolicy } from './config.js';
import { OperationCancelledError, RetriesExhaustedError, UpstreamHttpError } from './errors.js';
import { backoffDelay, executeWithRetry, isRetryableError, isTransientNetworkError } from './retry.js';
import type { AttemptResult } from './types.js';

function networkError(code: string): TypeError {
  return new TypeError('fetch failed', { cause: Object.assign(new Error('socket'), { code }) });
}

function statuses(...sequence: number[]) {
  let index = 0;
  return vi.fn(async (_attempt: number): Promise<AttemptResult<string>> => {
    const status = sequence[Math.min(index, sequence.length - 1)] ?? 200;
    index++;
    return { status, value: `status-${status}` };
  });
}

const fastPolicy = createRetryPolicy({ maxRetries: 3, initialDelayMs: 1, maxDelayMs: 4 });

describe('backoffDelay', () => {
  it('doubles from the initial delay', () => {
    const policy = createRetryPolicy();

    expect(backoffDelay(1, policy)).toBe(100);
    expect(backoffDelay(2, policy)).toBe(200);
    expect(backoffDelay(3, policy)).toBe(400);
  });

  it('caps at maxDelayMs', () => {
    const policy = createRetryPolicy({ initialDelayMs: 1_000, backoffFactor: 10, maxDelayMs: 5_000 });

    expect(backoffDelay(1, policy)).toBe(1_000);
    expect(backoffDelay(2, policy)).toBe(5_000);
    expect(backoffDelay(6, policy)).toBe(5_000);
  });
});

describe('error classification', () => {
  it('retries retryable upstream statuses only', () => {
    const policy = createRetryPolicy();

    expect(isRetryableError(new UpstreamHttpError(503, 'down'), policy)).toBe(true);
    expect(isRetryableError(new UpstreamHttpError(404, 'missing'), policy)).toBe(false);
  });

  it('finds transient codes in the cause chain', () => {
    expect(isTransientNetworkError(networkError('ECONNRESET'))).toBe(true);
    expect(isTransientNetworkError(networkError('EACCES'))).toBe(false);
    expect(isTransientNetworkError(new Error('plain'))).toBe(false);
  });

  it('never retries cancellation', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    expect(isRetryableError(abort)).toBe(false);
    expect(isRetryableError(new OperationCancelledError('wait'))).toBe(false);
  });
});

describe('executeWithRetry', () => {
  it('returns the first successful result', async () => {
    const attempt = statuses(200);

    const result = await executeWithRetry(attempt, fastPolicy);

    expect(result).toEqual({ status: 200, value: 'status-200' });
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('retries retryable statuses until one succeeds', async () => {
    const attempt = statuses(503, 429, 200);

    const result = await executeWithRetry(attempt, fastPolicy);

    expect(result.status).toBe(200);
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(attempt.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
  });

  it('returns a non-retryable status without retrying', async () => {
    const attempt = statuses(404);

    const result = await executeWithRetry(attempt, fastPolicy);

    expect(result).toEqual({ status: 404, value: 'status-404' });
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('makes maxRetries + 1 attempts before giving up', async () => {
    const attempt = statuses(503);
    const policy = createRetryPolicy({ maxRetries: 2, initialDelayMs: 1, maxDelayMs: 2 });

    const error = await executeWithRetry(attempt, policy).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(attempt).toHaveBeenCalledTimes(3);
    if (error instanceof RetriesExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.cause).toBeInstanceOf(UpstreamHttpError);
      expect(error.message).toBe(
        'Max retries exceeded after 3 attempts: Commerce API responded with retryable status 503'
      );
    }
  });

  it('makes exactly one attempt with maxRetries 0', async () => {
    const attempt = statuses(500);

    await expect(executeWithRetry(attempt, createRetryPolicy({ maxRetries: 0 }))).rejects.toThrow(
      RetriesExhaustedError
    );
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('rethrows non-retryable errors immediately', async () => {
    const failure = new Error('bad request body');
    const attempt = vi.fn(async (): Promise<AttemptResult<string>> => {
      throw failure;
    });

    await expect(executeWithRetry(attempt, fastPolicy)).rejects.toBe(failure);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('retries transient network errors', async () => {
    const attempt = vi
      .fn<(n: number) => Promise<AttemptResult<string>>>()
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockResolvedValueOnce({ status: 200, value: 'ok' });

    const result = await executeWithRetry(attempt, fastPolicy);

    expect(result.value).toBe('ok');
    expect(attempt).toHaveBeenCalledTimes(2);
  });

  it('turns an AbortError from the attempt into a cancellation', async () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    const attempt = vi.fn(async (): Promise<AttemptResult<string>> => {
      throw abort;
    });

    const error = await executeWithRetry(attempt, fastPolicy, { operation: 'GET /products.json' }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(attempt).toHaveBeenCalledTimes(1);
    if (error instanceof OperationCancelledError) {
      expect(error.message).toBe('Operation cancelled: GET /products.json');
      expect(error.cause).toBe(abort);
    }
  });

  it('makes no attempt when the signal is already aborted', async () => {
    const attempt = statuses(200);
    const controller = new AbortController();
    controller.abort();

    await expect(executeWithRetry(attempt, fastPolicy, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(attempt).not.toHaveBeenCalled();
  });

  it('succeeds on the last allowed attempt after the full backoff', async () => {
    const attempt = statuses(503, 503, 503, 200);
    const policy = createRetryPolicy({ maxRetries: 3, initialDelayMs: 10, backoffFactor: 2, maxDelayMs: 1_000 });

    const started = performance.now();
    const result = await executeWithRetry(attempt, policy);
    const elapsed = performance.now() - started;

    expect(result.status).toBe(200);
    expect(attempt).toHaveBeenCalledTimes(4);
    // 10 + 20 + 40
    expect(elapsed).toBeGreaterThanOrEqual(68);
    expect(elapsed).toBeLessThan(70 + 250);
  });

  describe('backoff timing', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('waits the backoff delay before each retry', async () => {
      const attempt = statuses(500, 500, 200);
      const policy = createRetryPolicy({ maxRetries: 3, initialDelayMs: 20, backoffFactor: 2, maxDelayMs: 1_000 });

      const pending = executeWithRetry(attempt, policy);

      await vi.advanceTimersByTimeAsync(0);
      expect(attempt).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(19);
      expect(attempt).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(attempt).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(39);
      expect(attempt).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(attempt).toHaveBeenCalledTimes(3);

      await expect(pending).resolves.toEqual({ status: 200, value: 'status-200' });
    });

    it('stops during backoff when cancelled', async () => {
      const attempt = statuses(503);
      const controller = new AbortController();
      const policy = createRetryPolicy({ initialDelayMs: 1_000, maxDelayMs: 1_000 });

      const pending = executeWithRetry(attempt, policy, { signal: controller.signal });
      const assertion = expect(pending).rejects.toBeInstanceOf(OperationCancelledError);

      await vi.advanceTimersByTimeAsync(500);
      controller.abort();
      await assertion;

      await vi.advanceTimersByTimeAsync(5_000);
      expect(attempt).toHaveBeenCalledTimes(1);
    });
  });
});
