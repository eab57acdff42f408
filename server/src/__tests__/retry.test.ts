import { describe, it, expect, vi } from 'vitest';
import { ProviderRequestError } from '../lib/errors.js';
import {
  computeBackoffDelay,
  createRetryPolicy,
  getRetryAfterMs,
  isTransientError,
  withRetry,
  type RetryPolicy,
} from '../lib/retry.js';

const FAST: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: false };

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw Object.assign(new Error('temporary outage'), { status: 503 });
      }
      return 'ok';
    }, FAST);

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        throw Object.assign(new Error('socket closed'), { code: 'ECONNRESET' });
      }
      return 42;
    }, { ...FAST, maxAttempts: 2 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error('rate limited'), {
          response: { status: 429, headers: new Headers([['retry-after', '0.001']]) },
        });
      }
      return 'done';
    }, { ...FAST, maxAttempts: 2 }, { onRetry });

    expect(result).toBe('done');
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[2]).toBe(1);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new ProviderRequestError('openai', 401, 'openai API error 401: invalid key');
    }, FAST)).rejects.toThrow('openai API error 401: invalid key');
    expect(attempts).toBe(1);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new ProviderRequestError('gemini', 503, `overloaded ${attempts}`);
    }, FAST)).rejects.toThrow('overloaded 3');
    expect(attempts).toBe(3);
  });

  it('stops waiting when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const pending = withRetry(async () => {
      attempts += 1;
      throw new ProviderRequestError('gemini', 503, 'unavailable');
    }, { maxAttempts: 3, baseDelayMs: 10_000, maxDelayMs: 10_000, jitter: false }, { signal: controller.signal });

    await Promise.resolve();
    controller.abort();
    await expect(pending).rejects.toThrow();
    expect(attempts).toBe(1);
  });
});

describe('isTransientError', () => {
  it('classifies provider status codes', () => {
    expect(isTransientError(new ProviderRequestError('openai', 429, 'slow down'))).toBe(true);
    expect(isTransientError(new ProviderRequestError('openai', 500, 'boom'))).toBe(true);
    expect(isTransientError(new ProviderRequestError('openai', 400, 'bad request'))).toBe(false);
  });

  it('treats per-call timeouts as transient', () => {
    expect(isTransientError(new ProviderRequestError('gemini', null, 'gemini request timed out after 10ms'))).toBe(true);
  });

  it('never retries aborts', () => {
    expect(isTransientError(new DOMException('stopped', 'AbortError'))).toBe(false);
  });

  it('reads status numbers embedded in messages', () => {
    expect(isTransientError(new Error('Request failed with status 502'))).toBe(true);
    expect(isTransientError(new Error('answer was empty'))).toBe(false);
  });
});

describe('getRetryAfterMs', () => {
  it('reads the header from a ProviderRequestError', () => {
    const err = new ProviderRequestError('perplexity', 429, 'limited', { 'retry-after': '2' });
    expect(getRetryAfterMs(err)).toBe(2000);
  });

  it('caps the delay at 60 seconds and ignores junk', () => {
    expect(getRetryAfterMs(new ProviderRequestError('openai', 429, 'x', { 'Retry-After': '600' }))).toBe(60_000);
    expect(getRetryAfterMs(new ProviderRequestError('openai', 429, 'x', { 'retry-after': 'soon' }))).toBe(0);
    expect(getRetryAfterMs(new Error('no headers'))).toBe(0);
  });
});

describe('computeBackoffDelay', () => {
  const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, jitter: false };

  it('doubles per attempt up to the cap', () => {
    expect(computeBackoffDelay(policy, 1)).toBe(100);
    expect(computeBackoffDelay(policy, 2)).toBe(200);
    expect(computeBackoffDelay(policy, 3)).toBe(400);
    expect(computeBackoffDelay(policy, 5)).toBe(1000);
  });

  it('applies jitter in [0.5, 1.5)', () => {
    const jittered = { ...policy, jitter: true };
    expect(computeBackoffDelay(jittered, 2, () => 0)).toBe(100);
    expect(computeBackoffDelay(jittered, 2, () => 0.5)).toBe(200);
  });
});

describe('createRetryPolicy', () => {
  it('keeps at least one attempt', () => {
    expect(createRetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
    expect(createRetryPolicy().maxAttempts).toBe(3);
  });
});
