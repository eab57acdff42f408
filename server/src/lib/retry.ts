import { isAbortError } from './errors.js';

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

/**
 * Bounded retry policy shared by every provider call.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiply each delay by a random factor in [0.5, 1.5). */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: true,
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    ...overrides,
    maxAttempts: Math.max(1, overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
  };
}

type HeaderBag = Headers | Record<string, string | undefined>;

function field(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return (error as Record<string, unknown>)[key];
}

function readHeader(headers: unknown, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) return headers.get(name);
  if (typeof headers !== 'object') return null;
  const bag = headers as Exclude<HeaderBag, Headers>;
  const key = Object.keys(bag).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? bag[key] : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  for (const key of ['statusCode', 'status']) {
    const value = field(error, key);
    if (typeof value === 'number') return value;
  }
  const responseStatus = field(field(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = field(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * Timeouts, rate limits, 5xx responses and connection-level failures are
 * transient. Everything else (bad credentials, malformed requests) is not.
 */
export function isTransientError(error: unknown): boolean {
  if (isAbortError(error)) return false;

  const status = getStatusCode(error);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("Request failed with status 429")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Retry-After from error headers, in milliseconds (0 when absent), capped at 60s.
 */
export function getRetryAfterMs(error: unknown): number {
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = Number.parseFloat(retryAfter);
  if (Number.isNaN(seconds) || seconds <= 0) return 0;
  return Math.min(seconds, 60) * 1000;
}

export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const jittered = policy.jitter ? exponential * (0.5 + random()) : exponential;
  return Math.min(jittered, policy.maxDelayMs);
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new DOMException('Aborted', 'AbortError'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Overrides the default transient classifier. */
  isRetryable?: (error: unknown) => boolean;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (options.signal?.aborted || attempt >= policy.maxAttempts || !isRetryable(err)) {
        throw lastError;
      }

      // Prefer server-specified Retry-After delay; fall back to exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0 ? retryAfterMs : computeBackoffDelay(policy, attempt);
      options.onRetry?.(attempt, lastError, delay);
      await abortableSleep(delay, options.signal);
    }
  }

  throw lastError ?? new Error('withRetry: no attempts were made');
}
