import { createRequire } from 'node:module';
import logger from './logger.js';

type Scope = {
  setExtra: (key: string, value: unknown) => void;
  setTag: (key: string, value: string) => void;
};

type SentryLike = {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: Record<string, unknown>) => Record<string, unknown> | null;
  }) => void;
  withScope: (callback: (scope: Scope) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
};

const require = createRequire(import.meta.url);
let sentryModule: SentryLike | null | undefined;

function getSentry(): SentryLike | null {
  if (sentryModule !== undefined) return sentryModule;
  try {
    const loaded: unknown = require('@sentry/node');
    const candidate = (loaded ?? {}) as Partial<SentryLike>;
    sentryModule = typeof candidate.init === 'function'
      && typeof candidate.withScope === 'function'
      && typeof candidate.captureException === 'function'
      && typeof candidate.flush === 'function'
      ? candidate as SentryLike
      : null;
  } catch (err) {
    logger.debug({ err: err instanceof Error ? err.message : String(err) }, '@sentry/node could not be loaded');
    sentryModule = null;
  }
  return sentryModule;
}

const SENSITIVE_KEY_FRAGMENTS = ['key', 'token', 'secret', 'authorization', 'dsn'];

function scrub(record: Record<string, unknown>): void {
  for (const key of Object.keys(record)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment))) {
      record[key] = '[REDACTED]';
    }
  }
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return value && typeof value === 'object' && !Array.isArray(value)
    ? value as Record<string, unknown>
    : null;
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }
  const Sentry = getSentry();
  if (!Sentry) {
    logger.warn('Sentry requested but @sentry/node is not installed, continuing without Sentry');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend(event) {
      const extra = asRecord(event.extra);
      if (extra) scrub(extra);
      if (Array.isArray(event.breadcrumbs)) {
        for (const crumb of event.breadcrumbs) {
          const data = asRecord(asRecord(crumb)?.data);
          if (data) scrub(data);
        }
      }
      return event;
    },
  });

  logger.info('Sentry initialized');
}

/**
 * Reports an unexpected error. A `sessionId` in the context becomes a tag so
 * events for the same job group together.
 */
export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (key === 'sessionId' && typeof value === 'string') scope.setTag('session_id', value);
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed during shutdown');
  }
}
