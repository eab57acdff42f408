import logger from './logger.js';

const MAX_WAIT_MS = 30_000;

/** Tail of the promise chain per session; each writer waits on the previous one. */
const tails = new Map<string, Promise<void>>();

/**
 * Number of sessions with a queued or running critical section.
 */
export function activeLockCount(): number {
  return tails.size;
}

/**
 * Executes fn() while holding the in-process lock for a session.
 *
 * Writers for the same session run strictly one after another in arrival
 * order; different sessions never wait on each other. A holder that runs
 * longer than MAX_WAIT_MS is logged but not preempted.
 */
export async function withSessionLock<T>(
  sessionId: string,
  fn: () => Promise<T>,
): Promise<T> {
  const previous = tails.get(sessionId) ?? Promise.resolve();
  let release: () => void = () => undefined;
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  tails.set(sessionId, tail);

  const waitStarted = Date.now();
  const slowTimer = setTimeout(() => {
    logger.warn({ sessionId, waitedMs: Date.now() - waitStarted }, 'Waiting unusually long for session lock');
  }, MAX_WAIT_MS);
  slowTimer.unref?.();

  try {
    await previous;
    clearTimeout(slowTimer);
    return await fn();
  } finally {
    clearTimeout(slowTimer);
    release();
    if (tails.get(sessionId) === tail) tails.delete(sessionId);
  }
}
