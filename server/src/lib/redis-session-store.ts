/**
 * Redis-backed SessionStore.
 *
 * Key layout (every key expires at the session's expiresAt via PXAT/PEXPIREAT):
 *   session:{id}   JSON Session
 *   progress:{id}  list of JSON ProgressEvent, append-only
 *   result:{id}    JSON Result, written once (SET NX)
 *   answers:{id}   list of JSON AnswerPreview
 *   claim:{id}     SET NX marker owned by the one run of the session
 *   terminal:{id}  SET NX marker holding the first terminal status
 *
 * The NX markers make claim and terminal transitions atomic across processes;
 * the in-process session lock keeps read-modify-write sequences from the same
 * process ordered.
 */

import type { Redis } from 'ioredis';
import { z } from 'zod';
import {
  AlreadyRunningError,
  AlreadyTerminalError,
  AppError,
  InvalidTransitionError,
  NotFoundError,
  StoreUnavailableError,
} from './errors.js';
import logger from './logger.js';
import { withSessionLock } from './session-lock.js';
import {
  answerPreviewSchema,
  assertClaimable,
  assertTransition,
  clampProgress,
  isTerminalStatus,
  newSession,
  progressEventSchema,
  resultSchema,
  sessionSchema,
  toLatestProgress,
  type AnswerPreview,
  type LatestProgress,
  type NewProgressEvent,
  type ProgressEvent,
  type Result,
  type Session,
  type SessionStatus,
  type SessionStore,
} from './session-store.js';

export const sessionKeys = (sessionId: string) => ({
  session: `session:${sessionId}`,
  progress: `progress:${sessionId}`,
  result: `result:${sessionId}`,
  answers: `answers:${sessionId}`,
  claim: `claim:${sessionId}`,
  terminal: `terminal:${sessionId}`,
});

const terminalStatusSchema = z.enum(['COMPLETE', 'ERROR']);

function decode<S extends z.ZodTypeAny>(schema: S, raw: string, key: string): z.infer<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StoreUnavailableError(`decode ${key}`, err);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new StoreUnavailableError(`decode ${key}`, new Error(result.error.issues[0]?.message ?? 'invalid record'));
  }
  return result.data;
}

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = 3600,
  ) {}

  /** Domain errors pass through; any other failure means Redis is unusable. */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      logger.error({ operation, err: err instanceof Error ? err.message : String(err) }, 'Redis session store command failed');
      throw new StoreUnavailableError(operation, err);
    }
  }

  /**
   * The terminal marker is authoritative: a record left at an earlier status
   * by a late write from another process still reads as terminal.
   */
  private async load(sessionId: string): Promise<Session> {
    const keys = sessionKeys(sessionId);
    const raw = await this.redis.get(keys.session);
    if (raw === null) throw new NotFoundError(sessionId);
    const session = decode(sessionSchema, raw, keys.session);
    const terminal = terminalStatusSchema.safeParse(await this.redis.get(keys.terminal));
    return terminal.success ? { ...session, status: terminal.data } : session;
  }

  /** Overwrites the session record without touching its deadline. */
  private async save(session: Session): Promise<void> {
    const written = await this.redis.set(
      sessionKeys(session.id).session,
      JSON.stringify(session),
      'PXAT',
      Date.parse(session.expiresAt),
      'XX',
    );
    if (written === null) throw new NotFoundError(session.id);
  }

  private async lastEvent(sessionId: string): Promise<ProgressEvent | undefined> {
    const key = sessionKeys(sessionId).progress;
    const raw = await this.redis.lindex(key, -1);
    return raw === null ? undefined : decode(progressEventSchema, raw, key);
  }

  private async appendToList(key: string, value: string, expiresAtMs: number): Promise<void> {
    const replies = await this.redis.multi().rpush(key, value).pexpireat(key, expiresAtMs).exec();
    if (!replies) throw new Error(`transaction on ${key} was discarded`);
    for (const [err] of replies) {
      if (err) throw err;
    }
  }

  /** Takes the claim marker and moves the record to PROCESSING. */
  private async markProcessing(session: Session): Promise<Session> {
    const keys = sessionKeys(session.id);
    const claimed = await this.redis.set(keys.claim, 'PROCESSING', 'PXAT', Date.parse(session.expiresAt), 'NX');
    if (claimed === null) {
      // Another process claimed between our read and the marker write.
      const terminal = await this.redis.get(keys.terminal);
      if (terminal) throw new AlreadyTerminalError(session.id, terminal);
      throw new AlreadyRunningError(session.id);
    }
    // A PENDING -> ERROR from another process takes only the terminal marker.
    const terminal = await this.redis.get(keys.terminal);
    if (terminal) {
      await this.redis.del(keys.claim);
      throw new AlreadyTerminalError(session.id, terminal);
    }
    const updated: Session = { ...session, status: 'PROCESSING' };
    await this.save(updated);
    return updated;
  }

  async create(language: string, metadata: Record<string, unknown> = {}): Promise<Session> {
    return this.run('create', async () => {
      const session = newSession(language, metadata, this.ttlSeconds);
      await this.redis.set(
        sessionKeys(session.id).session,
        JSON.stringify(session),
        'PXAT',
        Date.parse(session.expiresAt),
        'NX',
      );
      return session;
    });
  }

  async get(sessionId: string): Promise<Session> {
    return this.run('get', () => this.load(sessionId));
  }

  async setStatus(sessionId: string, status: SessionStatus): Promise<Session> {
    return this.run('setStatus', () => withSessionLock(sessionId, async () => {
      const session = await this.load(sessionId);
      assertTransition(session, status);
      if (status === 'PROCESSING') return this.markProcessing(session);
      const keys = sessionKeys(sessionId);
      const expiresAtMs = Date.parse(session.expiresAt);

      if (status === 'COMPLETE' && (await this.redis.exists(keys.result)) === 0) {
        throw new InvalidTransitionError(sessionId, session.status, 'COMPLETE without a stored result');
      }
      if (isTerminalStatus(status)) {
        const marked = await this.redis.set(keys.terminal, status, 'PXAT', expiresAtMs, 'NX');
        if (marked === null) {
          const winner = await this.redis.get(keys.terminal);
          throw new InvalidTransitionError(sessionId, winner ?? session.status, status);
        }
      }

      const updated: Session = { ...session, status };
      await this.save(updated);
      return updated;
    }));
  }

  async claim(sessionId: string): Promise<Session> {
    return this.run('claim', () => withSessionLock(sessionId, async () => {
      const session = await this.load(sessionId);
      assertClaimable(session);
      return this.markProcessing(session);
    }));
  }

  async appendProgress(event: NewProgressEvent): Promise<ProgressEvent> {
    return this.run('appendProgress', () => withSessionLock(event.sessionId, async () => {
      const session = await this.load(event.sessionId);
      const stored = clampProgress(event, await this.lastEvent(event.sessionId));
      await this.appendToList(sessionKeys(session.id).progress, JSON.stringify(stored), Date.parse(session.expiresAt));
      return stored;
    }));
  }

  async listProgress(sessionId: string): Promise<ProgressEvent[]> {
    return this.run('listProgress', async () => {
      await this.load(sessionId);
      const key = sessionKeys(sessionId).progress;
      const raw = await this.redis.lrange(key, 0, -1);
      return raw.map((item) => decode(progressEventSchema, item, key));
    });
  }

  async latestProgress(sessionId: string): Promise<LatestProgress> {
    return this.run('latestProgress', async () => {
      const session = await this.load(sessionId);
      return toLatestProgress(session, await this.lastEvent(sessionId));
    });
  }

  async storeResult(sessionId: string, result: Result): Promise<void> {
    await this.run('storeResult', () => withSessionLock(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.status !== 'PROCESSING') {
        throw new InvalidTransitionError(sessionId, session.status, 'result');
      }
      const written = await this.redis.set(
        sessionKeys(sessionId).result,
        JSON.stringify(result),
        'PXAT',
        Date.parse(session.expiresAt),
        'NX',
      );
      if (written === null) {
        throw new InvalidTransitionError(sessionId, session.status, 'second result');
      }
    }));
  }

  async getResult(sessionId: string): Promise<Result | null> {
    return this.run('getResult', async () => {
      await this.load(sessionId);
      const key = sessionKeys(sessionId).result;
      const raw = await this.redis.get(key);
      return raw === null ? null : decode(resultSchema, raw, key);
    });
  }

  async recordAnswer(sessionId: string, preview: AnswerPreview): Promise<void> {
    await this.run('recordAnswer', () => withSessionLock(sessionId, async () => {
      const session = await this.load(sessionId);
      await this.appendToList(sessionKeys(sessionId).answers, JSON.stringify(preview), Date.parse(session.expiresAt));
    }));
  }

  async listAnswers(sessionId: string): Promise<AnswerPreview[]> {
    return this.run('listAnswers', async () => {
      await this.load(sessionId);
      const key = sessionKeys(sessionId).answers;
      const raw = await this.redis.lrange(key, 0, -1);
      return raw.map((item) => decode(answerPreviewSchema, item, key));
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.run('delete', async () => {
      const removed = await this.redis.del(...Object.values(sessionKeys(sessionId)));
      return removed > 0;
    });
  }
}
