/**
 * Durable job queue. Delivery is at-least-once: a job stays pending until it
 * is acked, and the Redis implementation hands idle pending jobs to another
 * consumer. Consumers must tolerate duplicates (the session claim rejects them).
 *
 * Redis layout:
 *   - One stream `answer-jobs`, entries carry a single `payload` field (JSON)
 *   - One consumer group `answer-workers`; each process is one consumer
 *   - XACK + XDEL after handling; XAUTOCLAIM moves entries idle longer than
 *     the reclaim window to the asking consumer
 */

import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import type { Redis } from 'ioredis';
import logger from '../lib/logger.js';
import type { JobPayload } from './job-payload.js';

export interface QueuedJob {
  id: string;
  /** Raw payload; the worker validates it. */
  payload: unknown;
  /** True when the job was handed out before and never acked. */
  redelivered: boolean;
}

export interface JobQueue {
  enqueue(payload: JobPayload): Promise<string>;
  /** Next job, or null when the signal aborts or the queue closes. */
  dequeue(signal?: AbortSignal): Promise<QueuedJob | null>;
  ack(job: QueuedJob): Promise<void>;
  close(): Promise<void>;
}

// ─── In-memory queue ─────────────────────────────────────────────────

export class MemoryJobQueue implements JobQueue {
  private readonly ready: QueuedJob[] = [];
  private readonly pending = new Map<string, QueuedJob>();
  private readonly waiters: Array<(job: QueuedJob | null) => void> = [];
  private closed = false;

  async enqueue(payload: JobPayload): Promise<string> {
    return this.push(payload);
  }

  /** Accepts any payload; used to simulate a corrupted entry. */
  push(payload: unknown): string {
    if (this.closed) throw new Error('Job queue is closed');
    const job: QueuedJob = { id: randomUUID(), payload, redelivered: false };
    const waiter = this.waiters.shift();
    if (waiter) {
      this.pending.set(job.id, job);
      waiter(job);
    } else {
      this.ready.push(job);
    }
    return job.id;
  }

  async dequeue(signal?: AbortSignal): Promise<QueuedJob | null> {
    if (this.closed || signal?.aborted) return null;
    const next = this.ready.shift();
    if (next) {
      this.pending.set(next.id, next);
      return next;
    }

    return new Promise<QueuedJob | null>((resolve) => {
      const onAbort = () => {
        const i = this.waiters.indexOf(deliver);
        if (i >= 0) this.waiters.splice(i, 1);
        resolve(null);
      };
      const deliver = (job: QueuedJob | null) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(job);
      };
      this.waiters.push(deliver);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async ack(job: QueuedJob): Promise<void> {
    this.pending.delete(job.id);
  }

  /** Puts every unacked job back in front of the queue, as a crashed consumer would. */
  requeuePending(): number {
    const jobs = [...this.pending.values()].map((job) => ({ ...job, redelivered: true }));
    this.pending.clear();
    for (const job of jobs.reverse()) {
      const waiter = this.waiters.shift();
      if (waiter) {
        this.pending.set(job.id, job);
        waiter(job);
      } else {
        this.ready.unshift(job);
      }
    }
    return jobs.length;
  }

  get size(): number {
    return this.ready.length;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}

// ─── Redis Streams queue ─────────────────────────────────────────────

export const JOB_STREAM = 'answer-jobs';
export const JOB_GROUP = 'answer-workers';
const STREAM_MAX_LEN = 10_000;
const READ_BLOCK_MS = 2_000;
const PENDING_RECLAIM_IDLE_MS = 60_000;

interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

function toEntry(raw: unknown): StreamEntry | null {
  if (!Array.isArray(raw) || raw.length < 2) return null;
  const [id, flat] = raw;
  if (typeof id !== 'string' || !Array.isArray(flat)) return null;
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    const key = flat[i];
    const value = flat[i + 1];
    if (typeof key === 'string' && typeof value === 'string') fields[key] = value;
  }
  return { id, fields };
}

/** XREADGROUP reply: [[stream, [[id, [field, value, ...]], ...]], ...] */
export function parseReadGroupReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];
  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const raw of stream[1]) {
      const entry = toEntry(raw);
      if (entry) entries.push(entry);
    }
  }
  return entries;
}

/** XAUTOCLAIM reply: [nextCursor, [[id, [field, value, ...]], ...], deletedIds?] */
export function parseAutoClaimReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply) || !Array.isArray(reply[1])) return [];
  const entries: StreamEntry[] = [];
  for (const raw of reply[1]) {
    const entry = toEntry(raw);
    if (entry) entries.push(entry);
  }
  return entries;
}

function decodePayload(entry: StreamEntry): unknown {
  const raw = entry.fields.payload;
  if (raw === undefined) return null;
  try {
    return JSON.parse(raw);
  } catch {
    // Left for the worker's validation to reject.
    return raw;
  }
}

export class RedisJobQueue implements JobQueue {
  private readonly consumer = `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
  private groupReady: Promise<void> | null = null;
  private closed = false;

  /**
   * `producer` serves XADD/XACK; `blocking` is a dedicated connection for
   * XREADGROUP BLOCK so reads never stall other commands.
   */
  constructor(
    private readonly producer: Redis,
    private readonly blocking: Redis,
  ) {}

  private ensureGroup(): Promise<void> {
    this.groupReady ??= this.producer
      .xgroup('CREATE', JOB_STREAM, JOB_GROUP, '0', 'MKSTREAM')
      .then(() => {
        logger.info({ stream: JOB_STREAM, group: JOB_GROUP }, 'Job queue consumer group created');
      })
      .catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        if (msg.includes('BUSYGROUP')) return;
        this.groupReady = null;
        throw err;
      });
    return this.groupReady;
  }

  async enqueue(payload: JobPayload): Promise<string> {
    await this.ensureGroup();
    const id = await this.producer.xadd(
      JOB_STREAM,
      'MAXLEN',
      '~',
      STREAM_MAX_LEN,
      '*',
      'payload',
      JSON.stringify(payload),
    );
    if (!id) throw new Error('XADD returned no entry id');
    return id;
  }

  async dequeue(signal?: AbortSignal): Promise<QueuedJob | null> {
    await this.ensureGroup();

    while (!this.closed && !signal?.aborted) {
      const reclaimed = parseAutoClaimReply(await this.producer.xautoclaim(
        JOB_STREAM,
        JOB_GROUP,
        this.consumer,
        PENDING_RECLAIM_IDLE_MS,
        '0-0',
        'COUNT',
        1,
      ));
      const stale = reclaimed[0];
      if (stale) {
        logger.warn({ entryId: stale.id }, 'Reclaimed idle job from another consumer');
        return { id: stale.id, payload: decodePayload(stale), redelivered: true };
      }

      const fresh = parseReadGroupReply(await this.blocking.xreadgroup(
        'GROUP',
        JOB_GROUP,
        this.consumer,
        'COUNT',
        1,
        'BLOCK',
        READ_BLOCK_MS,
        'STREAMS',
        JOB_STREAM,
        '>',
      ))[0];
      if (fresh) return { id: fresh.id, payload: decodePayload(fresh), redelivered: false };
    }
    return null;
  }

  async ack(job: QueuedJob): Promise<void> {
    await this.producer.xack(JOB_STREAM, JOB_GROUP, job.id);
    await this.producer.xdel(JOB_STREAM, job.id);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
