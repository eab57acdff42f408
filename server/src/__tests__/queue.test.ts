import { describe, it, expect } from 'vitest';
import {
  JOB_GROUP,
  JOB_STREAM,
  MemoryJobQueue,
  parseAutoClaimReply,
  parseReadGroupReply,
  RedisJobQueue,
} from '../pipeline/queue.js';
import type { JobPayload } from '../pipeline/job-payload.js';

const PAYLOAD: JobPayload = {
  sessionId: '0b6f8a0e-5d1c-4a53-9d7e-3f0a2b1c4d5e',
  language: 'en',
  providerPreference: null,
  questions: ['What is a vector?'],
};

describe('MemoryJobQueue', () => {
  it('delivers jobs in order and tracks them until acked', async () => {
    const queue = new MemoryJobQueue();
    await queue.enqueue(PAYLOAD);
    queue.push({ sessionId: 'second' });

    const first = await queue.dequeue();
    const second = await queue.dequeue();

    expect(first?.payload).toEqual(PAYLOAD);
    expect(second?.payload).toEqual({ sessionId: 'second' });
    expect(queue.pendingCount).toBe(2);
    if (first) await queue.ack(first);
    expect(queue.pendingCount).toBe(1);
  });

  it('hands a new job straight to a waiting consumer', async () => {
    const queue = new MemoryJobQueue();
    const waiting = queue.dequeue();

    await queue.enqueue(PAYLOAD);

    expect((await waiting)?.payload).toEqual(PAYLOAD);
    expect(queue.size).toBe(0);
  });

  it('returns null when the signal aborts or the queue closes', async () => {
    const queue = new MemoryJobQueue();
    const controller = new AbortController();
    const aborted = queue.dequeue(controller.signal);
    const closing = queue.dequeue();

    controller.abort();
    expect(await aborted).toBeNull();

    await queue.close();
    expect(await closing).toBeNull();
    expect(await queue.dequeue()).toBeNull();
    await expect(queue.enqueue(PAYLOAD)).rejects.toThrow('Job queue is closed');
  });

  it('redelivers unacked jobs', async () => {
    const queue = new MemoryJobQueue();
    await queue.enqueue(PAYLOAD);
    const original = await queue.dequeue();

    expect(queue.requeuePending()).toBe(1);
    const again = await queue.dequeue();

    expect(again?.id).toBe(original?.id);
    expect(again?.redelivered).toBe(true);
  });
});

describe('stream reply parsing', () => {
  it('reads XREADGROUP replies', () => {
    const reply = [[JOB_STREAM, [['1-0', ['payload', '{"a":1}']], ['2-0', ['payload', '{"a":2}', 'extra']]]]];
    expect(parseReadGroupReply(reply)).toEqual([
      { id: '1-0', fields: { payload: '{"a":1}' } },
      { id: '2-0', fields: { payload: '{"a":2}' } },
    ]);
  });

  it('reads XAUTOCLAIM replies and ignores junk', () => {
    expect(parseAutoClaimReply(['0-0', [['5-0', ['payload', '{}']]], []])).toEqual([
      { id: '5-0', fields: { payload: '{}' } },
    ]);
    expect(parseAutoClaimReply(null)).toEqual([]);
    expect(parseReadGroupReply('nope')).toEqual([]);
  });
});

class FakeStreamRedis {
  readonly entries: Array<{ id: string; payload: string; delivered: boolean }> = [];
  readonly acked: string[] = [];
  readonly deleted: string[] = [];
  reclaimable: Array<[string, string[]]> = [];
  private groupCreated = false;
  private seq = 0;

  async xgroup(..._args: Array<string | number>): Promise<'OK'> {
    if (this.groupCreated) throw new Error('BUSYGROUP Consumer Group name already exists');
    this.groupCreated = true;
    return 'OK';
  }

  async xadd(...args: Array<string | number>): Promise<string> {
    this.seq += 1;
    const id = `${this.seq}-0`;
    this.entries.push({ id, payload: String(args[args.length - 1]), delivered: false });
    return id;
  }

  async xautoclaim(..._args: Array<string | number>): Promise<unknown> {
    return ['0-0', this.reclaimable.splice(0), []];
  }

  async xreadgroup(..._args: Array<string | number>): Promise<unknown> {
    const next = this.entries.find((e) => !e.delivered);
    if (!next) return null;
    next.delivered = true;
    return [[JOB_STREAM, [[next.id, ['payload', next.payload]]]]];
  }

  async xack(_stream: string, group: string, id: string): Promise<number> {
    this.acked.push(`${group}:${id}`);
    return 1;
  }

  async xdel(_stream: string, id: string): Promise<number> {
    this.deleted.push(id);
    return 1;
  }
}

describe('RedisJobQueue', () => {
  it('round-trips a job through the consumer group', async () => {
    const redis = new FakeStreamRedis();
    const queue = new RedisJobQueue(redis as never, redis as never);

    const id = await queue.enqueue(PAYLOAD);
    const job = await queue.dequeue();

    expect(job).toEqual({ id, payload: PAYLOAD, redelivered: false });
    if (job) await queue.ack(job);
    expect(redis.acked).toEqual([`${JOB_GROUP}:${id}`]);
    expect(redis.deleted).toEqual([id]);
  });

  it('prefers idle pending entries from other consumers', async () => {
    const redis = new FakeStreamRedis();
    redis.reclaimable = [['9-0', ['payload', 'not json']]];
    const queue = new RedisJobQueue(redis as never, redis as never);

    expect(await queue.dequeue()).toEqual({ id: '9-0', payload: 'not json', redelivered: true });
  });

  it('tolerates an existing consumer group', async () => {
    const redis = new FakeStreamRedis();
    await new RedisJobQueue(redis as never, redis as never).enqueue(PAYLOAD);

    await expect(new RedisJobQueue(redis as never, redis as never).enqueue(PAYLOAD)).resolves.toBe('2-0');
  });

  it('stops polling once closed', async () => {
    const redis = new FakeStreamRedis();
    const queue = new RedisJobQueue(redis as never, redis as never);
    await queue.close();

    expect(await queue.dequeue()).toBeNull();
  });
});
