import { describe, it, expect } from 'vitest';
import { activeLockCount, withSessionLock } from '../lib/session-lock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('withSessionLock', () => {
  it('runs writers for one session in arrival order', async () => {
    const order: string[] = [];
    const writes = [
      withSessionLock('s-1', async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('a');
      }),
      withSessionLock('s-1', async () => {
        order.push('b');
      }),
      withSessionLock('s-1', async () => {
        order.push('c');
      }),
    ];

    expect(activeLockCount()).toBe(1);
    await Promise.all(writes);

    expect(order).toEqual(['a', 'b', 'c']);
    expect(activeLockCount()).toBe(0);
  });

  it('does not make other sessions wait', async () => {
    const gate = deferred();
    const held = withSessionLock('s-a', () => gate.promise);

    expect(await withSessionLock('s-b', async () => 'b done')).toBe('b done');
    expect(activeLockCount()).toBe(1);

    gate.resolve();
    await held;
    expect(activeLockCount()).toBe(0);
  });

  it('releases the lock when the holder throws', async () => {
    await expect(withSessionLock('s-x', async () => {
      throw new Error('write failed');
    })).rejects.toThrow('write failed');

    expect(activeLockCount()).toBe(0);
    expect(await withSessionLock('s-x', async () => 'next')).toBe('next');
    expect(activeLockCount()).toBe(0);
  });
});
