/**
 * Session lock tests
 */

import { describe, it, expect } from 'vitest';
import { SessionLock } from '../../services/session-lock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionLock', () => {
  it('should run calls for one session in arrival order', async () => {
    const lock = new SessionLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('s1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('s1', () => {
      order.push('second');
    });
    const third = lock.run('s1', () => {
      order.push('third');
    });

    await Promise.resolve();
    expect(lock.isLocked('s1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(lock.isLocked('s1')).toBe(false);
  });

  it('should not make different sessions wait on each other', async () => {
    const lock = new SessionLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await lock.run('b', () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['b', 'a']);
  });

  it('should release the lock when the function throws', async () => {
    const lock = new SessionLock();

    await expect(
      lock.run('s1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('s1', () => 'next')).resolves.toBe('next');
    expect(lock.isLocked('s1')).toBe(false);
  });
});
