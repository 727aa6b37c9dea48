// Tests for the per-key lock

import { describe, it, expect } from 'vitest';
import { KeyedLock } from './lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('KeyedLock', () => {
  it('runs tasks on the same key one at a time, in call order', async () => {
    const lock = new KeyedLock<number>();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run(1, async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run(1, async () => {
      events.push('second:start');
    });

    await tick();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not make other keys wait', async () => {
    const lock = new KeyedLock<number>();
    const gate = deferred();

    const held = lock.run(1, () => gate.promise);
    const other = await lock.run(2, async () => 'done');

    expect(other).toBe('done');

    gate.resolve();
    await held;
  });

  it('releases the key when a task fails', async () => {
    const lock = new KeyedLock<string>();

    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('a', async () => 42)).resolves.toBe(42);
    expect(lock.size).toBe(0);
  });

  it('forgets keys once nothing holds them', async () => {
    const lock = new KeyedLock<number>();

    await Promise.all([lock.run(1, async () => 1), lock.run(2, async () => 2), lock.run(1, async () => 3)]);

    expect(lock.size).toBe(0);
  });

  it('ignores a second release', async () => {
    const lock = new KeyedLock<number>();

    const release = await lock.acquire(1);
    release();
    release();

    const again = await lock.acquire(1);
    expect(lock.size).toBe(1);
    again();
    expect(lock.size).toBe(0);
  });
});
