import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyedLock.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs tasks for one key one at a time, in call order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (name: string, delay: number) => async (): Promise<string> => {
      events.push(`${name}:start`);
      await sleep(delay);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('board', task('a', 20)),
      lock.run('board', task('b', 5)),
      lock.run('board', task('c', 0)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('never makes different keys wait on each other', async () => {
    const lock = new KeyedLock();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = lock.run('a', async () => {
      await gate;
      return 'a';
    });
    const fast = await lock.run('b', () => {
      release();
      return 'b';
    });

    expect(fast).toBe('b');
    await expect(slow).resolves.toBe('a');
  });

  it('passes a rejection to its caller without blocking the queue', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('board', () => {
      throw new Error('boom');
    });
    const next = lock.run('board', () => 'after');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('forgets a key once its queue drains', async () => {
    const lock = new KeyedLock();

    const pending = lock.run('board', () => sleep(5));
    expect(lock.isLocked('board')).toBe(true);
    expect(lock.activeKeys).toBe(1);

    await pending;
    await sleep(0);

    expect(lock.isLocked('board')).toBe(false);
    expect(lock.activeKeys).toBe(0);
  });
});
