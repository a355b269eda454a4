/**
 * FIFO mutual exclusion per key.
 *
 * Tasks for the same key run one at a time, in the order `run` was
 * called. Tasks for different keys never wait on each other. Each key
 * holds only the tail of its queue, and the entry is dropped once the
 * queue drains.
 *
 * ## Lifecycle
 *
 * 1. **`run(key, task)`** — chains `task` behind whatever is queued for
 *    `key`. The chaining happens synchronously, so call order is
 *    acquisition order.
 * 2. The task's result (or rejection) is returned to the caller; a
 *    rejection never blocks the tasks queued behind it.
 * 3. When the last queued task for `key` settles, the key is forgotten.
 */
export class KeyedLock {
  /** Key → promise that settles when the last queued task for that key has. */
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** `true` while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
