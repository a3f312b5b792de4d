/**
 * Per-key async mutex
 *
 * Serializes read-modify-write sequences on one card while letting
 * different cards proceed in parallel. Waiters run in arrival order.
 *
 * @module main/utils/keyed-mutex
 */

export class KeyedMutex {
  /** Tail of the wait chain per key */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Keys with a running or waiting task */
  get size(): number {
    return this.tails.size;
  }
}
