/**
 * In-process mutual exclusion keyed by string.
 *
 * Each key holds the tail of a promise chain; a caller waits for the current
 * tail, runs, then hands over to the next caller. Multi-key acquisitions take
 * the keys in sorted order so two callers can never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(keys: string | string[], task: () => Promise<T>): Promise<T> {
    // Set removes duplicates, sort gives every caller the same acquisition order
    const ordered = [...new Set(Array.isArray(keys) ? keys : [keys])].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      // Release in reverse acquisition order
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      // Drop the entry once nobody queued behind this holder
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
