import type { LockManager } from '../../core/ports';

// Per-key mutual exclusion for the in-memory stores
// Each key holds the tail of a promise chain; new work waits for the tail and becomes the new tail
// Plays the role a database transaction would play for a persistent repository
export class KeyedLock implements LockManager {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us so the map does not grow forever
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  // Number of keys with work running or queued
  get activeKeys(): number {
    return this.tails.size;
  }
}
