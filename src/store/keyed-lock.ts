import { LockTimeoutError } from './errors';

type Release = () => void;

/**
 * FIFO mutex per string key, built on promise chaining.
 *
 * Each waiter appends itself to the key's tail and waits for the previous
 * holder. Unused keys are dropped once the last waiter releases.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Acquires all keys in the given order; on timeout every key already
   * taken is released before the error propagates.
   */
  async acquireAll(keys: string[], timeoutMs: number): Promise<Release> {
    const releases: Release[] = [];
    try {
      for (const key of keys) {
        releases.push(await this.acquire(key, timeoutMs));
      }
    } catch (error) {
      releases.reverse().forEach((release) => release());
      throw error;
    }
    return () => releases.reverse().forEach((release) => release());
  }

  async acquire(key: string, timeoutMs: number): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    let released = false;
    const release: Release = () => {
      if (released) {
        return;
      }
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([previous.then(() => 'acquired' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      // Keep the queue intact: hand our turn straight to the next waiter.
      void previous.then(release);
      throw new LockTimeoutError(key, timeoutMs);
    }

    return release;
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.tails.size;
  }
}
