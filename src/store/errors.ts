/**
 * Store-level failures. The atomic runner translates these into
 * PERSISTENCE_ERROR / CONFLICT results.
 */

/** The store could not be reached or did not answer in time; safe to retry */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class LockTimeoutError extends StoreUnavailableError {
  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${key}`);
    this.name = 'LockTimeoutError';
  }
}

/**
 * A concurrent writer invalidated what this unit read before locking
 * (or the database aborted the transaction for serialization).
 */
export class ConcurrentModificationError extends Error {
  constructor(
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ConcurrentModificationError';
  }
}
