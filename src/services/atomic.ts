/**
 * Atomic unit runner
 *
 * Every write goes through `runAtomic`:
 * 1. Resolve the lock keys the write needs (a read outside the lock)
 * 2. Run the work inside `store.withLocks`, where it re-reads everything
 *    and checks that the keys it relied on are still the right ones
 * 3. Retry stale key sets and transient store failures with backoff
 * 4. Translate store errors into ServiceResult failures
 */

import { Logger, silentLogger } from '../lib/logger';
import { withRetry } from '../lib/retry';
import { ConcurrentModificationError, StoreUnavailableError } from '../store/errors';
import { SchedulingReader, SchedulingStore, SchedulingTransaction } from '../store/types';
import { ErrorCode, SchedulingConfig, ServiceResult, failure } from './types';

const MAX_RETRY_DELAY_MS = 2000;

/** What a unit of work knows about the attempt it runs in */
export interface UnitContext {
  config: SchedulingConfig;
  /** Keys held for the duration of the unit */
  lockedKeys: readonly string[];
  /** Clock reading taken once per attempt */
  now: Date;
}

export type KeyResolver = (reader: SchedulingReader) => Promise<ServiceResult<string[]>>;

export type UnitOfWork<T> = (tx: SchedulingTransaction, ctx: UnitContext) => Promise<ServiceResult<T>>;

/**
 * Fails the attempt when a key the work depends on was not taken, i.e. the
 * data changed between key resolution and locking.
 */
export function assertLocked(ctx: UnitContext, keys: string[]): void {
  const missing = keys.filter((key) => !ctx.lockedKeys.includes(key));
  if (missing.length > 0) {
    throw new ConcurrentModificationError('Lock set is stale', { missingKeys: missing });
  }
}

function isRetryable(error: unknown): boolean {
  return error instanceof ConcurrentModificationError || error instanceof StoreUnavailableError;
}

function translateStoreError<T>(error: unknown): ServiceResult<T> {
  if (error instanceof ConcurrentModificationError) {
    return failure(
      ErrorCode.CONFLICT,
      'The schedule changed while the request was being processed. Please retry with fresh data.',
      { reason: 'CONCURRENT_MODIFICATION', ...error.details }
    );
  }
  if (error instanceof StoreUnavailableError) {
    return failure(ErrorCode.PERSISTENCE_ERROR, error.message);
  }
  throw error;
}

export async function runAtomic<T>(
  store: SchedulingStore,
  config: SchedulingConfig,
  resolveKeys: KeyResolver,
  work: UnitOfWork<T>,
  log: Logger = silentLogger
): Promise<ServiceResult<T>> {
  try {
    return await withRetry(
      async (): Promise<ServiceResult<T>> => {
        const keys = await resolveKeys(store);
        if (!keys.success) {
          return keys;
        }

        return store.withLocks(
          keys.data,
          (tx) => work(tx, { config, lockedKeys: keys.data, now: config.now() }),
          { timeoutMs: config.lockTimeoutMs }
        );
      },
      {
        retries: config.maxWriteRetries,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: MAX_RETRY_DELAY_MS,
        shouldRetry: isRetryable,
        onRetry: ({ attempt, delayMs, err }) => {
          log.warn({ attempt, delayMs, err }, 'Retrying scheduling write');
        },
      }
    );
  } catch (error) {
    return translateStoreError<T>(error);
  }
}

/**
 * Runs a read-only query, retrying transient store failures.
 */
export async function runRead<T>(
  config: SchedulingConfig,
  query: () => Promise<ServiceResult<T>>,
  log: Logger = silentLogger
): Promise<ServiceResult<T>> {
  try {
    return await withRetry(query, {
      retries: config.maxWriteRetries,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: MAX_RETRY_DELAY_MS,
      shouldRetry: (err) => err instanceof StoreUnavailableError,
      onRetry: ({ attempt, delayMs, err }) => {
        log.warn({ attempt, delayMs, err }, 'Retrying scheduling read');
      },
    });
  } catch (error) {
    return translateStoreError<T>(error);
  }
}
