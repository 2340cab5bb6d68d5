import { describe, it, expect, vi } from 'vitest';
import { assertLocked, runAtomic, runRead } from '../../src/services/atomic';
import { ErrorCode, failure, success } from '../../src/services/types';
import { ConcurrentModificationError, StoreUnavailableError } from '../../src/store/errors';
import { appointmentAt, errorOf, monday, seededStore, testConfig, unitContext, unwrap } from '../helpers/fixtures';

describe('assertLocked', () => {
  it('passes when every key is held', () => {
    expect(() => assertLocked(unitContext(['a', 'b']), ['b'])).not.toThrow();
  });

  it('throws with the missing keys', () => {
    try {
      assertLocked(unitContext(['a']), ['a', 'b', 'c']);
      throw new Error('expected assertLocked to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConcurrentModificationError);
      if (error instanceof ConcurrentModificationError) {
        expect(error.details).toEqual({ missingKeys: ['b', 'c'] });
      }
    }
  });
});

describe('runAtomic', () => {
  const config = testConfig();

  it('commits a successful unit', async () => {
    const store = seededStore();
    const appointment = appointmentAt('apt-1', monday(10));

    const result = await runAtomic(
      store,
      config,
      async () => success(['appointment:apt-1']),
      async (tx) => {
        await tx.insertAppointment(appointment);
        return success(appointment.id);
      }
    );

    expect(unwrap(result)).toBe('apt-1');
    expect(await store.findAppointment('apt-1')).toEqual(appointment);
  });

  it('discards the writes of a failed unit', async () => {
    const store = seededStore();

    const result = await runAtomic(
      store,
      config,
      async () => success([]),
      async (tx) => {
        await tx.insertAppointment(appointmentAt('apt-1', monday(10)));
        return failure<string>(ErrorCode.INVALID_STATE, 'nope');
      }
    );

    errorOf(result, ErrorCode.INVALID_STATE);
    expect(await store.findAppointment('apt-1')).toBeNull();
  });

  it('returns key resolution failures without locking', async () => {
    const store = seededStore();
    const work = vi.fn();

    const result = await runAtomic(store, config, async () => failure(ErrorCode.NOT_FOUND, 'missing'), work);

    errorOf(result, ErrorCode.NOT_FOUND);
    expect(work).not.toHaveBeenCalled();
  });

  it('re-resolves keys after a stale lock set', async () => {
    const store = seededStore();
    const resolve = vi
      .fn()
      .mockResolvedValueOnce(success(['employee:a']))
      .mockResolvedValue(success(['employee:a', 'employee:b']));

    const result = await runAtomic(store, config, resolve, async (_tx, ctx) => {
      assertLocked(ctx, ['employee:a', 'employee:b']);
      return success('done');
    });

    expect(unwrap(result)).toBe('done');
    expect(resolve).toHaveBeenCalledTimes(2);
  });

  it('reports CONFLICT once retries are exhausted', async () => {
    const store = seededStore();
    const work = vi.fn(async () => {
      throw new ConcurrentModificationError('Lock set is stale', { missingKeys: ['employee:b'] });
    });

    const result = await runAtomic(store, config, async () => success(['employee:a']), work);

    const error = errorOf(result, ErrorCode.CONFLICT);
    expect(error.details).toEqual({ reason: 'CONCURRENT_MODIFICATION', missingKeys: ['employee:b'] });
    expect(work).toHaveBeenCalledTimes(config.maxWriteRetries + 1);
  });

  it('retries transient store failures', async () => {
    const store = seededStore();
    let calls = 0;

    const result = await runAtomic(store, config, async () => success([]), async () => {
      calls += 1;
      if (calls === 1) {
        throw new StoreUnavailableError('Database unavailable: connection reset');
      }
      return success(calls);
    });

    expect(unwrap(result)).toBe(2);
  });

  it('reports PERSISTENCE_ERROR when the store stays unavailable', async () => {
    const store = seededStore();

    const result = await runAtomic(store, testConfig({ maxWriteRetries: 1 }), async () => success([]), async () => {
      throw new StoreUnavailableError('Database unavailable: connection refused');
    });

    expect(errorOf(result, ErrorCode.PERSISTENCE_ERROR).message).toBe('Database unavailable: connection refused');
  });

  it('reports a lock timeout as PERSISTENCE_ERROR', async () => {
    const store = seededStore();
    let releaseHolder: () => void = () => undefined;
    const holding = new Promise<void>((resolve) => {
      releaseHolder = resolve;
    });

    const holder = store.withLocks(
      ['appointment:apt-1'],
      async () => {
        await holding;
        return success(null);
      },
      { timeoutMs: 1000 }
    );

    const result = await runAtomic(
      store,
      testConfig({ lockTimeoutMs: 20, maxWriteRetries: 0 }),
      async () => success(['appointment:apt-1']),
      async () => success(null)
    );

    releaseHolder();
    await holder;

    expect(errorOf(result, ErrorCode.PERSISTENCE_ERROR).message).toBe(
      'Timed out after 20ms waiting for lock appointment:apt-1'
    );
  });

  it('rethrows programming errors', async () => {
    const store = seededStore();

    await expect(
      runAtomic(store, config, async () => success([]), async () => {
        throw new TypeError('boom');
      })
    ).rejects.toThrow('boom');
  });
});

describe('runRead', () => {
  it('retries transient failures', async () => {
    const query = vi
      .fn()
      .mockRejectedValueOnce(new StoreUnavailableError('Database unavailable: timeout'))
      .mockResolvedValue(success(42));

    expect(unwrap(await runRead(testConfig(), query))).toBe(42);
    expect(query).toHaveBeenCalledTimes(2);
  });

  it('reports PERSISTENCE_ERROR after the last retry', async () => {
    const query = vi.fn().mockRejectedValue(new StoreUnavailableError('Database unavailable: timeout'));

    const result = await runRead(testConfig({ maxWriteRetries: 2 }), query);

    errorOf(result, ErrorCode.PERSISTENCE_ERROR);
    expect(query).toHaveBeenCalledTimes(3);
  });
});
