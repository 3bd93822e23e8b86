import { describe, it, expect, vi } from 'vitest';
import { silentLogger, type QueryRow } from '@txcache/core';
import { QueryResultCache } from '../query-cache';
import { TransactionCacheRegistry } from '../transaction-scope';
import { createTransactionCaching } from '../orchestrator';

const QUERY = 'SELECT id FROM accounts';

function createExecutor() {
  return { execute: vi.fn(async (_queryText: string): Promise<QueryRow[]> => [{ id: 1 }]) };
}

describe('TransactionCacheRegistry', () => {
  it('should create a cache lazily and reuse it within a transaction', () => {
    const factory = vi.fn(
      () => new QueryResultCache({ executor: createExecutor(), logger: silentLogger })
    );
    const registry = new TransactionCacheRegistry<object>(factory);
    const tx = {};

    expect(registry.has(tx)).toBe(false);
    expect(factory).not.toHaveBeenCalled();

    const cache = registry.forTransaction(tx);

    expect(registry.forTransaction(tx)).toBe(cache);
    expect(registry.has(tx)).toBe(true);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(tx);
  });

  it('should give each transaction its own cache', () => {
    const registry = new TransactionCacheRegistry<object>(
      () => new QueryResultCache({ executor: createExecutor(), logger: silentLogger })
    );

    expect(registry.forTransaction({})).not.toBe(registry.forTransaction({}));
  });

  it('should clear and forget the cache when the transaction ends', async () => {
    const registry = new TransactionCacheRegistry<object>(
      () => new QueryResultCache({ executor: createExecutor(), logger: silentLogger })
    );
    const tx = {};
    const cache = registry.forTransaction(tx);
    await cache.fetchObjects(QUERY);

    expect(registry.end(tx)).toBe(cache);
    expect(cache.stats().mapEntries).toBe(0);
    expect(registry.has(tx)).toBe(false);
    expect(registry.end(tx)).toBeUndefined();
    expect(registry.forTransaction(tx)).not.toBe(cache);
  });
});

describe('createTransactionCaching', () => {
  it('should build each cache with the executor for its transaction', async () => {
    const executors = new Map<object, ReturnType<typeof createExecutor>>();
    const caching = createTransactionCaching<object>({
      executorFor: (tx) => {
        const executor = createExecutor();
        executors.set(tx, executor);
        return executor;
      },
      logger: silentLogger,
    });
    const first = {};
    const second = {};

    await caching.cacheFor(first).fetchObjects(QUERY);
    await caching.cacheFor(first).fetchObjects(QUERY);
    await caching.cacheFor(second).fetchObjects(QUERY);

    expect(executors.get(first)?.execute).toHaveBeenCalledTimes(1);
    expect(executors.get(second)?.execute).toHaveBeenCalledTimes(1);
  });

  it('should fold ended transactions into the stats', async () => {
    const caching = createTransactionCaching<object>({
      executorFor: () => createExecutor(),
      logger: silentLogger,
    });
    const used = {};
    const unused = {};

    await caching.cacheFor(used).fetchObjects(QUERY);
    await caching.cacheFor(used).fetchObjects(QUERY);
    expect(caching.getCacheStats().requests).toBe(0);

    caching.endTransaction(used);
    caching.endTransaction(unused);

    expect(caching.getCacheStats()).toEqual({
      transactions: 2,
      requests: 2,
      hits: 1,
      hitRate: 0.5,
    });
  });

  it('should pass identifier options to every cache', async () => {
    const caching = createTransactionCaching<object>({
      executorFor: () => ({ execute: async () => [{ key: 'k1' }] }),
      identifierField: 'key',
      logger: silentLogger,
    });

    const byKey = await caching.cacheFor({}).fetchObjects('SELECT key FROM t');

    expect(Array.from(byKey.keys())).toEqual(['k1']);
  });
});
