import type { QueryRow } from '@txcache/core';
import type { QueryResultCache } from './query-cache';

/**
 * Per-transaction cache lifecycle.
 *
 * A cache is created the first time a transaction asks for one and is
 * cleared and forgotten when the transaction ends. Transaction contexts are
 * held weakly, so an abandoned context does not keep its cache alive.
 */
export class TransactionCacheRegistry<TContext extends object, R extends QueryRow = QueryRow> {
  private readonly caches = new WeakMap<TContext, QueryResultCache<R>>();

  constructor(private readonly createCache: (txContext: TContext) => QueryResultCache<R>) {}

  forTransaction(txContext: TContext): QueryResultCache<R> {
    let cache = this.caches.get(txContext);
    if (!cache) {
      cache = this.createCache(txContext);
      this.caches.set(txContext, cache);
    }
    return cache;
  }

  has(txContext: TContext): boolean {
    return this.caches.has(txContext);
  }

  /**
   * Clear and forget the transaction's cache, returning it if one was created
   */
  end(txContext: TContext): QueryResultCache<R> | undefined {
    const cache = this.caches.get(txContext);
    if (cache) {
      cache.clearCache();
      this.caches.delete(txContext);
    }
    return cache;
  }
}
