import type { QueryRow } from '@txcache/core';
import type { QueryResultCache } from './query-cache';

export interface TransactionCacheStats {
  transactions: number;
  requests: number;
  hits: number;
  hitRate: number;
}

/**
 * Transaction caching service
 * Adapters call it around each unit of work
 */
export interface TransactionCaching<TContext extends object, R extends QueryRow = QueryRow> {
  /**
   * Cache for this transaction
   * - Created on first use
   * - Same instance for the rest of the transaction
   */
  cacheFor(txContext: TContext): QueryResultCache<R>;

  /**
   * End the transaction's cache scope
   * - Called after commit or rollback
   * - Folds the cache's counters into the totals
   */
  endTransaction(txContext: TContext): void;

  /**
   * Counters over every ended transaction
   */
  getCacheStats(): TransactionCacheStats;
}
