import type { QueryResultRow } from 'pg';
import { consoleLogger, type Identifier, type Insights, type Logger } from '@txcache/core';
import {
  createTransactionCaching,
  type QueryResultCache,
  type TransactionCacheStats,
} from '@txcache/orchestrator';
import { PgQueryExecutor, type Queryable } from './executor';

export interface PoolClientLike extends Queryable {
  release(err?: Error | boolean): void;
}

export interface PoolLike {
  connect(): Promise<PoolClientLike>;
}

export interface QueryCachePoolOptions {
  identify?: (record: QueryResultRow) => Identifier;
  identifierField?: string; // Default: 'id'
  logger?: Logger; // Default: consoleLogger
  insights?: Insights;
}

export interface CachedTransaction {
  readonly client: PoolClientLike;
  readonly cache: QueryResultCache<QueryResultRow>;
}

interface TransactionScope {
  client: PoolClientLike;
  ended: boolean;
}

export interface QueryCachePool {
  transaction<T>(work: (tx: CachedTransaction) => Promise<T>): Promise<T>;
  getCacheStats(): TransactionCacheStats;
}

/**
 * Run pg transactions with a query cache scoped to each one
 *
 * @param pool - pg Pool (or anything that hands out clients)
 * @param options - cache configuration
 * @returns Pool wrapper whose transactions expose `tx.cache`
 */
export function withQueryCache(pool: PoolLike, options: QueryCachePoolOptions = {}): QueryCachePool {
  const logger = options.logger ?? consoleLogger;

  // Keyed by a scope per transaction: pooled clients are reused across transactions
  const caching = createTransactionCaching<TransactionScope, QueryResultRow>({
    executorFor: (scope) => new PgQueryExecutor(scope.client),
    identify: options.identify,
    identifierField: options.identifierField,
    logger,
    insights: options.insights,
  });

  return {
    async transaction<T>(work: (tx: CachedTransaction) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      const scope: TransactionScope = { client, ended: false };
      let releaseError: Error | undefined;

      const tx: CachedTransaction = {
        client,
        // Created on first access only
        get cache() {
          if (scope.ended) {
            throw new Error('withQueryCache: transaction has ended, its cache is no longer available');
          }
          return caching.cacheFor(scope);
        },
      };

      try {
        await client.query('BEGIN');
        const result = await work(tx);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          // Original error still wins; the broken connection is discarded
          logger.error('withQueryCache: ROLLBACK failed', rollbackError);
          releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        }
        throw error;
      } finally {
        scope.ended = true;
        try {
          caching.endTransaction(scope);
        } finally {
          client.release(releaseError);
        }
      }
    },

    getCacheStats: () => caching.getCacheStats(),
  };
}
