import type { Identifier, Insights, Logger, QueryExecutor, QueryRow } from '@txcache/core';
import { QueryResultCache } from './query-cache';
import { TransactionCacheRegistry } from './transaction-scope';
import type { TransactionCaching } from './types';

export interface OrchestratorOptions<TContext extends object, R extends QueryRow> {
  executorFor: (txContext: TContext) => QueryExecutor<R>;
  identify?: (record: R) => Identifier;
  identifierField?: string; // Default: 'id'
  logger?: Logger;
  insights?: Insights;
}

/**
 * Create the transaction caching service.
 *
 * Each transaction context gets its own QueryResultCache, built with the
 * executor for that context, so nothing is shared between transactions.
 */
export function createTransactionCaching<TContext extends object, R extends QueryRow = QueryRow>(
  options: OrchestratorOptions<TContext, R>
): TransactionCaching<TContext, R> {
  const registry = new TransactionCacheRegistry<TContext, R>(
    (txContext) =>
      new QueryResultCache<R>({
        executor: options.executorFor(txContext),
        identify: options.identify,
        identifierField: options.identifierField,
        logger: options.logger,
        insights: options.insights,
      })
  );

  let transactions = 0;
  let totalRequests = 0;
  let cacheHits = 0;

  return {
    cacheFor(txContext) {
      return registry.forTransaction(txContext);
    },

    endTransaction(txContext) {
      transactions++;
      const cache = registry.end(txContext);
      if (cache) {
        const { requests, hits } = cache.stats();
        totalRequests += requests;
        cacheHits += hits;
      }
    },

    getCacheStats() {
      return {
        transactions,
        requests: totalRequests,
        hits: cacheHits,
        hitRate: totalRequests > 0 ? cacheHits / totalRequests : 0,
      };
    },
  };
}
