/**
 * @txcache/pg
 *
 * node-postgres integration for transaction-scoped query caching
 */

// Main integration function
export { withQueryCache } from './integration';
export type {
  CachedTransaction,
  PoolClientLike,
  PoolLike,
  QueryCachePool,
  QueryCachePoolOptions,
} from './integration';

// Query execution
export { PgQueryExecutor } from './executor';
export type { Queryable } from './executor';

// Re-export for convenience
export { buildInClause, formatInClause, identifierList, stringList } from '@txcache/core';
export type { CacheEvent, Identifier, QueryExecutor } from '@txcache/core';
export { QueryResultCache } from '@txcache/orchestrator';
