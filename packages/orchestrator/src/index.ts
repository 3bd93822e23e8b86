/**
 * @txcache/orchestrator
 *
 * Query result memoization and its per-transaction lifecycle
 */

// Cache controller
export { QueryResultCache } from './query-cache';
export type { QueryResultCacheOptions, QueryCacheStats } from './query-cache';

// Transaction lifecycle
export { createTransactionCaching } from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';
export { TransactionCacheRegistry } from './transaction-scope';
export type { TransactionCaching, TransactionCacheStats } from './types';

// Utilities
export { loadPermissions, parsePermissions } from './permissions';
export type { PermissionsConfig } from './permissions';
