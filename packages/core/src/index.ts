/**
 * @txcache/core
 *
 * Shared types, stores, the IN-list predicate builder and permission checks
 */

// Types
export * from './types';
export * from './cache/types';
export * from './logger';

// Stores
export { MemoryStore } from './cache/memory';

// Predicate builder
export { buildInClause, formatInClause, identifierList, stringList } from './predicate/in-clause';
export type { InClauseSource } from './predicate/in-clause';

// Permission checks
export { AccessGuard } from './access/guard';
export type { AccessGuardOptions } from './access/guard';
export { AccessDeniedError, formatDenial, isAccessDeniedError } from './access/errors';
export type { AccessDenial, DenialLabels } from './access/errors';
