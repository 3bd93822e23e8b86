/**
 * Core types for the txcache SDK
 * These types describe records, executors and cache events
 */

/**
 * Unique-per-record key used by the identifier-keyed store
 */
export type Identifier = string | number;

/**
 * One row returned by the underlying query execution
 */
export type QueryRow = Record<string, unknown>;

/**
 * Data-access collaborator that runs query text.
 * Failures are rejected as-is; the cache never wraps them.
 */
export interface QueryExecutor<R extends QueryRow = QueryRow> {
  execute(queryText: string): Promise<readonly R[] | null | undefined>;
}

export type CacheStoreKind = 'map' | 'list';

export interface CacheEvent {
  store: CacheStoreKind;
  queryKey: string;
  eventType: 'hit' | 'miss' | 'evict';
  timestamp: number;
}

export interface Insights {
  emit?: (event: CacheEvent) => void;
}

export type AccessOperation = 'read' | 'create' | 'update' | 'delete';

export interface FieldPermissions {
  label?: string;
  read?: boolean;
  create?: boolean;
  update?: boolean;
}

export interface ObjectPermissions {
  label?: string;
  read?: boolean;
  create?: boolean;
  update?: boolean;
  delete?: boolean;
  fields?: Record<string, FieldPermissions>;
}

export interface PermissionProfile {
  version: number;
  objects: Record<string, ObjectPermissions>;
}
