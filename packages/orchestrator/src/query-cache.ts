import {
  MemoryStore,
  consoleLogger,
  type CacheStoreKind,
  type Identifier,
  type Insights,
  type Logger,
  type QueryExecutor,
  type QueryRow,
  type ResultStore,
} from '@txcache/core';

export interface QueryResultCacheOptions<R extends QueryRow> {
  executor: QueryExecutor<R>;
  identify?: (record: R) => Identifier; // Default: reads identifierField
  identifierField?: string; // Default: 'id'
  logger?: Logger; // Default: consoleLogger
  insights?: Insights;
}

export interface QueryCacheStats {
  mapEntries: number;
  listEntries: number;
  requests: number;
  hits: number;
  hitRate: number;
}

function readIdentifier(record: QueryRow, field: string): Identifier {
  const value = record[field];
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  throw new Error(`Record has no string or numeric '${field}' identifier`);
}

/**
 * Transaction-scoped memoization of query results.
 *
 * Each literal query text is executed at most once per store until it is
 * invalidated. The identifier-keyed store and the list store are independent:
 * populating or invalidating one never touches the other.
 *
 * Returned collections are shared with every later reader of the same key.
 * Lists are frozen; maps are typed ReadonlyMap and must not be mutated.
 */
export class QueryResultCache<R extends QueryRow = QueryRow> {
  private readonly executor: QueryExecutor<R>;
  private readonly identify: (record: R) => Identifier;
  private readonly logger: Logger;
  private readonly insights?: Insights;

  private readonly maps: ResultStore<ReadonlyMap<Identifier, R>> = new MemoryStore();
  private readonly lists: ResultStore<readonly R[]> = new MemoryStore();

  // Singleflight: one pending execution per store and key
  private readonly inflightMaps = new Map<string, Promise<ReadonlyMap<Identifier, R>>>();
  private readonly inflightLists = new Map<string, Promise<readonly R[]>>();

  private requests = 0;
  private hits = 0;

  constructor(options: QueryResultCacheOptions<R>) {
    const field = options.identifierField ?? 'id';
    this.executor = options.executor;
    this.identify = options.identify ?? ((record) => readIdentifier(record, field));
    this.logger = options.logger ?? consoleLogger;
    this.insights = options.insights;
  }

  /**
   * Results of `queryKey` indexed by record identifier.
   * On duplicate identifiers the last row wins.
   */
  fetchObjects(queryKey: string): Promise<ReadonlyMap<Identifier, R>> {
    return this.fetchOrPopulate('map', this.maps, this.inflightMaps, queryKey, (rows) => {
      const byId = new Map<Identifier, R>();
      for (const row of rows) {
        byId.set(this.identify(row), row);
      }
      return byId;
    });
  }

  /**
   * Results of `queryKey` in execution order, duplicates kept
   */
  getListOfRecords(queryKey: string): Promise<readonly R[]> {
    return this.fetchOrPopulate('list', this.lists, this.inflightLists, queryKey, (rows) =>
      Object.freeze([...rows])
    );
  }

  invalidateMap(queryKey: string): void {
    this.inflightMaps.delete(queryKey);
    if (this.maps.delete(queryKey)) {
      this.emit('map', queryKey, 'evict');
    }
  }

  invalidateList(queryKey: string): void {
    this.inflightLists.delete(queryKey);
    if (this.lists.delete(queryKey)) {
      this.emit('list', queryKey, 'evict');
    }
  }

  /**
   * Empty both stores. Pending executions still resolve for their callers
   * but their results are not stored.
   */
  clearCache(): void {
    this.inflightMaps.clear();
    this.inflightLists.clear();
    const mapKeys = this.maps.clear();
    const listKeys = this.lists.clear();

    for (const key of mapKeys) {
      this.emit('map', key, 'evict');
    }
    for (const key of listKeys) {
      this.emit('list', key, 'evict');
    }
  }

  stats(): QueryCacheStats {
    return {
      mapEntries: this.maps.size(),
      listEntries: this.lists.size(),
      requests: this.requests,
      hits: this.hits,
      hitRate: this.requests > 0 ? this.hits / this.requests : 0,
    };
  }

  private async fetchOrPopulate<V>(
    store: CacheStoreKind,
    entries: ResultStore<V>,
    inflight: Map<string, Promise<V>>,
    queryKey: string,
    build: (rows: readonly R[]) => V
  ): Promise<V> {
    this.requests++;

    const cached = entries.get(queryKey);
    if (cached !== undefined) {
      this.hits++;
      this.emit(store, queryKey, 'hit');
      return cached;
    }

    // Same key already executing: share it instead of running the query again
    const pending = inflight.get(queryKey);
    if (pending) {
      const shared = await pending;
      this.hits++;
      this.emit(store, queryKey, 'hit');
      return shared;
    }

    const promise: Promise<V> = (async () => {
      this.logger.debug?.(`QueryResultCache ${store} miss, executing query: ${queryKey}`);
      const rows = await this.executor.execute(queryKey);

      if (rows === null || rows === undefined) {
        this.logger.warn(`QueryResultCache: query returned no result set, not cached: ${queryKey}`);
        return build([]);
      }

      const value = build(rows);

      // Invalidated while executing: hand the result back without storing it
      if (inflight.get(queryKey) === promise) {
        entries.set(queryKey, value);
        this.emit(store, queryKey, 'miss');
      }

      return value;
    })();

    inflight.set(queryKey, promise);
    try {
      return await promise;
    } finally {
      if (inflight.get(queryKey) === promise) {
        inflight.delete(queryKey);
      }
    }
  }

  /**
   * Report an event to insights. A failing sink is logged and never
   * interrupts the cache operation that raised the event.
   */
  private emit(store: CacheStoreKind, queryKey: string, eventType: 'hit' | 'miss' | 'evict'): void {
    try {
      this.insights?.emit?.({ store, queryKey, eventType, timestamp: Date.now() });
    } catch (error) {
      this.logger.warn(`QueryResultCache: insights emit failed for ${store} ${eventType}:`, error);
    }
  }
}
