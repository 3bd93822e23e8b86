import type { QueryResultRow } from 'pg';
import type { QueryExecutor } from '@txcache/core';

/**
 * Anything that runs query text: a pg Pool, PoolClient or Client
 */
export interface Queryable {
  query(queryText: string): Promise<{ rows: QueryResultRow[] }>;
}

/**
 * node-postgres query executor
 *
 * Errors from the driver (syntax, permissions, connection) are not caught.
 */
export class PgQueryExecutor implements QueryExecutor<QueryResultRow> {
  constructor(private readonly db: Queryable) {}

  async execute(queryText: string): Promise<readonly QueryResultRow[]> {
    const result = await this.db.query(queryText);
    return result.rows;
  }
}
