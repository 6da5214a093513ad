import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of a pg Pool or PoolClient the migrations need.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface ReleasableClient extends Queryable {
  release(): void;
}

/**
 * Anything that hands out dedicated connections, such as a pg Pool.
 */
export interface ConnectionSource {
  connect(): Promise<ReleasableClient>;
}
