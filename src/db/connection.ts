import type { QueryResult, QueryResultRow } from 'pg';

/** Anything that runs a query: the pool itself or a checked-out client */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}
