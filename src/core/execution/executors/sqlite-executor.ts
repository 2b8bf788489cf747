import { DbExecutor, rowsToQueryResult } from '../db-executor.js';

/**
 * Promise-style subset of a SQLite client: `all` runs positional SQL and
 * resolves with the rows as objects keyed by column name
 */
export interface SqliteClientLike {
  all(sql: string, params?: unknown[]): Promise<Array<Record<string, unknown>>>;
}

/**
 * Adapts a SQLite client to {@link DbExecutor}; each statement yields one result set
 */
export function createSqliteExecutor(client: SqliteClientLike): DbExecutor {
  return {
    async executeSql(sql, params) {
      return [rowsToQueryResult(await client.all(sql, params))];
    }
  };
}
