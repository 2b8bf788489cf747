/**
 * Tabular result of one statement: column names plus row values in column order
 */
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

/**
 * Runs positional (`?`) SQL against a database
 */
export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;
}

/**
 * Convert an array of row objects into a QueryResult.
 * Column order follows the keys of the first row.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}
