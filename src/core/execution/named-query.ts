import type { DbExecutor, QueryResult } from './db-executor.js';
import { BindOptions, BoundQuery, bindNamedParameters } from '../parameters/parameter-binding.js';
import { MapperLogger, silentLogger } from '../logging/mapper-logger.js';

export interface NamedQueryOptions extends BindOptions {
  /** Receives the positional SQL and its parameters before each run */
  logger?: MapperLogger;
}

const describeBinding = (bound: BoundQuery): string => {
  if (bound.names.length === 0) return 'Executing query without parameters';
  const described = bound.names.map((name, i) => {
    const type = bound.types[i];
    return type ? `${name}: ${type}` : name;
  });
  return `Executing query with parameters ${described.join(', ')}`;
};

/**
 * Binds a `:name` query and runs its positional form.
 *
 * Binding happens before the executor is touched: a missing or
 * mistyped value rejects with `ParameterBindingError` and nothing runs.
 */
export async function executeNamedQuery(
  executor: DbExecutor,
  sql: string,
  values: Record<string, unknown>,
  options: NamedQueryOptions = {}
): Promise<QueryResult[]> {
  const logger = options.logger ?? silentLogger;
  let bound: BoundQuery;
  try {
    bound = bindNamedParameters(sql, values, options);
  } catch (error) {
    logger({ level: 'error', message: 'Failed to bind named query', sql, error });
    throw error;
  }

  logger({ level: 'debug', message: describeBinding(bound), sql: bound.sql, params: bound.params });
  return executor.executeSql(bound.sql, bound.params);
}
