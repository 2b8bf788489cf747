/**
 * SQL keywords emitted by the generator, in clause order
 */
export const SQL_KEYWORDS = {
  /** SELECT clause keyword */
  SELECT: 'SELECT',
  /** DISTINCT keyword */
  DISTINCT: 'DISTINCT',
  /** FROM clause keyword */
  FROM: 'FROM',
  /** JOIN keyword */
  JOIN: 'JOIN',
  /** ON keyword introducing join predicates */
  ON: 'ON',
  /** WHERE clause keyword */
  WHERE: 'WHERE',
  /** GROUP BY clause keyword */
  GROUP_BY: 'GROUP BY',
  /** HAVING clause keyword */
  HAVING: 'HAVING',
  /** ORDER BY clause keyword */
  ORDER_BY: 'ORDER BY',
  /** LIMIT clause keyword */
  LIMIT: 'LIMIT',
  /** OFFSET clause keyword */
  OFFSET: 'OFFSET',
  /** Alias keyword */
  AS: 'AS',
  /** Negation prefix */
  NOT: 'NOT'
} as const;

/**
 * Operators a WHERE or HAVING condition may carry
 */
export const CONDITION_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** ANSI not equals operator */
  NOT_EQUALS: '<>',
  /** C-style not equals operator */
  BANG_EQUALS: '!=',
  /** Less than or equal operator */
  LESS_OR_EQUAL: '<=',
  /** Greater than or equal operator */
  GREATER_OR_EQUAL: '>=',
  /** Less than operator */
  LESS_THAN: '<',
  /** Greater than operator */
  GREATER_THAN: '>',
  /** LIKE pattern matching operator */
  LIKE: 'LIKE',
  /** IN membership operator */
  IN: 'IN',
  /** BETWEEN range operator */
  BETWEEN: 'BETWEEN',
  /** IS NULL null check operator */
  IS_NULL: 'IS NULL',
  /** IS NOT NULL null check operator */
  IS_NOT_NULL: 'IS NOT NULL'
} as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[keyof typeof CONDITION_OPERATORS];

/**
 * Comparison operators allowed between two column references in a join predicate.
 * Two-character operators come first so `<=` is never read as `<`.
 */
export const JOIN_OPERATORS = ['=', '<>', '!=', '<=', '>=', '<', '>'] as const;

export type JoinOperator = (typeof JOIN_OPERATORS)[number];

/**
 * Operators tried, in order, when a condition is recovered from text.
 * Null checks and BETWEEN are handled before this list.
 */
export const VALUE_OPERATORS = ['=', '<>', '!=', '<=', '>=', '<', '>', 'LIKE', 'IN'] as const;

/**
 * Logical connectives between conditions
 */
export const LOGICAL_OPERATORS = {
  AND: 'AND',
  OR: 'OR'
} as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[keyof typeof LOGICAL_OPERATORS];

/**
 * Types of SQL joins supported
 */
export const JOIN_KINDS = {
  /** INNER JOIN type */
  INNER: 'INNER',
  /** LEFT JOIN type */
  LEFT: 'LEFT',
  /** RIGHT JOIN type */
  RIGHT: 'RIGHT',
  /** FULL OUTER JOIN type */
  FULL: 'FULL OUTER'
} as const;

/**
 * Type representing any supported join kind
 */
export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC',
  /** Descending order */
  DESC: 'DESC'
} as const;

/**
 * Type representing any supported order direction
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Aggregate functions offered by the query builder UI.
 * Any other function name is accepted as free text.
 */
export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX'] as const;

export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

/**
 * Grammars understood by the reverse engineer's SQL parser
 */
export const PARSER_DATABASES = {
  MYSQL: 'MySQL',
  MARIADB: 'MariaDB',
  POSTGRES: 'PostgresQL',
  SQLITE: 'Sqlite',
  TRANSACT_SQL: 'TransactSQL',
  BIGQUERY: 'BigQuery'
} as const;

export type ParserDatabase = (typeof PARSER_DATABASES)[keyof typeof PARSER_DATABASES];
