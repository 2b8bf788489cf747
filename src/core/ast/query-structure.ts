import {
  ConditionOperator,
  JoinKind,
  JoinOperator,
  LogicalOperator,
  OrderDirection
} from '../sql/sql.js';

/**
 * A column in the SELECT list
 */
export interface SelectColumn {
  /** Optional table name or alias qualifying the column */
  tableName?: string;
  /** Column name, or `*` */
  columnName: string;
  /** Optional output alias */
  alias?: string;
  /** Aggregate wrapped around the column (COUNT, SUM, ... or any function name) */
  aggregateFunction?: string;
  /** Per-column DISTINCT flag; ORed with {@link QueryStructure.distinct} */
  distinct?: boolean;
}

/**
 * A table in the FROM list
 */
export interface FromTable {
  tableName: string;
  alias?: string;
}

/**
 * Comparison between two column references in a JOIN ... ON predicate
 */
export interface JoinCondition {
  leftTable?: string;
  leftColumn: string;
  operator: JoinOperator;
  rightTable?: string;
  rightColumn: string;
}

/**
 * A joined table; its conditions are ANDed together
 */
export interface JoinClause {
  joinType: JoinKind;
  tableName: string;
  alias?: string;
  conditions: JoinCondition[];
}

/**
 * A single WHERE or HAVING predicate.
 *
 * Exactly one value form is populated, depending on the operator:
 * `value` for comparisons and LIKE, `values` for IN (or the legacy
 * two-element BETWEEN form), `minValue`/`maxValue` for BETWEEN, and none
 * for IS NULL / IS NOT NULL. A value starting with `:` is a named parameter.
 */
export interface WhereCondition {
  tableName?: string;
  columnName: string;
  operator: ConditionOperator;
  /** Renders a leading NOT */
  negated?: boolean;
  /** Connective to the previous condition; absent on the first one */
  logicalOperator?: LogicalOperator;
  value?: string;
  values?: string[];
  minValue?: string;
  maxValue?: string;
}

export interface GroupByColumn {
  tableName?: string;
  columnName: string;
}

export interface OrderByColumn {
  tableName?: string;
  columnName: string;
  direction: OrderDirection;
}

/**
 * Editable representation of a SELECT statement.
 * Built fresh per request and treated as immutable once handed to the generator.
 */
export interface QueryStructure {
  selectColumns: SelectColumn[];
  fromTables: FromTable[];
  joins: JoinClause[];
  whereConditions: WhereCondition[];
  havingConditions: WhereCondition[];
  groupByColumns: GroupByColumn[];
  orderByColumns: OrderByColumn[];
  distinct: boolean;
  limit?: number;
  offset?: number;
}

/**
 * Creates a structure with every list empty, overlaid with the given parts
 */
export const createQueryStructure = (parts: Partial<QueryStructure> = {}): QueryStructure => ({
  selectColumns: [],
  fromTables: [],
  joins: [],
  whereConditions: [],
  havingConditions: [],
  groupByColumns: [],
  orderByColumns: [],
  distinct: false,
  ...parts
});

/**
 * The editable shell returned when SQL text cannot be tokenized:
 * `SELECT *` from one table whose name the user fills in.
 */
export const createFallbackStructure = (): QueryStructure =>
  createQueryStructure({
    selectColumns: [{ tableName: '', columnName: '*' }],
    fromTables: [{ tableName: '' }]
  });

/**
 * Splits `table.column` at the first dot. Unqualified names get an empty table.
 */
export const splitQualifiedName = (name: string): { tableName: string; columnName: string } => {
  const trimmed = name.trim();
  const dot = trimmed.indexOf('.');
  if (dot === -1) {
    return { tableName: '', columnName: trimmed };
  }
  return {
    tableName: trimmed.slice(0, dot),
    columnName: trimmed.slice(dot + 1)
  };
};

/**
 * True when the string is absent or only whitespace
 */
export const isBlank = (value: string | undefined | null): boolean =>
  value === undefined || value === null || value.trim() === '';
