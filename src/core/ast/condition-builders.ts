import { CONDITION_OPERATORS, ConditionOperator, JoinOperator } from '../sql/sql.js';
import { JoinCondition, WhereCondition, splitQualifiedName } from './query-structure.js';

/**
 * A column reference: `"table.column"`, `"column"`, or an explicit pair
 */
export type ColumnInput = string | { tableName?: string; columnName: string };

/**
 * Normalizes a column reference to an explicit table/column pair
 */
export const toColumn = (column: ColumnInput): { tableName: string; columnName: string } =>
  typeof column === 'string'
    ? splitQualifiedName(column)
    : { tableName: column.tableName ?? '', columnName: column.columnName };

const createComparison = (
  operator: ConditionOperator,
  column: ColumnInput,
  value: string | number
): WhereCondition => ({
  ...toColumn(column),
  operator,
  value: String(value)
});

/**
 * Creates an equality condition (column = value)
 * @param value - Literal, or a `:name` parameter
 */
export const eq = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.EQUALS, column, value);

/**
 * Creates a not equal condition (column <> value)
 */
export const notEq = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.NOT_EQUALS, column, value);

export const lt = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.LESS_THAN, column, value);

export const lte = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.LESS_OR_EQUAL, column, value);

export const gt = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.GREATER_THAN, column, value);

export const gte = (column: ColumnInput, value: string | number): WhereCondition =>
  createComparison(CONDITION_OPERATORS.GREATER_OR_EQUAL, column, value);

/**
 * Creates a LIKE pattern matching condition
 */
export const like = (column: ColumnInput, pattern: string): WhereCondition =>
  createComparison(CONDITION_OPERATORS.LIKE, column, pattern);

/**
 * Creates an IN condition over a list of literals
 */
export const inList = (column: ColumnInput, values: (string | number)[]): WhereCondition => ({
  ...toColumn(column),
  operator: CONDITION_OPERATORS.IN,
  values: values.map(String)
});

/**
 * Creates a BETWEEN condition using the min/max value form
 */
export const between = (column: ColumnInput, min: string | number, max: string | number): WhereCondition => ({
  ...toColumn(column),
  operator: CONDITION_OPERATORS.BETWEEN,
  minValue: String(min),
  maxValue: String(max)
});

export const isNull = (column: ColumnInput): WhereCondition => ({
  ...toColumn(column),
  operator: CONDITION_OPERATORS.IS_NULL
});

export const isNotNull = (column: ColumnInput): WhereCondition => ({
  ...toColumn(column),
  operator: CONDITION_OPERATORS.IS_NOT_NULL
});

/**
 * Returns a copy of the condition rendered with a leading NOT
 */
export const not = (condition: WhereCondition): WhereCondition => ({
  ...condition,
  negated: true
});

/**
 * Returns a copy of the condition joined to its predecessor with OR
 */
export const or = (condition: WhereCondition): WhereCondition => ({
  ...condition,
  logicalOperator: 'OR'
});

/**
 * Creates a join predicate between two column references
 * @example
 * on('u.id', '=', 'p.user_id');
 */
export const on = (left: ColumnInput, operator: JoinOperator, right: ColumnInput): JoinCondition => {
  const l = toColumn(left);
  const r = toColumn(right);
  return {
    leftTable: l.tableName,
    leftColumn: l.columnName,
    operator,
    rightTable: r.tableName,
    rightColumn: r.columnName
  };
};
