import { WhereCondition } from '../../ast/query-structure.js';
import { CONDITION_OPERATORS, LOGICAL_OPERATORS, SQL_KEYWORDS } from '../../sql/sql.js';
import { qualify } from './identifier.js';

/**
 * Values starting with `:` are named parameters and pass through unquoted.
 * Literals are wrapped in single quotes as given; embedded quotes are not
 * escaped, so literal values must come from structured input only.
 */
const renderValue = (value: string): string =>
  value.startsWith(':') ? value : `'${value}'`;

/**
 * Compiler for WHERE and HAVING predicate lists.
 */
export class ConditionCompiler {
  /**
   * Compiles a clause such as "WHERE a = '1' OR b IS NULL".
   * @returns Empty string when there are no conditions
   */
  static compileClause(keyword: typeof SQL_KEYWORDS.WHERE | typeof SQL_KEYWORDS.HAVING, conditions: WhereCondition[]): string {
    if (conditions.length === 0) return '';
    return `${keyword} ${ConditionCompiler.compileConditions(conditions)}`;
  }

  /**
   * Joins conditions with each one's own logical operator, defaulting to AND.
   * The first condition's logical operator is ignored.
   */
  static compileConditions(conditions: WhereCondition[]): string {
    return conditions
      .map((condition, index) => {
        const rendered = ConditionCompiler.compileCondition(condition);
        if (index === 0) return rendered;
        const given = (condition.logicalOperator ?? '').trim().toUpperCase();
        const connective = given || LOGICAL_OPERATORS.AND;
        return `${connective} ${rendered}`;
      })
      .join(' ');
  }

  static compileCondition(condition: WhereCondition): string {
    const prefix = condition.negated ? `${SQL_KEYWORDS.NOT} ` : '';
    const operator = condition.operator.toUpperCase();
    const head = `${prefix}${qualify(condition.tableName, condition.columnName)} ${operator}`;
    const operand = ConditionCompiler.compileOperand(operator, condition);
    return operand ? `${head} ${operand}` : head;
  }

  /**
   * Renders the right-hand side for the operator family, or '' when there is none
   */
  private static compileOperand(operator: string, condition: WhereCondition): string {
    if (operator === CONDITION_OPERATORS.IN && condition.values && condition.values.length > 0) {
      return `(${condition.values.map(renderValue).join(', ')})`;
    }

    if (operator === CONDITION_OPERATORS.BETWEEN) {
      if (condition.minValue !== undefined && condition.maxValue !== undefined) {
        return `${renderValue(condition.minValue)} AND ${renderValue(condition.maxValue)}`;
      }
      if (condition.values && condition.values.length >= 2) {
        return `${renderValue(condition.values[0])} AND ${renderValue(condition.values[1])}`;
      }
      return '';
    }

    if (operator === CONDITION_OPERATORS.IS_NULL || operator === CONDITION_OPERATORS.IS_NOT_NULL) {
      return '';
    }

    return condition.value !== undefined ? renderValue(condition.value) : '';
  }
}
