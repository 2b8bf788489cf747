import { JoinCondition, WhereCondition } from '../ast/query-structure.js';
import { CONDITION_OPERATORS, ConditionOperator, JOIN_OPERATORS, JoinOperator, LogicalOperator } from '../sql/sql.js';
import {
  parseConditionSegment,
  parseJoinConditionText,
  swapConnective,
  withoutLeadingConnective
} from './condition-text.js';
import { nodeType, readBinary, readColumnRef, readExprList, readLiteral, readNot } from './parser-ast.js';

/**
 * Renders a parser node back to SQL text, for leaves the walker cannot map
 */
export type ExpressionRenderer = (node: unknown) => string;

const COMPARISONS: Record<string, ConditionOperator> = {
  '=': CONDITION_OPERATORS.EQUALS,
  '<>': CONDITION_OPERATORS.NOT_EQUALS,
  '!=': CONDITION_OPERATORS.BANG_EQUALS,
  '<': CONDITION_OPERATORS.LESS_THAN,
  '>': CONDITION_OPERATORS.GREATER_THAN,
  '<=': CONDITION_OPERATORS.LESS_OR_EQUAL,
  '>=': CONDITION_OPERATORS.GREATER_OR_EQUAL,
  LIKE: CONDITION_OPERATORS.LIKE
};

const isLogical = (operator: string): operator is LogicalOperator =>
  operator === 'AND' || operator === 'OR';

const JOIN_OPERATOR_SET: ReadonlySet<string> = new Set(JOIN_OPERATORS);

const isJoinOperator = (operator: string): operator is JoinOperator =>
  JOIN_OPERATOR_SET.has(operator);

/**
 * Maps one predicate node onto a condition, or `undefined` when its shape
 * is not one of: comparison, LIKE, IN, BETWEEN, IS [NOT] NULL, each with
 * a plain column on the left and literals on the right.
 */
function mapPredicate(node: unknown): WhereCondition | undefined {
  const negatedOperand = readNot(node);
  if (negatedOperand !== undefined) {
    const inner = mapPredicate(negatedOperand);
    return inner ? flipNegation(inner) : undefined;
  }

  const binary = readBinary(node);
  if (!binary) return undefined;
  const column = readColumnRef(binary.left);
  if (!column) return undefined;

  let operator = binary.operator.replace(/\s+/g, ' ');
  let negated = false;
  if (operator.startsWith('NOT ')) {
    negated = true;
    operator = operator.slice('NOT '.length);
  }
  const negation = negated ? { negated: true } : {};

  if (operator === 'IS' || operator === 'IS NOT') {
    if (nodeType(binary.right) !== 'null') return undefined;
    return {
      ...column,
      operator: operator === 'IS' ? CONDITION_OPERATORS.IS_NULL : CONDITION_OPERATORS.IS_NOT_NULL,
      ...negation
    };
  }

  if (operator === 'BETWEEN') {
    const bounds = readExprList(binary.right).map(readLiteral);
    if (bounds.length !== 2) return undefined;
    const [minValue, maxValue] = bounds;
    if (minValue === undefined || maxValue === undefined) return undefined;
    return { ...column, operator: CONDITION_OPERATORS.BETWEEN, minValue, maxValue, ...negation };
  }

  if (operator === 'IN') {
    const values = readExprList(binary.right).map(readLiteral);
    if (values.length === 0 || values.some(v => v === undefined)) return undefined;
    return {
      ...column,
      operator: CONDITION_OPERATORS.IN,
      values: values.filter((v): v is string => v !== undefined),
      ...negation
    };
  }

  const comparison = COMPARISONS[operator];
  if (comparison === undefined) return undefined;
  const value = readLiteral(binary.right) ?? columnText(binary.right);
  if (value === undefined) return undefined;
  return { ...column, operator: comparison, value, ...negation };
}

const columnText = (node: unknown): string | undefined => {
  const ref = readColumnRef(node);
  if (!ref) return undefined;
  return ref.tableName ? `${ref.tableName}.${ref.columnName}` : ref.columnName;
};

const flipNegation = (condition: WhereCondition): WhereCondition => {
  const flipped = { ...condition };
  if (flipped.negated) {
    delete flipped.negated;
  } else {
    flipped.negated = true;
  }
  return flipped;
};

/**
 * Flattens a boolean expression tree into an ordered condition list.
 *
 * AND/OR nodes are walked left to right; each leaf records the connective
 * of the node that joins it to the previous leaf, and the first leaf
 * records none. A NOT over an AND/OR group is pushed down to the leaves,
 * swapping the group's connectives. Leaves that cannot be mapped
 * structurally are rendered and parsed as text; leaves that fail both
 * ways are reported through `onSkipped`.
 */
export function flattenConditionTree(
  node: unknown,
  render: ExpressionRenderer,
  onSkipped: (text: string) => void = () => undefined
): WhereCondition[] {
  const conditions: WhereCondition[] = [];

  const walk = (current: unknown, connective: LogicalOperator | undefined, negated: boolean): void => {
    const binary = readBinary(current);
    if (binary && isLogical(binary.operator)) {
      const operator = negated ? swapConnective(binary.operator) : binary.operator;
      walk(binary.left, connective, negated);
      walk(binary.right, operator, negated);
      return;
    }

    const negatedOperand = readNot(current);
    const negatedGroup = negatedOperand !== undefined ? readBinary(negatedOperand) : undefined;
    if (negatedGroup && isLogical(negatedGroup.operator)) {
      walk(negatedOperand, connective, !negated);
      return;
    }

    let condition = mapPredicate(current);
    if (!condition) {
      const text = render(current);
      condition = parseConditionSegment(text);
      if (!condition) {
        onSkipped(text);
        return;
      }
    }
    if (negated) {
      condition = flipNegation(condition);
    }
    conditions.push(connective ? { ...condition, logicalOperator: connective } : condition);
  };

  if (node !== null && node !== undefined) {
    walk(node, undefined, false);
  }
  return withoutLeadingConnective(conditions);
}

/**
 * Collects the ANDed comparisons of a join's ON expression.
 * Comparisons between two column references map directly; anything else
 * is rendered and parsed as text.
 */
export function flattenJoinTree(node: unknown, render: ExpressionRenderer): JoinCondition[] {
  const conditions: JoinCondition[] = [];

  const walk = (current: unknown): void => {
    const binary = readBinary(current);
    if (binary && binary.operator === 'AND') {
      walk(binary.left);
      walk(binary.right);
      return;
    }

    const left = binary ? readColumnRef(binary.left) : undefined;
    const right = binary ? readColumnRef(binary.right) : undefined;
    if (binary && left && right && isJoinOperator(binary.operator)) {
      conditions.push({
        leftTable: left.tableName,
        leftColumn: left.columnName,
        operator: binary.operator,
        rightTable: right.tableName,
        rightColumn: right.columnName
      });
      return;
    }

    const parsed = parseJoinConditionText(render(current));
    if (parsed) conditions.push(parsed);
  };

  if (node !== null && node !== undefined) {
    walk(node);
  }
  return conditions;
}
