import { JoinCondition, WhereCondition, splitQualifiedName } from '../ast/query-structure.js';
import {
  CONDITION_OPERATORS,
  ConditionOperator,
  JOIN_OPERATORS,
  LogicalOperator,
  VALUE_OPERATORS
} from '../sql/sql.js';

/**
 * Text-level decomposition of boolean predicates.
 *
 * Every search runs over a masked copy of the text in which quoted
 * literals and parenthesized groups are blanked out, so keywords inside
 * `'a AND b'` or `IN ('x', 'y')` are never matched and match offsets map
 * one-to-one onto the original text.
 */

const MASK = '_';

/**
 * Blanks out quoted literals and parenthesized content, keeping the length
 */
export function maskNested(text: string): string {
  let out = '';
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      out += MASK;
      if (ch === quote) {
        if (text[i + 1] === quote) {
          out += MASK;
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      out += MASK;
    } else if (ch === '(') {
      depth++;
      out += MASK;
    } else if (ch === ')') {
      depth = Math.max(0, depth - 1);
      out += MASK;
    } else {
      out += depth > 0 ? MASK : ch;
    }
  }

  return out;
}

const countMatches = (text: string, pattern: RegExp): number => {
  const global = new RegExp(pattern.source, 'g');
  let count = 0;
  while (global.exec(text) !== null) {
    count++;
  }
  return count;
};

/**
 * Finds the first whitespace-delimited occurrence of `token` outside quotes
 * and parentheses. Returns the match bounds in the original text.
 */
const findTopLevel = (text: string, token: string): { start: number; end: number } | undefined => {
  const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`\\s${escaped}\\s`, 'i');
  const match = pattern.exec(maskNested(text));
  return match ? { start: match.index, end: match.index + match[0].length } : undefined;
};

/**
 * Splits on a top-level logical connective.
 *
 * For AND, a candidate is skipped while the BETWEENs seen since the
 * current segment began outnumber the ANDs seen there: that AND closes a
 * `BETWEEN x AND y` range rather than joining two predicates.
 */
export function splitTopLevel(expression: string, operator: LogicalOperator): string[] {
  const masked = maskNested(expression).toUpperCase();
  const pattern = new RegExp(`\\s${operator}\\s`, 'g');
  const parts: string[] = [];
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(masked)) !== null) {
    if (operator === 'AND') {
      const before = masked.slice(start, match.index);
      const betweens = countMatches(before, /\sBETWEEN\s/);
      const ands = countMatches(before, /\sAND\s/);
      if (betweens > ands) continue;
    }
    parts.push(expression.slice(start, match.index));
    start = match.index + match[0].length;
  }
  parts.push(expression.slice(start));

  return parts.map(p => p.trim()).filter(p => p !== '');
}

/**
 * True when the whole text is one parenthesized group, e.g. `(a = 1 OR b = 2)`
 */
export function isWrappedInParens(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed.startsWith('(') || !trimmed.endsWith(')')) return false;

  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (quote !== null) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      // the opening paren closed before the end: `(a) AND (b)`
      if (depth === 0 && i < trimmed.length - 1) return false;
    }
  }
  return depth === 0;
}

/**
 * Removes one pair of surrounding single quotes and undoubles embedded ones
 */
export function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
    return trimmed.slice(1, -1).replace(/''/g, "'");
  }
  return trimmed;
}

/**
 * Splits `('a', 'b', :c)` into `['a', 'b', ':c']`
 */
export function splitValueList(text: string): string[] {
  let body = text.trim();
  if (isWrappedInParens(body)) {
    body = body.slice(1, -1);
  }
  const masked = maskNested(body);
  const items: string[] = [];
  let start = 0;
  for (let i = 0; i < masked.length; i++) {
    if (masked[i] === ',') {
      items.push(body.slice(start, i));
      start = i + 1;
    }
  }
  items.push(body.slice(start));
  return items.map(stripQuotes).filter(v => v !== '');
}

/** `NOT x`, or `NOT(` with no space as rendered by the parser */
const NOT_PREFIX = /^NOT(?:\s+|(?=\())/i;

const withColumn = (left: string, condition: Omit<WhereCondition, 'tableName' | 'columnName'>): WhereCondition => ({
  ...splitQualifiedName(left),
  ...condition
});

/**
 * Parses one atomic predicate such as `u.age >= 18`, `name LIKE 'a%'`,
 * `id IN (1, 2)`, `age BETWEEN 18 AND 65` or `email IS NOT NULL`.
 *
 * Null checks are tried first since they carry no right-hand side, then
 * BETWEEN with its two values, then the remaining value operators.
 * Returns `undefined` when no operator is recognized.
 */
export function parseConditionSegment(segment: string): WhereCondition | undefined {
  let text = segment.trim();
  if (text === '') return undefined;

  let negated = false;
  const notPrefix = NOT_PREFIX.exec(text);
  if (notPrefix) {
    negated = true;
    text = text.slice(notPrefix[0].length).trim();
    if (isWrappedInParens(text)) {
      text = text.slice(1, -1).trim();
    }
  }
  const flags = negated ? { negated } : {};

  const isNotNull = /\s+IS\s+NOT\s+NULL$/i.exec(text);
  if (isNotNull) {
    return withColumn(text.slice(0, isNotNull.index), { operator: CONDITION_OPERATORS.IS_NOT_NULL, ...flags });
  }
  const isNull = /\s+IS\s+NULL$/i.exec(text);
  if (isNull) {
    return withColumn(text.slice(0, isNull.index), { operator: CONDITION_OPERATORS.IS_NULL, ...flags });
  }

  const between = findTopLevel(text, 'BETWEEN');
  if (between) {
    let left = text.slice(0, between.start);
    let rangeNegated = negated;
    const notBefore = /\s+NOT$/i.exec(left);
    if (notBefore) {
      left = left.slice(0, notBefore.index);
      rangeNegated = !rangeNegated;
    }
    const range = text.slice(between.end);
    // the range's own AND is the last top-level one
    const masked = maskNested(range).toUpperCase();
    const andAt = masked.lastIndexOf(' AND ');
    if (andAt > 0) {
      return withColumn(left, {
        operator: CONDITION_OPERATORS.BETWEEN,
        minValue: stripQuotes(range.slice(0, andAt)),
        maxValue: stripQuotes(range.slice(andAt + ' AND '.length)),
        ...(rangeNegated ? { negated: true } : {})
      });
    }
  }

  for (const operator of VALUE_OPERATORS) {
    const found = findTopLevel(text, operator);
    if (!found) continue;

    let left = text.slice(0, found.start);
    const right = text.slice(found.end).trim();
    let opNegated = negated;
    if (operator === 'LIKE' || operator === 'IN') {
      const notBefore = /\s+NOT$/i.exec(left);
      if (notBefore) {
        left = left.slice(0, notBefore.index);
        opNegated = !opNegated;
      }
    }
    const negation = opNegated ? { negated: true } : {};
    const op: ConditionOperator = operator;

    if (operator === 'IN') {
      return withColumn(left, { operator: op, values: splitValueList(right), ...negation });
    }
    return withColumn(left, { operator: op, value: stripQuotes(right), ...negation });
  }

  return undefined;
}

/**
 * Removes the connective from whichever condition ends up first
 */
export function withoutLeadingConnective(conditions: WhereCondition[]): WhereCondition[] {
  if (conditions.length === 0 || conditions[0].logicalOperator === undefined) return conditions;
  const first = { ...conditions[0] };
  delete first.logicalOperator;
  return [first, ...conditions.slice(1)];
}

export const swapConnective = (operator: LogicalOperator): LogicalOperator => (operator === 'AND' ? 'OR' : 'AND');

/**
 * Pushes a NOT through a decomposed group: every condition flips its
 * negation and every connective inside the group swaps AND/OR.
 */
export function negateGroup(conditions: WhereCondition[]): WhereCondition[] {
  return conditions.map(condition => {
    const { negated, logicalOperator, ...rest } = condition;
    return {
      ...rest,
      ...(negated ? {} : { negated: true }),
      ...(logicalOperator ? { logicalOperator: swapConnective(logicalOperator) } : {})
    };
  });
}

const applyConnective = (conditions: WhereCondition[], connective: LogicalOperator | undefined): WhereCondition[] => {
  if (conditions.length === 0) return conditions;
  const [first, ...rest] = withoutLeadingConnective(conditions);
  return [connective ? { ...first, logicalOperator: connective } : first, ...rest];
};

const decompose = (text: string, inherited: LogicalOperator | undefined): WhereCondition[] => {
  const conditions: WhereCondition[] = [];

  splitTopLevel(text, 'OR').forEach((orPart, i) => {
    const orConnective: LogicalOperator | undefined = i > 0 ? 'OR' : inherited;

    splitTopLevel(orPart, 'AND').forEach((andPart, j) => {
      const connective: LogicalOperator | undefined = j > 0 ? 'AND' : orConnective;
      const part = andPart.trim();

      if (isWrappedInParens(part)) {
        conditions.push(...decompose(part.slice(1, -1), connective));
        return;
      }

      const notPrefix = NOT_PREFIX.exec(part);
      const operand = notPrefix ? part.slice(notPrefix[0].length).trim() : '';
      if (notPrefix && isWrappedInParens(operand)) {
        const group = decompose(operand.slice(1, -1), undefined);
        if (group.length > 1) {
          conditions.push(...applyConnective(negateGroup(group), connective));
          return;
        }
      }

      const condition = parseConditionSegment(part);
      if (!condition) return;
      conditions.push(connective ? { ...condition, logicalOperator: connective } : condition);
    });
  });

  return conditions;
};

/**
 * Decomposes a compound predicate into a flat, ordered condition list.
 *
 * The text is split on top-level OR first (lower precedence), then each
 * OR part on top-level AND. A part that is itself a parenthesized group is
 * decomposed recursively; a negated group `NOT (a AND b)` becomes
 * `NOT a OR NOT b`. Each condition records the connective joining it to
 * the previous one; the first carries none.
 */
export function decomposeConditionText(text: string): WhereCondition[] {
  return withoutLeadingConnective(decompose(text, undefined));
}

/**
 * Parses `a.x = b.y` into a join condition; both sides are column references.
 * Returns `undefined` when no join operator is found.
 */
export function parseJoinConditionText(text: string): JoinCondition | undefined {
  const trimmed = text.trim();
  if (trimmed === '') return undefined;

  for (const operator of JOIN_OPERATORS) {
    const found = findTopLevel(trimmed, operator);
    if (!found) continue;
    const left = splitQualifiedName(trimmed.slice(0, found.start));
    const right = splitQualifiedName(trimmed.slice(found.end));
    return {
      leftTable: left.tableName,
      leftColumn: left.columnName,
      operator,
      rightTable: right.tableName,
      rightColumn: right.columnName
    };
  }

  return undefined;
}

/**
 * Splits an ON predicate on top-level AND and parses each comparison.
 * Quoted literals are masked, so an AND inside `'a AND b'` does not split.
 */
export function decomposeJoinConditionText(text: string): JoinCondition[] {
  return splitTopLevel(text, 'AND')
    .map(parseJoinConditionText)
    .filter((c): c is JoinCondition => c !== undefined);
}

const PLAIN_IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_$]*$/u;

const CLOSING_QUOTE: Record<string, string> = { '`': '`', '"': '"', '[': ']' };

/**
 * Removes identifier quoting (`` `name` ``, `"name"`, `[name]`) from
 * rendered SQL where the quoted text is a plain identifier.
 * Single-quoted literals are copied through untouched.
 */
export function unquoteIdentifiers(sql: string): string {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (ch === "'") {
      let j = i + 1;
      while (j < sql.length) {
        if (sql[j] === "'" && sql[j + 1] === "'") {
          j += 2;
        } else if (sql[j] === "'") {
          break;
        } else {
          j++;
        }
      }
      out += sql.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    const closing = CLOSING_QUOTE[ch];
    if (closing !== undefined) {
      const end = sql.indexOf(closing, i + 1);
      if (end > i) {
        const inner = sql.slice(i + 1, end);
        out += PLAIN_IDENTIFIER.test(inner) ? inner : sql.slice(i, end + 1);
        i = end + 1;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Classifies a rendered select, group or order expression as `*`,
 * `table.*`, `table.column` or a bare column. The qualifier is everything
 * before the last dot; expressions with calls or spaces stay whole.
 */
export function classifyExpressionText(text: string): { tableName: string; columnName: string } {
  const trimmed = text.trim();
  if (/[\s(]/.test(trimmed)) {
    return { tableName: '', columnName: trimmed };
  }
  const dot = trimmed.lastIndexOf('.');
  if (dot <= 0) {
    return { tableName: '', columnName: trimmed };
  }
  return { tableName: trimmed.slice(0, dot), columnName: trimmed.slice(dot + 1) };
}
