/**
 * Narrowing helpers over node-sql-parser output.
 *
 * The parser's published typings are loose and its node shapes differ
 * between releases and grammars (a column may be a string or
 * `{ expr: { type: 'default', value } }`, GROUP BY may be an array or
 * `{ columns }`, the limit separator is spelled `seperator`). Nodes are
 * therefore read as `unknown` and narrowed field by field.
 */

export type AstRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is AstRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const asString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export const asArray = (value: unknown): unknown[] =>
  Array.isArray(value) ? value : [];

export const nodeType = (node: unknown): string | undefined =>
  isRecord(node) ? asString(node.type) : undefined;

/**
 * A column reference resolved to its qualifier and name
 */
export interface ColumnRefParts {
  tableName: string;
  columnName: string;
}

/**
 * Reads a `column_ref` node; `*` and `t.*` are returned with column `*`
 */
export function readColumnRef(node: unknown): ColumnRefParts | undefined {
  if (!isRecord(node) || node.type !== 'column_ref') return undefined;

  let columnName: string | undefined;
  if (typeof node.column === 'string') {
    columnName = node.column;
  } else if (isRecord(node.column) && isRecord(node.column.expr)) {
    const value = node.column.expr.value;
    if (typeof value === 'string' || typeof value === 'number') {
      columnName = String(value);
    }
  }
  if (columnName === undefined) return undefined;

  const tableName = asString(node.table) ?? '';
  const schema = asString(node.schema) ?? asString(node.db);
  return {
    tableName: schema && tableName ? `${schema}.${tableName}` : tableName,
    columnName
  };
}

const STRING_LITERAL_TYPES = new Set([
  'string',
  'single_quote_string',
  'double_quote_string',
  'natural_string',
  'regex_string',
  'hex_string',
  'full_hex_string',
  'bit_string',
  'backticks_quote_string'
]);

/**
 * Reads a literal or parameter node as the text a condition stores:
 * strings unquoted, numbers as written, parameters as `:name`.
 */
export function readLiteral(node: unknown): string | undefined {
  if (!isRecord(node)) return undefined;
  const type = asString(node.type);
  const value = node.value;

  if (type === 'param') {
    return typeof value === 'string' ? `:${value}` : undefined;
  }
  if (type === 'number' || type === 'bigint') {
    return typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint'
      ? String(value)
      : undefined;
  }
  if (type === 'bool' || type === 'boolean') {
    return typeof value === 'boolean' ? String(value).toUpperCase() : undefined;
  }
  if (type !== undefined && STRING_LITERAL_TYPES.has(type)) {
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Reads the items of an `expr_list` node
 */
export const readExprList = (node: unknown): unknown[] =>
  isRecord(node) && node.type === 'expr_list' ? asArray(node.value) : [];

/**
 * Reads an integer from a number literal node
 */
export function readInteger(node: unknown): number | undefined {
  if (!isRecord(node)) return undefined;
  const n = typeof node.value === 'number' ? node.value : Number(node.value);
  return Number.isInteger(n) ? n : undefined;
}

/**
 * A binary expression split into its operator and operands
 */
export interface BinaryParts {
  operator: string;
  left: unknown;
  right: unknown;
}

export function readBinary(node: unknown): BinaryParts | undefined {
  if (!isRecord(node) || node.type !== 'binary_expr') return undefined;
  const operator = asString(node.operator);
  if (operator === undefined) return undefined;
  return { operator: operator.toUpperCase(), left: node.left, right: node.right };
}

/**
 * Reads `NOT <expr>`; returns the negated operand
 */
export function readNot(node: unknown): unknown {
  if (!isRecord(node) || node.type !== 'unary_expr') return undefined;
  const operator = asString(node.operator);
  return operator !== undefined && operator.toUpperCase() === 'NOT' ? node.expr : undefined;
}

/**
 * Error thrown by the parser's generated grammar for malformed input
 */
export function isGrammarSyntaxError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'SyntaxError' || ('expected' in error && 'found' in error);
}
