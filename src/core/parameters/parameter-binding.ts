import { extractParameterPositions } from './parameter-extractor.js';

/**
 * Parameter type names accepted by {@link coerceParameterValue}
 */
export type ParameterType =
  | 'string'
  | 'varchar'
  | 'int'
  | 'integer'
  | 'long'
  | 'bigint'
  | 'double'
  | 'decimal'
  | 'numeric'
  | 'boolean'
  | 'date'
  | 'time'
  | 'datetime'
  | 'timestamp';

/**
 * Raised when a named parameter cannot be bound: no value was supplied
 * for it, or its value does not fit the declared type.
 */
export class ParameterBindingError extends Error {
  constructor(
    message: string,
    public readonly parameterName: string
  ) {
    super(message);
    this.name = 'ParameterBindingError';
  }
}

export interface BindOptions {
  /** Declared type per parameter name; undeclared parameters are bound as given */
  types?: Record<string, string>;
}

/**
 * Positional form of a named-parameter query
 */
export interface BoundQuery {
  /** SQL with every `:name` replaced by `?` */
  sql: string;
  /** One value per placeholder, in source order */
  params: unknown[];
  /** Parameter name behind each placeholder */
  names: string[];
  /** Declared type behind each placeholder, if any */
  types: (string | undefined)[];
}

const pad = (n: number): string => String(n).padStart(2, '0');

const toDate = (value: unknown, name: string): Date => {
  const date = value instanceof Date ? value : new Date(String(value));
  if (Number.isNaN(date.getTime())) {
    throw new ParameterBindingError(`Invalid date value for parameter: ${name}`, name);
  }
  return date;
};

const PLAIN_DATE = /^\d{4}-\d{2}-\d{2}$/;
const PLAIN_TIME = /^\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?$/;
const PLAIN_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?$/;
const INTEGER_TEXT = /^[+-]?\d+$/;

/** Calendar date in the host's local time, as YYYY-MM-DD */
const localDate = (d: Date): string =>
  `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;

/** Wall-clock time in the host's local time, as HH:MM:SS */
const localTime = (d: Date): string =>
  `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;

const toNumber = (value: unknown, name: string): number => {
  const n = typeof value === 'number' ? value : Number(String(value).trim());
  if (Number.isNaN(n) || (typeof value === 'string' && value.trim() === '')) {
    throw new ParameterBindingError(`Invalid numeric value for parameter: ${name}`, name);
  }
  return n;
};

/**
 * 64-bit integers: safe integers bind as numbers, larger integral values as
 * `bigint`, so no digits are lost.
 */
const toLong = (value: unknown, name: string): number | bigint => {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    const exact = BigInt(value.trim());
    const asNumber = Number(exact);
    return Number.isSafeInteger(asNumber) ? asNumber : exact;
  }
  const n = Math.trunc(toNumber(value, name));
  if (!Number.isSafeInteger(n)) {
    throw new ParameterBindingError(`Integer value out of range for parameter: ${name}`, name);
  }
  return n;
};

/**
 * Converts a supplied value to the declared parameter type.
 * `null` and `undefined` bind as `null`; unknown type names pass the value through.
 */
export function coerceParameterValue(value: unknown, type: string | undefined, name = ''): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (!type) {
    return value;
  }

  switch (type.toLowerCase()) {
    case 'string':
    case 'varchar':
      return String(value);
    case 'int':
    case 'integer':
      return Math.trunc(toNumber(value, name));
    case 'long':
    case 'bigint':
      return toLong(value, name);
    case 'double':
    case 'decimal':
    case 'numeric':
      return toNumber(value, name);
    case 'boolean':
      return value === true || value === 1 || value === 'true' || value === '1';
    case 'date': {
      if (typeof value === 'string' && PLAIN_DATE.test(value)) {
        return value;
      }
      return localDate(toDate(value, name));
    }
    case 'time': {
      if (typeof value === 'string' && PLAIN_TIME.test(value)) {
        return value.length === 5 ? `${value}:00` : value;
      }
      return localTime(toDate(value, name));
    }
    case 'datetime':
    case 'timestamp':
      // wall-clock values stay as written; values with a zone become UTC instants
      if (typeof value === 'string' && PLAIN_DATE_TIME.test(value)) {
        return value;
      }
      return toDate(value, name).toISOString();
    default:
      return value;
  }
}

/**
 * Rewrites named parameters into positional `?` placeholders.
 *
 * Replacements are applied from the last occurrence backwards so the
 * offsets of occurrences not yet replaced stay valid; a forward
 * "replace first `:name`" pass breaks when one name prefixes another
 * (`:id` / `:identifier`) or a name repeats.
 *
 * @param values - Values by parameter name; names not used by the SQL are ignored
 * @throws ParameterBindingError when a placeholder has no supplied value
 */
export function bindNamedParameters(
  sql: string,
  values: Record<string, unknown>,
  options: BindOptions = {}
): BoundQuery {
  const positions = extractParameterPositions(sql);
  if (positions.length === 0) {
    return { sql, params: [], names: [], types: [] };
  }

  for (const position of positions) {
    if (!Object.prototype.hasOwnProperty.call(values, position.name)) {
      throw new ParameterBindingError(`Parameter not provided: ${position.name}`, position.name);
    }
  }

  let rewritten = sql;
  for (let i = positions.length - 1; i >= 0; i--) {
    const { start, end } = positions[i];
    rewritten = `${rewritten.slice(0, start)}?${rewritten.slice(end)}`;
  }

  const types = options.types ?? {};
  return {
    sql: rewritten,
    params: positions.map(p => coerceParameterValue(values[p.name], types[p.name], p.name)),
    names: positions.map(p => p.name),
    types: positions.map(p => types[p.name])
  };
}
