import { isBlank } from '../ast/query-structure.js';

/**
 * Lightweight textual checks deciding whether a query can be paged by
 * appending LIMIT/OFFSET. Matching is regex based and does not look
 * inside the statement's structure.
 */

const LIMIT_PATTERN = /\blimit\s+\d+/i;
const OFFSET_PATTERN = /\boffset\s+\d+/i;
const ORDER_BY_PATTERN = /\border\s+by\s+/i;

const READ_PREFIXES = ['select', 'with', 'show', 'describe', 'desc', 'explain'] as const;

export const PAGING_COMPATIBILITY = {
  COMPATIBLE: 'COMPATIBLE',
  NOT_SELECT: 'NOT_SELECT',
  HAS_LIMIT_OFFSET: 'HAS_LIMIT_OFFSET',
  NO_ORDER_BY: 'NO_ORDER_BY'
} as const;

export type PagingCompatibility = (typeof PAGING_COMPATIBILITY)[keyof typeof PAGING_COMPATIBILITY];

const DESCRIPTIONS: Record<PagingCompatibility, string> = {
  COMPATIBLE: 'Compatible with pagination',
  NOT_SELECT: 'Not a SELECT query',
  HAS_LIMIT_OFFSET: 'Already contains LIMIT/OFFSET clause',
  NO_ORDER_BY: 'No ORDER BY clause (results may be inconsistent)'
};

export const hasLimitClause = (sql: string | undefined | null): boolean =>
  !isBlank(sql) && LIMIT_PATTERN.test(sql ?? '');

export const hasOffsetClause = (sql: string | undefined | null): boolean =>
  !isBlank(sql) && OFFSET_PATTERN.test(sql ?? '');

export const hasPagingConflict = (sql: string | undefined | null): boolean =>
  hasLimitClause(sql) || hasOffsetClause(sql);

export const hasOrderByClause = (sql: string | undefined | null): boolean =>
  !isBlank(sql) && ORDER_BY_PATTERN.test(sql ?? '');

/**
 * True for statements that read rows: SELECT, WITH, SHOW, DESCRIBE/DESC, EXPLAIN
 */
export const isSelectQuery = (sql: string | undefined | null): boolean => {
  if (sql === undefined || sql === null || isBlank(sql)) return false;
  const lowered = sql.trim().toLowerCase();
  return READ_PREFIXES.some(prefix => lowered.startsWith(prefix));
};

export const isSuitableForPaging = (sql: string | undefined | null): boolean =>
  getPagingCompatibility(sql) === PAGING_COMPATIBILITY.COMPATIBLE;

/**
 * Checks are applied in order: statement kind, existing LIMIT/OFFSET, ORDER BY
 */
export function getPagingCompatibility(sql: string | undefined | null): PagingCompatibility {
  if (!isSelectQuery(sql)) {
    return PAGING_COMPATIBILITY.NOT_SELECT;
  }
  if (hasPagingConflict(sql)) {
    return PAGING_COMPATIBILITY.HAS_LIMIT_OFFSET;
  }
  if (!hasOrderByClause(sql)) {
    return PAGING_COMPATIBILITY.NO_ORDER_BY;
  }
  return PAGING_COMPATIBILITY.COMPATIBLE;
}

export const describePagingCompatibility = (status: PagingCompatibility): string =>
  DESCRIPTIONS[status];

/**
 * Paging may proceed with a warning when only ORDER BY is missing
 */
export const allowsPagingWithWarning = (status: PagingCompatibility): boolean =>
  status === PAGING_COMPATIBILITY.NO_ORDER_BY;
