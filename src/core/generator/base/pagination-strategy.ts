import { SQL_KEYWORDS } from '../../sql/sql.js';

/**
 * Strategy interface for compiling pagination clauses.
 * Allows callers to customize how pagination (LIMIT/OFFSET, FETCH FIRST, etc.) is generated.
 */
export interface PaginationStrategy {
  /**
   * Compiles pagination logic into SQL clause.
   * @param limit - The limit value, if present.
   * @param offset - The offset value, if present.
   * @returns SQL pagination clause (e.g., "LIMIT 10 OFFSET 20") or empty string if no pagination.
   */
  compilePagination(limit?: number, offset?: number): string;
}

/**
 * Standard SQL pagination using LIMIT and OFFSET.
 * Non-positive values are treated as absent, and OFFSET is only emitted
 * together with a LIMIT.
 */
export class StandardLimitOffsetPagination implements PaginationStrategy {
  compilePagination(limit?: number, offset?: number): string {
    if (limit === undefined || limit <= 0) return '';
    if (offset === undefined || offset <= 0) return `${SQL_KEYWORDS.LIMIT} ${limit}`;
    return `${SQL_KEYWORDS.LIMIT} ${limit} ${SQL_KEYWORDS.OFFSET} ${offset}`;
  }
}

/**
 * ANSI `OFFSET ... ROWS FETCH NEXT ... ROWS ONLY` pagination
 */
export class FetchFirstPagination implements PaginationStrategy {
  compilePagination(limit?: number, offset?: number): string {
    if (limit === undefined || limit <= 0) return '';
    const skip = offset !== undefined && offset > 0 ? offset : 0;
    return `${SQL_KEYWORDS.OFFSET} ${skip} ROWS FETCH NEXT ${limit} ROWS ONLY`;
  }
}
