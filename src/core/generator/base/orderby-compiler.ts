import { OrderByColumn } from '../../ast/query-structure.js';
import { SQL_KEYWORDS } from '../../sql/sql.js';
import { qualify } from './identifier.js';

/**
 * Compiler for ORDER BY clauses.
 * Handles compilation of sorting columns with direction (ASC/DESC).
 */
export class OrderByCompiler {
  /**
   * @returns SQL ORDER BY clause (e.g., "ORDER BY u.name ASC, u.id DESC") or empty string if no ordering.
   */
  static compileOrderBy(columns: OrderByColumn[]): string {
    if (columns.length === 0) return '';
    const parts = columns.map(c => {
      const term = qualify(c.tableName, c.columnName);
      return c.direction ? `${term} ${c.direction.toUpperCase()}` : term;
    }).join(', ');
    return `${SQL_KEYWORDS.ORDER_BY} ${parts}`;
  }
}
