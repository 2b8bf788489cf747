import { GroupByColumn } from '../../ast/query-structure.js';
import { SQL_KEYWORDS } from '../../sql/sql.js';
import { qualify } from './identifier.js';

/**
 * Compiler for GROUP BY clauses.
 */
export class GroupByCompiler {
  /**
   * @returns SQL GROUP BY clause (e.g., "GROUP BY u.status, u.role") or empty string if no grouping.
   */
  static compileGroupBy(columns: GroupByColumn[]): string {
    if (columns.length === 0) return '';
    const terms = columns.map(c => qualify(c.tableName, c.columnName)).join(', ');
    return `${SQL_KEYWORDS.GROUP_BY} ${terms}`;
  }
}
