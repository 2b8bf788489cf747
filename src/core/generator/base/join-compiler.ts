import { JoinClause, JoinCondition } from '../../ast/query-structure.js';
import { SQL_KEYWORDS } from '../../sql/sql.js';
import { aliasSuffix, qualify } from './identifier.js';

/**
 * Compiler for JOIN clauses.
 * Handles INNER, LEFT, RIGHT and FULL OUTER joins; conditions are ANDed.
 */
export class JoinCompiler {
  /**
   * Compiles one join per entry, in order.
   * @returns One SQL fragment per join (e.g. "INNER JOIN profiles AS p ON u.id = p.user_id")
   */
  static compileJoins(joins: JoinClause[]): string[] {
    return joins.map(join => {
      const table = `${join.tableName}${aliasSuffix(join.alias)}`;
      const head = `${join.joinType.toUpperCase()} ${SQL_KEYWORDS.JOIN} ${table}`;
      if (join.conditions.length === 0) return head;
      const predicate = join.conditions.map(JoinCompiler.compileCondition).join(' AND ');
      return `${head} ${SQL_KEYWORDS.ON} ${predicate}`;
    });
  }

  static compileCondition(condition: JoinCondition): string {
    const left = qualify(condition.leftTable, condition.leftColumn);
    const right = qualify(condition.rightTable, condition.rightColumn);
    return `${left} ${condition.operator} ${right}`;
  }
}
