import pkg from 'node-sql-parser';
import {
  FromTable,
  GroupByColumn,
  JoinClause,
  OrderByColumn,
  QueryStructure,
  SelectColumn,
  WhereCondition,
  createFallbackStructure,
  createQueryStructure,
  isBlank
} from '../ast/query-structure.js';
import { JOIN_KINDS, JoinKind, ORDER_DIRECTIONS, PARSER_DATABASES, ParserDatabase } from '../sql/sql.js';
import { MapperLogger, describeError, silentLogger } from '../logging/mapper-logger.js';
import {
  classifyExpressionText,
  decomposeConditionText,
  decomposeJoinConditionText,
  unquoteIdentifiers
} from './condition-text.js';
import { flattenConditionTree, flattenJoinTree } from './condition-tree.js';
import {
  AstRecord,
  asArray,
  asString,
  isGrammarSyntaxError,
  isRecord,
  nodeType,
  readColumnRef,
  readInteger
} from './parser-ast.js';

const { Parser } = pkg;

export const REVERSE_ERRORS = {
  EMPTY: 'SQL query is empty',
  NOT_SELECT: 'Only SELECT statements are supported for reverse engineering',
  FAILED: 'Failed to parse SQL: '
} as const;

/**
 * How WHERE and HAVING predicates are decomposed
 * - `tree`: walk the parser's expression tree
 * - `text`: render the predicate and split it textually
 */
export type ConditionStrategy = 'tree' | 'text';

export interface SqlReverseEngineerOptions {
  /** Parser grammar; defaults to MySQL */
  database?: ParserDatabase;
  /** Defaults to `tree` */
  conditionStrategy?: ConditionStrategy;
  logger?: MapperLogger;
}

export type ParseResult =
  | { ok: true; structure: QueryStructure; fallback: boolean }
  | { ok: false; error: string };

/**
 * Converts SQL SELECT text back into a {@link QueryStructure}.
 *
 * Input the grammar cannot tokenize yields an editable `SELECT *` shell
 * (`fallback: true`) rather than an error; input that parses but is not a
 * single SELECT is rejected. Nothing is thrown past `parse`.
 */
export class SqlReverseEngineer {
  private readonly parser = new Parser();
  private readonly database: ParserDatabase;
  private readonly strategy: ConditionStrategy;
  private readonly logger: MapperLogger;

  constructor(options: SqlReverseEngineerOptions = {}) {
    this.database = options.database ?? PARSER_DATABASES.MYSQL;
    this.strategy = options.conditionStrategy ?? 'tree';
    this.logger = options.logger ?? silentLogger;
  }

  parse(sql: string): ParseResult {
    if (isBlank(sql)) {
      return { ok: false, error: REVERSE_ERRORS.EMPTY };
    }

    let ast: unknown;
    try {
      ast = this.parser.astify(sql, { database: this.database });
    } catch (error) {
      if (isGrammarSyntaxError(error)) {
        this.logger({ level: 'warn', message: 'SQL could not be tokenized; returning an empty SELECT *', sql, error });
        return { ok: true, structure: createFallbackStructure(), fallback: true };
      }
      this.logger({ level: 'error', message: 'Failed to parse SQL', sql, error });
      return { ok: false, error: `${REVERSE_ERRORS.FAILED}${describeError(error)}` };
    }

    const statements = asArray(Array.isArray(ast) ? ast : [ast]);
    const statement = statements.length === 1 ? statements[0] : undefined;
    if (!isRecord(statement) || statement.type !== 'select') {
      return { ok: false, error: REVERSE_ERRORS.NOT_SELECT };
    }

    try {
      const structure = this.mapSelect(statement);
      this.logger({ level: 'debug', message: 'Reverse engineered SQL into query structure', sql });
      return { ok: true, structure, fallback: false };
    } catch (error) {
      this.logger({ level: 'error', message: 'Failed to parse SQL', sql, error });
      return { ok: false, error: `${REVERSE_ERRORS.FAILED}${describeError(error)}` };
    }
  }

  private mapSelect(select: AstRecord): QueryStructure {
    const { fromTables, joins } = this.mapFrom(select.from);
    const limits = this.mapLimit(select.limit);
    return createQueryStructure({
      selectColumns: this.mapColumns(select.columns),
      fromTables,
      joins,
      whereConditions: this.mapConditions(select.where),
      groupByColumns: this.mapGroupBy(select.groupby),
      havingConditions: this.mapConditions(select.having),
      orderByColumns: this.mapOrderBy(select.orderby),
      distinct: isDistinct(select.distinct),
      ...limits
    });
  }

  private render(node: unknown): string {
    return unquoteIdentifiers(this.parser.exprToSQL(node, { database: this.database }));
  }

  private mapColumns(columns: unknown): SelectColumn[] {
    if (columns === '*') {
      return [{ tableName: '', columnName: '*' }];
    }
    return asArray(columns).filter(isRecord).map(item => {
      const alias = asString(item.as);
      const aliasPart = alias !== undefined && alias !== '' ? { alias } : {};
      return { ...this.mapSelectExpression(item.expr), ...aliasPart };
    });
  }

  private mapSelectExpression(expr: unknown): SelectColumn {
    if (isRecord(expr) && expr.type === 'aggr_func') {
      const name = asString(expr.name) ?? '';
      const args = isRecord(expr.args) ? expr.args : {};
      const argument = this.columnOf(args.expr);
      const distinct = asString(args.distinct)?.toUpperCase() === 'DISTINCT';
      return {
        ...argument,
        aggregateFunction: name.toUpperCase(),
        ...(distinct ? { distinct: true } : {})
      };
    }
    return this.columnOf(expr);
  }

  /**
   * Column references map directly; `*` and anything else are rendered
   */
  private columnOf(expr: unknown): { tableName: string; columnName: string } {
    if (nodeType(expr) === 'star') {
      return { tableName: '', columnName: '*' };
    }
    return readColumnRef(expr) ?? classifyExpressionText(this.render(expr));
  }

  private mapFrom(from: unknown): { fromTables: FromTable[]; joins: JoinClause[] } {
    const fromTables: FromTable[] = [];
    const joins: JoinClause[] = [];

    for (const item of asArray(from).filter(isRecord)) {
      const table = asString(item.table);
      if (table === undefined) {
        this.logger({ level: 'debug', message: 'Skipping derived table in FROM' });
        continue;
      }
      const schema = asString(item.db) ?? asString(item.schema);
      const tableName = schema ? `${schema}.${table}` : table;
      const alias = asString(item.as);
      const aliasPart = alias !== undefined && alias !== '' ? { alias } : {};

      const keyword = asString(item.join);
      if (keyword === undefined) {
        fromTables.push({ tableName, ...aliasPart });
        continue;
      }
      joins.push({
        joinType: joinKindOf(keyword),
        tableName,
        ...aliasPart,
        conditions: this.mapJoinConditions(item.on)
      });
    }

    return { fromTables, joins };
  }

  private mapJoinConditions(on: unknown): JoinClause['conditions'] {
    if (on === null || on === undefined) return [];
    return this.strategy === 'tree'
      ? flattenJoinTree(on, node => this.render(node))
      : decomposeJoinConditionText(this.render(on));
  }

  private mapConditions(expr: unknown): WhereCondition[] {
    if (expr === null || expr === undefined) return [];
    if (this.strategy === 'text') {
      return decomposeConditionText(this.render(expr));
    }
    return flattenConditionTree(
      expr,
      node => this.render(node),
      text => this.logger({ level: 'warn', message: `Dropping unrecognized condition: ${text}` })
    );
  }

  private mapGroupBy(groupby: unknown): GroupByColumn[] {
    const items = isRecord(groupby) ? asArray(groupby.columns) : asArray(groupby);
    return items.map(item => this.columnOf(item));
  }

  private mapOrderBy(orderby: unknown): OrderByColumn[] {
    return asArray(orderby).filter(isRecord).map(item => ({
      ...this.columnOf(item.expr),
      direction: asString(item.type)?.toUpperCase() === 'DESC' ? ORDER_DIRECTIONS.DESC : ORDER_DIRECTIONS.ASC
    }));
  }

  /**
   * Reads `LIMIT n`, `LIMIT n OFFSET m` and `LIMIT m, n`
   */
  private mapLimit(limit: unknown): { limit?: number; offset?: number } {
    if (!isRecord(limit)) return {};
    const values = asArray(limit.value).map(readInteger);
    if (values.length === 0) return {};

    const separator = asString(limit.seperator) ?? asString(limit.separator) ?? '';
    const [first, second] = values;
    if (separator === ',' && second !== undefined) {
      return { limit: second, ...(first !== undefined ? { offset: first } : {}) };
    }
    return {
      ...(first !== undefined ? { limit: first } : {}),
      ...(second !== undefined ? { offset: second } : {})
    };
  }
}

/**
 * Maps a parser join keyword (`LEFT OUTER JOIN`, `JOIN`, ...) onto a join kind
 */
export const joinKindOf = (keyword: string): JoinKind => {
  const upper = keyword.toUpperCase();
  if (upper.includes('LEFT')) return JOIN_KINDS.LEFT;
  if (upper.includes('RIGHT')) return JOIN_KINDS.RIGHT;
  if (upper.includes('FULL')) return JOIN_KINDS.FULL;
  return JOIN_KINDS.INNER;
};

const isDistinct = (distinct: unknown): boolean => {
  if (typeof distinct === 'string') return distinct.toUpperCase() === 'DISTINCT';
  return isRecord(distinct) && asString(distinct.type)?.toUpperCase() === 'DISTINCT';
};

/**
 * Reverse engineers with a default-configured {@link SqlReverseEngineer}
 */
export const parseSql = (sql: string, options: SqlReverseEngineerOptions = {}): ParseResult =>
  new SqlReverseEngineer(options).parse(sql);
