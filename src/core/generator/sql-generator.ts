import { QueryStructure, SelectColumn, FromTable, isBlank } from '../ast/query-structure.js';
import { SQL_KEYWORDS } from '../sql/sql.js';
import { detectParameters } from '../parameters/parameter-extractor.js';
import { MapperLogger, describeError, silentLogger } from '../logging/mapper-logger.js';
import { ConditionCompiler } from './base/condition-compiler.js';
import { JoinCompiler } from './base/join-compiler.js';
import { GroupByCompiler } from './base/groupby-compiler.js';
import { OrderByCompiler } from './base/orderby-compiler.js';
import { PaginationStrategy, StandardLimitOffsetPagination } from './base/pagination-strategy.js';
import { aliasSuffix, qualify } from './base/identifier.js';
import { validateQueryStructure } from './validation.js';

/**
 * Per-call rendering options
 */
export interface GenerateOptions {
  /** Put each major clause on its own line */
  format?: boolean;
}

export interface SqlGeneratorOptions {
  logger?: MapperLogger;
  /** Defaults to LIMIT/OFFSET */
  pagination?: PaginationStrategy;
}

/**
 * Rendered SQL plus the parameters it references
 */
export interface GeneratedSql {
  ok: true;
  sql: string;
  /** Parameter name to inferred type, for display only */
  detectedParameters: Record<string, string>;
  buildTimeMs: number;
}

/**
 * Every problem found in the structure; no SQL is produced
 */
export interface GenerateFailure {
  ok: false;
  errors: string[];
}

export type GenerateResult = GeneratedSql | GenerateFailure;

/**
 * Renders a {@link QueryStructure} into SQL text.
 *
 * Clauses are emitted in fixed order: SELECT, FROM, JOIN, WHERE, GROUP BY,
 * HAVING, ORDER BY, LIMIT/OFFSET. Each clause is compiled by its own
 * compiler; this class validates and orchestrates them.
 */
export class SqlGenerator {
  private readonly logger: MapperLogger;
  private readonly pagination: PaginationStrategy;

  constructor(options: SqlGeneratorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.pagination = options.pagination ?? new StandardLimitOffsetPagination();
  }

  /**
   * Validates and renders the structure.
   * Never throws: validation problems and internal faults come back as `ok: false`.
   */
  generate(structure: QueryStructure, options: GenerateOptions = {}): GenerateResult {
    const startedAt = Date.now();

    try {
      const errors = validateQueryStructure(structure);
      if (errors.length > 0) {
        return { ok: false, errors };
      }

      const clauses = this.compileClauses(structure);
      const sql = clauses.join(options.format ? '\n' : ' ');
      const detectedParameters = detectParameters(sql);
      this.logger({ level: 'debug', message: 'Generated SQL from query structure', sql });
      return {
        ok: true,
        sql,
        detectedParameters,
        buildTimeMs: Date.now() - startedAt
      };
    } catch (error) {
      this.logger({ level: 'error', message: 'Failed to build query', error });
      return { ok: false, errors: [`Failed to build query: ${describeError(error)}`] };
    }
  }

  /**
   * Compiles each non-empty clause, in emission order
   */
  protected compileClauses(structure: QueryStructure): string[] {
    const clauses = [
      this.compileSelect(structure),
      this.compileFrom(structure.fromTables),
      ...JoinCompiler.compileJoins(structure.joins),
      ConditionCompiler.compileClause(SQL_KEYWORDS.WHERE, structure.whereConditions),
      GroupByCompiler.compileGroupBy(structure.groupByColumns),
      ConditionCompiler.compileClause(SQL_KEYWORDS.HAVING, structure.havingConditions),
      OrderByCompiler.compileOrderBy(structure.orderByColumns),
      this.pagination.compilePagination(structure.limit, structure.offset)
    ];
    return clauses.filter(clause => clause !== '');
  }

  /**
   * DISTINCT applies when the structure or any single column asks for it
   */
  protected compileSelect(structure: QueryStructure): string {
    const distinct = structure.distinct || structure.selectColumns.some(c => c.distinct === true);
    const columns = structure.selectColumns.map(c => this.compileSelectColumn(c)).join(', ');
    return `${SQL_KEYWORDS.SELECT} ${distinct ? `${SQL_KEYWORDS.DISTINCT} ` : ''}${columns}`;
  }

  protected compileSelectColumn(column: SelectColumn): string {
    const term = qualify(column.tableName, column.columnName);
    const fn = column.aggregateFunction;
    const expr = fn !== undefined && !isBlank(fn) ? `${fn.toUpperCase()}(${term})` : term;
    return `${expr}${aliasSuffix(column.alias)}`;
  }

  protected compileFrom(tables: FromTable[]): string {
    const list = tables.map(t => `${t.tableName}${aliasSuffix(t.alias)}`).join(', ');
    return `${SQL_KEYWORDS.FROM} ${list}`;
  }
}

/**
 * Renders a structure with a default generator
 */
export const generateSql = (structure: QueryStructure, options: GenerateOptions = {}): GenerateResult =>
  new SqlGenerator().generate(structure, options);
