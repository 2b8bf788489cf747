import {
  QueryStructure,
  SelectColumn,
  WhereCondition,
  JoinCondition,
  createQueryStructure
} from '../core/ast/query-structure.js';
import { ColumnInput, toColumn } from '../core/ast/condition-builders.js';
import { JOIN_KINDS, JoinKind, ORDER_DIRECTIONS, OrderDirection } from '../core/sql/sql.js';

const cloneCondition = (c: WhereCondition): WhereCondition =>
  c.values ? { ...c, values: [...c.values] } : { ...c };

/**
 * Copies every list so a built structure never shares arrays with the builder
 */
const cloneStructure = (state: QueryStructure): QueryStructure => ({
  ...state,
  selectColumns: state.selectColumns.map(c => ({ ...c })),
  fromTables: state.fromTables.map(t => ({ ...t })),
  joins: state.joins.map(j => ({ ...j, conditions: j.conditions.map(c => ({ ...c })) })),
  whereConditions: state.whereConditions.map(cloneCondition),
  havingConditions: state.havingConditions.map(cloneCondition),
  groupByColumns: state.groupByColumns.map(c => ({ ...c })),
  orderByColumns: state.orderByColumns.map(c => ({ ...c }))
});

/**
 * Immutable fluent builder for {@link QueryStructure}.
 * Every method returns a new builder; the receiver is left untouched.
 *
 * @example
 * const structure = new QueryStructureBuilder()
 *   .select('u.id')
 *   .select('u.name', { alias: 'userName' })
 *   .from('users', 'u')
 *   .where(eq('u.status', ':status'))
 *   .orderBy('u.name')
 *   .limit(20)
 *   .build();
 */
export class QueryStructureBuilder {
  private readonly state: QueryStructure;

  constructor(initial?: Partial<QueryStructure>) {
    this.state = cloneStructure(createQueryStructure(initial));
  }

  private clone(patch: Partial<QueryStructure>): QueryStructureBuilder {
    return new QueryStructureBuilder({ ...this.state, ...patch });
  }

  /**
   * Adds a column to the SELECT list
   * @param column - `table.column`, `column` or `*`
   */
  select(column: ColumnInput, options: Pick<SelectColumn, 'alias' | 'distinct'> = {}): QueryStructureBuilder {
    const next: SelectColumn = { ...toColumn(column), ...options };
    return this.clone({ selectColumns: [...this.state.selectColumns, next] });
  }

  /**
   * Adds an aggregated column, e.g. `COUNT(*) AS total`
   */
  selectAggregate(fn: string, column: ColumnInput, alias?: string): QueryStructureBuilder {
    const next: SelectColumn = { ...toColumn(column), aggregateFunction: fn, alias };
    return this.clone({ selectColumns: [...this.state.selectColumns, next] });
  }

  from(tableName: string, alias?: string): QueryStructureBuilder {
    return this.clone({ fromTables: [...this.state.fromTables, { tableName, alias }] });
  }

  join(
    joinType: JoinKind,
    tableName: string,
    alias: string | undefined,
    ...conditions: JoinCondition[]
  ): QueryStructureBuilder {
    return this.clone({
      joins: [...this.state.joins, { joinType, tableName, alias, conditions }]
    });
  }

  innerJoin(tableName: string, alias: string | undefined, ...conditions: JoinCondition[]): QueryStructureBuilder {
    return this.join(JOIN_KINDS.INNER, tableName, alias, ...conditions);
  }

  leftJoin(tableName: string, alias: string | undefined, ...conditions: JoinCondition[]): QueryStructureBuilder {
    return this.join(JOIN_KINDS.LEFT, tableName, alias, ...conditions);
  }

  /**
   * Appends WHERE conditions; each keeps its own logical operator
   */
  where(...conditions: WhereCondition[]): QueryStructureBuilder {
    return this.clone({ whereConditions: [...this.state.whereConditions, ...conditions] });
  }

  having(...conditions: WhereCondition[]): QueryStructureBuilder {
    return this.clone({ havingConditions: [...this.state.havingConditions, ...conditions] });
  }

  groupBy(column: ColumnInput): QueryStructureBuilder {
    return this.clone({ groupByColumns: [...this.state.groupByColumns, toColumn(column)] });
  }

  orderBy(column: ColumnInput, direction: OrderDirection = ORDER_DIRECTIONS.ASC): QueryStructureBuilder {
    return this.clone({
      orderByColumns: [...this.state.orderByColumns, { ...toColumn(column), direction }]
    });
  }

  distinct(flag = true): QueryStructureBuilder {
    return this.clone({ distinct: flag });
  }

  limit(n: number): QueryStructureBuilder {
    return this.clone({ limit: n });
  }

  offset(n: number): QueryStructureBuilder {
    return this.clone({ offset: n });
  }

  /**
   * Returns a fresh structure; later builder calls do not affect it
   */
  build(): QueryStructure {
    return cloneStructure(this.state);
  }
}
