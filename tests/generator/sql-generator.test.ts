import { describe, it, expect, vi } from 'vitest';
import { SqlGenerator, generateSql } from '../../src/core/generator/sql-generator.js';
import { FetchFirstPagination } from '../../src/core/generator/base/pagination-strategy.js';
import { VALIDATION_MESSAGES } from '../../src/core/generator/validation.js';
import { createQueryStructure } from '../../src/core/ast/query-structure.js';
import {
  between,
  eq,
  gt,
  gte,
  inList,
  isNull,
  like,
  not,
  on,
  or
} from '../../src/core/ast/condition-builders.js';
import { QueryStructureBuilder } from '../../src/query-builder/query-structure-builder.js';

const sqlOf = (result: ReturnType<typeof generateSql>): string => {
  if (!result.ok) {
    throw new Error(`expected SQL, got errors: ${result.errors.join('; ')}`);
  }
  return result.sql;
};

describe('SqlGenerator', () => {
  it('renders a single column from a single table', () => {
    const structure = createQueryStructure({
      selectColumns: [{ columnName: 'id' }],
      fromTables: [{ tableName: 'users' }]
    });

    expect(sqlOf(generateSql(structure))).toBe('SELECT id FROM users');
  });

  it('renders an aliased aggregate', () => {
    const structure = createQueryStructure({
      selectColumns: [{ columnName: '*', aggregateFunction: 'COUNT', alias: 'total' }],
      fromTables: [{ tableName: 'users' }]
    });

    expect(sqlOf(generateSql(structure))).toBe('SELECT COUNT(*) AS total FROM users');
  });

  it('renders an inner join with aliases', () => {
    const structure = new QueryStructureBuilder()
      .select('u.id')
      .from('users', 'u')
      .innerJoin('profiles', 'p', on('u.id', '=', 'p.user_id'))
      .build();

    expect(sqlOf(generateSql(structure))).toBe(
      'SELECT u.id FROM users AS u INNER JOIN profiles AS p ON u.id = p.user_id'
    );
  });

  it('emits every clause in fixed order', () => {
    const structure = new QueryStructureBuilder()
      .select('u.status')
      .selectAggregate('count', 'u.id', 'n')
      .from('users', 'u')
      .leftJoin('orders', 'o', on('u.id', '=', 'o.user_id'))
      .where(gte('u.age', 18), or(like('u.name', 'A%')))
      .groupBy('u.status')
      .having(gt({ columnName: 'COUNT(u.id)' }, 1))
      .orderBy('u.status', 'DESC')
      .limit(10)
      .offset(20)
      .build();

    expect(sqlOf(generateSql(structure))).toBe(
      "SELECT u.status, COUNT(u.id) AS n FROM users AS u LEFT JOIN orders AS o ON u.id = o.user_id " +
        "WHERE u.age >= '18' OR u.name LIKE 'A%' GROUP BY u.status HAVING COUNT(u.id) > '1' " +
        'ORDER BY u.status DESC LIMIT 10 OFFSET 20'
    );
  });

  it('renders IN, BETWEEN, null checks and negation', () => {
    const structure = new QueryStructureBuilder()
      .select('*')
      .from('users')
      .where(
        inList('status', ['a', 'b']),
        between('age', 18, ':maxAge'),
        isNull('deleted_at'),
        not(eq('role', 'admin'))
      )
      .build();

    expect(sqlOf(generateSql(structure))).toBe(
      "SELECT * FROM users WHERE status IN ('a', 'b') AND age BETWEEN '18' AND :maxAge " +
        "AND deleted_at IS NULL AND NOT role = 'admin'"
    );
  });

  it('leaves named parameters in an IN list unquoted', () => {
    const structure = new QueryStructureBuilder()
      .select('*')
      .from('users')
      .where(inList('id', [':first', ':second', 'x']))
      .build();

    const result = generateSql(structure);

    expect(sqlOf(result)).toBe("SELECT * FROM users WHERE id IN (:first, :second, 'x')");
    expect(result.ok && result.detectedParameters).toEqual({ first: 'string', second: 'string' });
  });

  it('puts each clause on its own line when formatting', () => {
    const structure = new QueryStructureBuilder()
      .select('id')
      .from('users')
      .where(eq('id', ':id'))
      .build();

    const result = generateSql(structure, { format: true });

    expect(sqlOf(result)).toBe('SELECT id\nFROM users\nWHERE id = :id');
    expect(result.ok && result.detectedParameters).toEqual({ id: 'string' });
  });

  it('is deterministic', () => {
    const structure = new QueryStructureBuilder()
      .select('name', { distinct: true })
      .from('users')
      .orderBy('name')
      .build();
    const generator = new SqlGenerator();

    const first = sqlOf(generator.generate(structure));
    expect(sqlOf(generator.generate(structure))).toBe(first);
    expect(first).toBe('SELECT DISTINCT name FROM users ORDER BY name ASC');
  });

  it('drops an offset that has no limit', () => {
    const structure = new QueryStructureBuilder().select('id').from('users').offset(5).build();
    expect(sqlOf(generateSql(structure))).toBe('SELECT id FROM users');
  });

  it('uses the configured pagination strategy', () => {
    const structure = new QueryStructureBuilder().select('id').from('users').limit(10).build();
    const generator = new SqlGenerator({ pagination: new FetchFirstPagination() });

    expect(sqlOf(generator.generate(structure))).toBe(
      'SELECT id FROM users OFFSET 0 ROWS FETCH NEXT 10 ROWS ONLY'
    );
  });

  it('reports every validation problem at once', () => {
    expect(generateSql(createQueryStructure())).toEqual({
      ok: false,
      errors: [VALIDATION_MESSAGES.NO_SELECT_COLUMNS, VALIDATION_MESSAGES.NO_FROM_TABLES]
    });

    const blank = createQueryStructure({
      selectColumns: [{ columnName: ' ' }],
      fromTables: [{ tableName: '' }]
    });
    expect(generateSql(blank)).toEqual({
      ok: false,
      errors: ['SELECT column name cannot be empty', 'FROM table name cannot be empty']
    });
  });

  it('logs generated SQL at debug level', () => {
    const logger = vi.fn();
    const structure = new QueryStructureBuilder().select('id').from('users').build();

    new SqlGenerator({ logger }).generate(structure);

    expect(logger).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'debug', sql: 'SELECT id FROM users' })
    );
  });

  it('turns internal faults into a build error', () => {
    const logger = vi.fn();
    const generator = new SqlGenerator({
      logger,
      pagination: {
        compilePagination: () => {
          throw new Error('boom');
        }
      }
    });
    const structure = new QueryStructureBuilder().select('id').from('users').build();

    expect(generator.generate(structure)).toEqual({ ok: false, errors: ['Failed to build query: boom'] });
    expect(logger).toHaveBeenCalledWith(expect.objectContaining({ level: 'error' }));
  });
});
