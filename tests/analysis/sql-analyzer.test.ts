import { describe, it, expect } from 'vitest';
import {
  allowsPagingWithWarning,
  describePagingCompatibility,
  getPagingCompatibility,
  hasLimitClause,
  hasOffsetClause,
  hasOrderByClause,
  hasPagingConflict,
  isSelectQuery,
  isSuitableForPaging
} from '../../src/core/analysis/sql-analyzer.js';

describe('sql analyzer', () => {
  it('recognizes statements that read rows', () => {
    expect(isSelectQuery('  select * from t')).toBe(true);
    expect(isSelectQuery('WITH x AS (SELECT 1) SELECT * FROM x')).toBe(true);
    expect(isSelectQuery('EXPLAIN SELECT 1')).toBe(true);
    expect(isSelectQuery('DELETE FROM t')).toBe(false);
    expect(isSelectQuery('')).toBe(false);
    expect(isSelectQuery(null)).toBe(false);
  });

  it('detects LIMIT, OFFSET and ORDER BY', () => {
    expect(hasLimitClause('SELECT * FROM t LIMIT 10')).toBe(true);
    expect(hasLimitClause('SELECT limits FROM t')).toBe(false);
    expect(hasOffsetClause('SELECT * FROM t OFFSET 5')).toBe(true);
    expect(hasPagingConflict('SELECT * FROM t offset 5')).toBe(true);
    expect(hasOrderByClause('SELECT * FROM t ORDER  BY id')).toBe(true);
    expect(hasOrderByClause('SELECT * FROM t')).toBe(false);
  });

  it('reports each compatibility state', () => {
    expect(getPagingCompatibility('UPDATE t SET a = 1')).toBe('NOT_SELECT');
    expect(getPagingCompatibility('SELECT * FROM t ORDER BY id LIMIT 5')).toBe('HAS_LIMIT_OFFSET');
    expect(getPagingCompatibility('SELECT * FROM t')).toBe('NO_ORDER_BY');
    expect(getPagingCompatibility('SELECT * FROM t ORDER BY id')).toBe('COMPATIBLE');
  });

  it('describes compatibility states', () => {
    expect(describePagingCompatibility('NO_ORDER_BY')).toBe('No ORDER BY clause (results may be inconsistent)');
    expect(allowsPagingWithWarning('NO_ORDER_BY')).toBe(true);
    expect(allowsPagingWithWarning('NOT_SELECT')).toBe(false);
  });

  it('is suitable for paging only when compatible', () => {
    expect(isSuitableForPaging('SELECT * FROM t ORDER BY id')).toBe(true);
    expect(isSuitableForPaging('SELECT * FROM t')).toBe(false);
  });
});
