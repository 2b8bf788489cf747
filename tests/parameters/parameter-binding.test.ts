import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ParameterBindingError,
  bindNamedParameters,
  coerceParameterValue
} from '../../src/core/parameters/parameter-binding.js';

describe('bindNamedParameters', () => {
  it('rewrites a name that prefixes another without corrupting it', () => {
    const bound = bindNamedParameters(
      'SELECT * FROM t WHERE a = :id OR b = :identifier OR c = :id',
      { id: 1, identifier: 'x' }
    );

    expect(bound.sql).toBe('SELECT * FROM t WHERE a = ? OR b = ? OR c = ?');
    expect(bound.params).toEqual([1, 'x', 1]);
    expect(bound.names).toEqual(['id', 'identifier', 'id']);
  });

  it('leaves SQL without placeholders untouched', () => {
    expect(bindNamedParameters('SELECT 1', { unused: 2 })).toEqual({
      sql: 'SELECT 1',
      params: [],
      names: [],
      types: []
    });
  });

  it('ignores supplied values nothing references', () => {
    const bound = bindNamedParameters('SELECT * FROM t WHERE a = :a', { a: 'x', b: 'y' });
    expect(bound.params).toEqual(['x']);
  });

  it('keeps placeholders inside literals as text', () => {
    const bound = bindNamedParameters("SELECT ':a' FROM t WHERE a = :a", { a: 5 });
    expect(bound.sql).toBe("SELECT ':a' FROM t WHERE a = ?");
  });

  it('names the missing parameter', () => {
    let caught: unknown;
    try {
      bindNamedParameters('SELECT * FROM t WHERE a = :a AND b = :b', { a: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ParameterBindingError);
    expect(caught).toMatchObject({ message: 'Parameter not provided: b', parameterName: 'b' });
  });

  it('coerces values by declared type, per occurrence', () => {
    const bound = bindNamedParameters(
      'SELECT * FROM t WHERE a = :age AND b = :name AND c = :age',
      { age: '42', name: 7 },
      { types: { age: 'int' } }
    );

    expect(bound.params).toEqual([42, 7, 42]);
    expect(bound.types).toEqual(['int', undefined, 'int']);
  });
});

describe('coerceParameterValue', () => {
  it('binds null and undefined as null', () => {
    expect(coerceParameterValue(null, 'int')).toBeNull();
    expect(coerceParameterValue(undefined, 'string')).toBeNull();
  });

  it('passes values through when no type is declared', () => {
    const value = { nested: true };
    expect(coerceParameterValue(value, undefined)).toBe(value);
    expect(coerceParameterValue('x', 'uuid')).toBe('x');
  });

  it('converts numeric types', () => {
    expect(coerceParameterValue('4.7', 'integer')).toBe(4);
    expect(coerceParameterValue('4.7', 'decimal')).toBe(4.7);
    expect(coerceParameterValue(12, 'STRING')).toBe('12');
  });

  it('rejects values that are not numbers', () => {
    expect(() => coerceParameterValue('abc', 'int', 'age')).toThrow('Invalid numeric value for parameter: age');
    expect(() => coerceParameterValue('  ', 'double', 'price')).toThrow(ParameterBindingError);
  });

  it('reads booleans', () => {
    expect(coerceParameterValue('true', 'boolean')).toBe(true);
    expect(coerceParameterValue('1', 'boolean')).toBe(true);
    expect(coerceParameterValue('yes', 'boolean')).toBe(false);
  });

  it('formats dates and times', () => {
    expect(coerceParameterValue(new Date(2024, 0, 5, 10, 30), 'date')).toBe('2024-01-05');
    expect(coerceParameterValue('2024-01-05', 'date')).toBe('2024-01-05');
    expect(coerceParameterValue('09:30', 'time')).toBe('09:30:00');
    expect(coerceParameterValue('2024-01-05T10:00:00Z', 'timestamp')).toBe('2024-01-05T10:00:00.000Z');
  });

  it('keeps fractional seconds on times', () => {
    expect(coerceParameterValue('10:00:00.123', 'time')).toBe('10:00:00.123');
    expect(coerceParameterValue(new Date(2024, 0, 5, 7, 8, 9), 'time')).toBe('07:08:09');
  });

  it('keeps 64-bit integers beyond the safe range exact', () => {
    expect(coerceParameterValue('9007199254740993', 'bigint')).toBe(9007199254740993n);
    expect(coerceParameterValue('-9007199254740993', 'long')).toBe(-9007199254740993n);
    expect(coerceParameterValue(12n, 'long')).toBe(12n);
    expect(coerceParameterValue('42', 'long')).toBe(42);
    expect(coerceParameterValue(4.7, 'bigint')).toBe(4);
    expect(() => coerceParameterValue(1e20, 'bigint', 'big')).toThrow(
      'Integer value out of range for parameter: big'
    );
  });

  describe('outside UTC', () => {
    let previousTz: string | undefined;

    beforeEach(() => {
      previousTz = process.env.TZ;
      process.env.TZ = 'Asia/Tokyo';
    });

    afterEach(() => {
      if (previousTz === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = previousTz;
      }
    });

    it('keeps wall-clock timestamps as written', () => {
      expect(coerceParameterValue('2024-01-15T10:00:00', 'timestamp')).toBe('2024-01-15T10:00:00');
      expect(coerceParameterValue('2024-01-15 10:00', 'datetime')).toBe('2024-01-15 10:00');
    });

    it('formats local dates by their calendar day', () => {
      expect(coerceParameterValue(new Date(2024, 0, 15), 'date')).toBe('2024-01-15');
    });

    it('still converts timestamps with a zone to UTC', () => {
      expect(coerceParameterValue('2024-01-15T10:00:00+09:00', 'timestamp')).toBe('2024-01-15T01:00:00.000Z');
    });
  });

  it('rejects unparseable dates', () => {
    expect(() => coerceParameterValue('not-a-date', 'datetime', 'since')).toThrow(
      'Invalid date value for parameter: since'
    );
  });
});
