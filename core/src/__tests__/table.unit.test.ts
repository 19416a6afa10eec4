/**
 * Tests for columns and tables
 */

import { describe, it, expect } from 'vitest';
import {
  columnByteSize,
  columnFromScalars,
  concatColumns,
  filterColumn,
  inferColumnDType,
  takeColumn,
} from '../column.js';
import { ErrorCode, ValidationError } from '../errors.js';
import { Table, isTable } from '../table.js';

describe('column helpers', () => {
  it('should infer dtypes from storage and values', () => {
    expect(inferColumnDType(Int32Array.from([1]))).toBe('int32');
    expect(inferColumnDType(Float64Array.from([1]))).toBe('float64');
    expect(inferColumnDType([null, 'a'])).toBe('string');
    expect(inferColumnDType([null, true])).toBe('bool');
    expect(inferColumnDType([null, null])).toBe('float64');
  });

  it('should build dense columns only when every value allows it', () => {
    expect(columnFromScalars([1, 2.5], 'float64')).toBeInstanceOf(Float64Array);
    expect(columnFromScalars([1, 2], 'int32')).toBeInstanceOf(Int32Array);
    expect(columnFromScalars([1, null], 'float64')).toEqual([1, null]);
    expect(columnFromScalars([1.5], 'int32')).toEqual([1.5]);
  });

  it('should store int32 values outside the int32 range as float64', () => {
    const column = columnFromScalars([2 ** 31, -5], 'int32');
    expect(column).toBeInstanceOf(Float64Array);
    expect(Array.from(column)).toEqual([2147483648, -5]);
    expect(columnFromScalars([-(2 ** 31), 2 ** 31 - 1], 'int32')).toBeInstanceOf(Int32Array);
  });

  it('should keep the dense type when concatenating same-typed arrays', () => {
    const merged = concatColumns([Int32Array.from([1, 2]), Int32Array.from([3])]);
    expect(merged).toBeInstanceOf(Int32Array);
    expect(Array.from(merged)).toEqual([1, 2, 3]);
  });

  it('should widen mixed dense arrays to Float64Array', () => {
    const merged = concatColumns([Int32Array.from([1]), Float64Array.from([0.5])]);
    expect(merged).toBeInstanceOf(Float64Array);
    expect(Array.from(merged)).toEqual([1, 0.5]);
  });

  it('should flatten general columns', () => {
    expect(concatColumns([['a'], Float64Array.from([1]), [null]])).toEqual(['a', 1, null]);
    expect(concatColumns([])).toEqual([]);
  });

  it('should filter and take', () => {
    const column = Float64Array.from([10, 20, 30]);
    expect(Array.from(filterColumn(column, Uint8Array.from([1, 0, 1])))).toEqual([10, 30]);
    expect(takeColumn(['a', 'b', 'c'], [2, 0])).toEqual(['c', 'a']);
  });

  it('should estimate byte sizes', () => {
    expect(columnByteSize(new Float64Array(4))).toBe(32);
    expect(columnByteSize(['ab', null])).toBe(8 + 4 + 8);
  });
});

describe('Table', () => {
  const table = new Table({
    id: Int32Array.from([1, 2, 3]),
    name: ['a', 'b', 'c'],
  });

  it('should reject columns of different lengths', () => {
    expect(() => new Table({ a: [1], b: [1, 2] })).toThrow(ValidationError);
  });

  it('should report length, names and fields', () => {
    expect(table.length).toBe(3);
    expect(table.columnNames).toEqual(['id', 'name']);
    expect(table.fields).toEqual([
      { name: 'id', dtype: 'int32' },
      { name: 'name', dtype: 'string' },
    ]);
    expect(isTable(table)).toBe(true);
    expect(isTable({})).toBe(false);
  });

  it('should slice rows', () => {
    expect(table.slice(1, 3).row(0)).toEqual({ id: 2, name: 'b' });
    expect(table.slice(1).length).toBe(2);
  });

  it('should filter by mask', () => {
    const filtered = table.filter(Uint8Array.from([0, 1, 1]));
    expect([...filtered]).toEqual([
      { id: 2, name: 'b' },
      { id: 3, name: 'c' },
    ]);
  });

  it('should reject a mask of the wrong length', () => {
    try {
      table.filter(new Uint8Array(2));
      expect.fail('expected filter to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('code', ErrorCode.LENGTH_MISMATCH);
    }
  });

  it('should select and rename columns', () => {
    expect(table.select(['name']).columnNames).toEqual(['name']);
    expect(table.rename({ name: 'label' }).columnNames).toEqual(['id', 'label']);
  });

  it('should throw when a column is missing', () => {
    expect(() => table.column('price')).toThrow('Column "price" not found');
  });

  it('should build from rows, reading missing fields as null', () => {
    const built = Table.fromRows(
      [{ x: 1, y: 'a' }, { x: 2 }],
      [
        { name: 'x', dtype: 'float64' },
        { name: 'y', dtype: 'string' },
      ]
    );
    expect(built.column('x')).toBeInstanceOf(Float64Array);
    expect(built.column('y')).toEqual(['a', null]);
  });

  it('should concatenate tables in order', () => {
    const merged = Table.concat([table.slice(0, 1), table.slice(1)]);
    expect([...merged]).toEqual([...table]);
    expect(merged.column('id')).toBeInstanceOf(Int32Array);
    expect(Table.concat([]).length).toBe(0);
  });

  it('should create empty tables with the given fields', () => {
    const empty = Table.empty([{ name: 'x', dtype: 'float64' }]);
    expect(empty.length).toBe(0);
    expect(empty.columnNames).toEqual(['x']);
  });
});
