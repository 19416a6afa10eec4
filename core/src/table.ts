/**
 * @chunkwise/core - Table
 *
 * An immutable record batch: named columns of equal length. Every operation
 * returns a new Table; columns are copied on slice/filter/take so a result
 * never aliases the storage it was read from.
 *
 * @example
 * ```typescript
 * const table = new Table({
 *   id: Int32Array.from([1, 2, 3]),
 *   name: ['a', 'b', 'c'],
 * });
 * table.slice(1, 3).row(0); // { id: 2, name: 'b' }
 * ```
 */

import {
  columnByteSize,
  columnFromScalars,
  concatColumns,
  emptyColumn,
  filterColumn,
  inferColumnDType,
  sliceColumn,
  takeColumn,
} from './column.js';
import { ErrorCode, ValidationError } from './errors.js';
import type { Column, Field, Row, Scalar } from './types.js';

export class Table implements Iterable<Row> {
  private readonly columnMap: ReadonlyMap<string, Column>;

  /** Number of rows */
  readonly length: number;

  constructor(columns: Readonly<Record<string, Column>> | ReadonlyMap<string, Column>) {
    const entries: Array<[string, Column]> = isColumnMap(columns)
      ? [...columns.entries()]
      : Object.entries(columns);
    const lengths = new Set(entries.map(([, column]) => column.length));
    if (lengths.size > 1) {
      throw new ValidationError(
        'All table columns must have the same length',
        ErrorCode.LENGTH_MISMATCH,
        { lengths: Object.fromEntries(entries.map(([name, column]) => [name, column.length])) }
      );
    }
    this.columnMap = new Map(entries);
    this.length = entries.length === 0 ? 0 : entries[0][1].length;
  }

  get columnNames(): string[] {
    return [...this.columnMap.keys()];
  }

  /** Fields with dtypes inferred from column storage */
  get fields(): Field[] {
    return [...this.columnMap.entries()].map(([name, column]) => ({
      name,
      dtype: inferColumnDType(column),
    }));
  }

  has(name: string): boolean {
    return this.columnMap.has(name);
  }

  column(name: string): Column {
    const column = this.columnMap.get(name);
    if (column === undefined) {
      throw ValidationError.columnNotFound(name, this.columnNames);
    }
    return column;
  }

  select(names: readonly string[]): Table {
    return new Table(new Map(names.map((name): [string, Column] => [name, this.column(name)])));
  }

  /** Rename columns; names missing from `mapping` keep their name */
  rename(mapping: Readonly<Record<string, string>>): Table {
    return new Table(
      new Map([...this.columnMap.entries()].map(([name, column]): [string, Column] => [mapping[name] ?? name, column]))
    );
  }

  slice(start: number, stop: number = this.length): Table {
    return this.mapColumns(column => sliceColumn(column, start, stop));
  }

  filter(mask: Uint8Array): Table {
    if (mask.length !== this.length) {
      throw new ValidationError(
        `Mask length ${mask.length} does not match table length ${this.length}`,
        ErrorCode.LENGTH_MISMATCH,
        { maskLength: mask.length, tableLength: this.length }
      );
    }
    return this.mapColumns(column => filterColumn(column, mask));
  }

  take(indices: readonly number[]): Table {
    return this.mapColumns(column => takeColumn(column, indices));
  }

  row(index: number): Row {
    const row: Record<string, Scalar> = {};
    for (const [name, column] of this.columnMap) {
      row[name] = column[index];
    }
    return row;
  }

  *rows(): IterableIterator<Row> {
    for (let i = 0; i < this.length; i++) {
      yield this.row(i);
    }
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows();
  }

  byteSize(): number {
    let size = 0;
    for (const column of this.columnMap.values()) {
      size += columnByteSize(column);
    }
    return size;
  }

  private mapColumns(fn: (column: Column) => Column): Table {
    return new Table(
      new Map([...this.columnMap.entries()].map(([name, column]): [string, Column] => [name, fn(column)]))
    );
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  static empty(fields: readonly Field[]): Table {
    return new Table(new Map(fields.map((f): [string, Column] => [f.name, emptyColumn(f.dtype)])));
  }

  /**
   * Build a table from rows; a field missing from a row reads as null.
   */
  static fromRows(rows: Iterable<Row>, fields: readonly Field[]): Table {
    const values = new Map(fields.map((f): [string, Scalar[]] => [f.name, []]));
    for (const row of rows) {
      for (const f of fields) {
        values.get(f.name)?.push(row[f.name] ?? null);
      }
    }
    return new Table(
      new Map(fields.map((f): [string, Column] => [f.name, columnFromScalars(values.get(f.name) ?? [], f.dtype)]))
    );
  }

  /**
   * Concatenate rows of tables that share the first table's columns, in order.
   */
  static concat(tables: readonly Table[]): Table {
    if (tables.length === 0) return new Table({});
    const names = tables[0].columnNames;
    return new Table(
      new Map(names.map((name): [string, Column] => [name, concatColumns(tables.map(t => t.column(name)))]))
    );
  }
}

function isColumnMap(
  columns: Readonly<Record<string, Column>> | ReadonlyMap<string, Column>
): columns is ReadonlyMap<string, Column> {
  return columns instanceof Map;
}

export function isTable(value: unknown): value is Table {
  return value instanceof Table;
}
