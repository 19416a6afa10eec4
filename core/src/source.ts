/**
 * @chunkwise/core - Data sources
 *
 * A data source is the read-only dataset an expression's leaf symbol is bound
 * to. Every source reports its length, byte size and element schema, can
 * materialize a half-open range and can be iterated lazily. Sources that can
 * filter themselves block by block also expose `where`.
 *
 * @example
 * ```typescript
 * const source = createSource(new Table({ x: Float64Array.from([1, 2, 3]) }));
 * source.slice(1, 3);           // Table with x = [2, 3]
 * capabilitiesOf(source);       // Set { 'slice', 'iterate', 'where' }
 * ```
 */

import { columnByteSize, inferColumnDType, isColumn, sliceColumn } from './column.js';
import { STORAGE_BLOCK_SIZE } from './constants.js';
import { ValidationError } from './errors.js';
import { Table } from './table.js';
import type { Column, DType, ElementType, Item } from './types.js';
import { recordElement, scalarElement } from './types.js';

// =============================================================================
// Interface
// =============================================================================

export type SourceCapability = 'slice' | 'iterate' | 'where';

/**
 * Vectorised predicate: one mask byte per element of the batch, non-zero to keep.
 */
export type BatchMask = (batch: Column | Table) => Uint8Array;

export interface DataSource {
  /** Number of elements along the primary axis */
  length(): number;

  /** Estimated size of the fully materialized data in bytes */
  byteSize(): number;

  /** Element type of one item */
  schema(): ElementType;

  /** Materialize elements `[start, stop)` */
  slice(start: number, stop: number): Column | Table;

  /** Lazily yield every element in order */
  [Symbol.iterator](): Iterator<Item>;

  // ==========================================================================
  // Optional capabilities
  // ==========================================================================

  /** Keep the elements selected by `mask`, scanning storage block by block */
  where?(mask: BatchMask): Column | Table;

  /** The same records restricted to `fields`, without reading the others */
  project?(fields: readonly string[]): DataSource;
}

/**
 * Capabilities a source offers to route selection. Slicing and iteration are
 * always present.
 */
export function capabilitiesOf(source: DataSource): ReadonlySet<SourceCapability> {
  const capabilities = new Set<SourceCapability>(['slice', 'iterate']);
  if (typeof source.where === 'function') {
    capabilities.add('where');
  }
  return capabilities;
}

function checkRange(length: number, start: number, stop: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(stop) || start < 0 || stop < start || stop > length) {
    throw new ValidationError(`Invalid range [${start}, ${stop}) for source of length ${length}`, undefined, {
      start,
      stop,
      length,
    });
  }
}

// =============================================================================
// Array Source
// =============================================================================

/**
 * Source over a single column of scalars.
 */
export class ArraySource implements DataSource {
  private readonly dtype: DType;

  constructor(
    private readonly column: Column,
    dtype?: DType
  ) {
    this.dtype = dtype ?? inferColumnDType(column);
  }

  length(): number {
    return this.column.length;
  }

  byteSize(): number {
    return columnByteSize(this.column);
  }

  schema(): ElementType {
    return scalarElement(this.dtype);
  }

  slice(start: number, stop: number): Column {
    checkRange(this.column.length, start, stop);
    return sliceColumn(this.column, start, stop);
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.column[Symbol.iterator]();
  }
}

// =============================================================================
// Table Source
// =============================================================================

export interface TableSourceOptions {
  /** Elements per block scanned by `where` (default: 2^15) */
  blockSize?: number;
}

/**
 * Source over a table. `where` evaluates the mask one storage block at a time
 * and concatenates the surviving rows.
 */
export class TableSource implements DataSource {
  private readonly blockSize: number;

  constructor(
    private readonly table: Table,
    options: TableSourceOptions = {}
  ) {
    this.blockSize = options.blockSize ?? STORAGE_BLOCK_SIZE;
    if (!Number.isInteger(this.blockSize) || this.blockSize < 1) {
      throw new ValidationError('Block size must be a positive integer', undefined, {
        blockSize: this.blockSize,
      });
    }
  }

  length(): number {
    return this.table.length;
  }

  byteSize(): number {
    return this.table.byteSize();
  }

  schema(): ElementType {
    return recordElement(this.table.fields);
  }

  slice(start: number, stop: number): Table {
    checkRange(this.table.length, start, stop);
    return this.table.slice(start, stop);
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.table.rows();
  }

  project(fields: readonly string[]): TableSource {
    return new TableSource(this.table.select(fields), { blockSize: this.blockSize });
  }

  where(mask: BatchMask): Table {
    const kept: Table[] = [];
    for (let start = 0; start < this.table.length; start += this.blockSize) {
      const block = this.table.slice(start, Math.min(start + this.blockSize, this.table.length));
      kept.push(block.filter(mask(block)));
    }
    return kept.length === 0 ? Table.empty(this.table.fields) : Table.concat(kept);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Wrap a column or table in the matching source.
 */
export function createSource(data: Column | Table): DataSource {
  if (isColumn(data)) {
    return new ArraySource(data);
  }
  return new TableSource(data);
}
