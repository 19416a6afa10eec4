/**
 * @chunkwise/core - Value helpers
 *
 * Guards and conversions between lazily produced items and materialized
 * values.
 */

import { columnByteSize, columnFromScalars, isColumn, scalarByteSize } from './column.js';
import { ValidationError } from './errors.js';
import { Table, isTable } from './table.js';
import type { Column, ElementType, Item, Row, Scalar, Value } from './types.js';

// =============================================================================
// Guards
// =============================================================================

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

/**
 * A plain object whose values are all scalars.
 */
export function isRow(value: unknown): value is Row {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || ArrayBuffer.isView(value) || isTable(value)) return false;
  return Object.values(value).every(isScalar);
}

/**
 * True for values that hold many elements: columns and tables.
 */
export function isCollection(value: Value): value is Column | Table {
  return isColumn(value) || isTable(value);
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Materialize items as a column or table of the given element type.
 */
export function fromItems(items: Iterable<Item>, element: ElementType): Column | Table {
  if (element.kind === 'record') {
    const rows: Row[] = [];
    for (const item of items) {
      if (!isRow(item)) {
        throw ValidationError.typeMismatch('item', 'record', describeItem(item));
      }
      rows.push(item);
    }
    return Table.fromRows(rows, element.fields);
  }

  const values: Scalar[] = [];
  for (const item of items) {
    if (!isScalar(item)) {
      throw ValidationError.typeMismatch('item', element.dtype, 'record');
    }
    values.push(item);
  }
  return columnFromScalars(values, element.dtype);
}

/**
 * Check that data of element type `actual` can be bound where `declared` is
 * expected. Records match when every declared field is present with the same
 * dtype; extra fields are allowed.
 *
 * @throws ValidationError with TYPE_MISMATCH or COLUMN_NOT_FOUND
 */
export function checkElementType(declared: ElementType, actual: ElementType, path: string): void {
  if (declared.kind === 'scalar') {
    if (actual.kind !== 'scalar') {
      throw ValidationError.typeMismatch(path, declared.dtype, 'record');
    }
    if (actual.dtype !== declared.dtype) {
      throw ValidationError.typeMismatch(path, declared.dtype, actual.dtype);
    }
    return;
  }

  if (actual.kind !== 'record') {
    throw ValidationError.typeMismatch(path, 'record', actual.dtype);
  }
  const available = new Map(actual.fields.map(f => [f.name, f.dtype]));
  for (const field of declared.fields) {
    const dtype = available.get(field.name);
    if (dtype === undefined) {
      throw ValidationError.columnNotFound(field.name, [...available.keys()]);
    }
    if (dtype !== field.dtype) {
      throw ValidationError.typeMismatch(`${path}.${field.name}`, field.dtype, dtype);
    }
  }
}

/**
 * Estimated in-memory size of a value in bytes.
 */
export function valueByteSize(value: Value): number {
  if (isTable(value)) return value.byteSize();
  if (isColumn(value)) return columnByteSize(value);
  if (isRow(value)) {
    return Object.values(value).reduce<number>((size, scalar) => size + scalarByteSize(scalar), 0);
  }
  return scalarByteSize(value);
}

function describeItem(item: Item): string {
  return item === null ? 'null' : typeof item;
}
