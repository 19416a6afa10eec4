/**
 * @chunkwise/query - Result merger
 *
 * Concatenates per-chunk results, already in partition order, into the
 * intermediate the aggregate expression consumes.
 */

import {
  QueryError,
  Table,
  concatColumns,
  emptyColumn,
  isColumn,
  isRow,
  isTable,
  type Column,
  type DataShape,
  type Row,
  type Scalar,
  type Value,
} from '@chunkwise/core';

/**
 * Empty value of a chunk expression's shape.
 */
export function emptyOf(shape: DataShape): Column | Table {
  const element = shape.element;
  if (element.kind === 'record') return Table.empty(element.fields);
  return shape.kind === 'collection' ? emptyColumn(element.dtype) : [];
}

/**
 * Merge chunk results by the type of the first one:
 *
 * - numeric arrays and general columns are concatenated
 * - tables are concatenated by rows
 * - scalars are collected into a column, records into a table
 *
 * A single collection result is returned as is.
 */
export function mergeChunkResults(results: readonly Value[], shape: DataShape): Column | Table {
  if (results.length === 0) return emptyOf(shape);

  const first = results[0];
  if (results.length === 1 && (isColumn(first) || isTable(first))) return first;

  if (isTable(first)) {
    return Table.concat(results.map(result => expectTable(result)));
  }
  if (isColumn(first)) {
    return concatColumns(results.map(result => expectColumn(result)));
  }
  if (isRow(first)) {
    const rows: Row[] = results.map(result => expectRow(result));
    return Table.fromRows(rows, shape.element.kind === 'record' ? shape.element.fields : []);
  }

  const values: Scalar[] = results.map(result => expectScalar(result));
  return values;
}

function mismatch(expected: string): QueryError {
  return new QueryError(`Chunk results do not all have the same type: expected ${expected}`, undefined, {
    operation: 'merge',
    expected,
  });
}

function expectTable(value: Value): Table {
  if (!isTable(value)) throw mismatch('table');
  return value;
}

function expectColumn(value: Value): Column {
  if (!isColumn(value)) throw mismatch('column');
  return value;
}

function expectRow(value: Value): Row {
  if (!isRow(value)) throw mismatch('record');
  return value;
}

function expectScalar(value: Value): Scalar {
  if (isColumn(value) || isTable(value) || isRow(value)) throw mismatch('scalar');
  return value;
}
