/**
 * @chunkwise/core - Column helpers
 *
 * Columns are either dense numeric arrays or general scalar arrays. Every
 * helper here keeps dense storage dense when all of its inputs are dense.
 */

import { BOXED_VALUE_BYTES, STRING_CHAR_BYTES } from './constants.js';
import type { Column, DType, NumericArray, Scalar } from './types.js';

export function isNumericArray(value: unknown): value is NumericArray {
  return value instanceof Float64Array || value instanceof Int32Array;
}

export function isColumn(value: unknown): value is Column {
  return Array.isArray(value) || isNumericArray(value);
}

/**
 * dtype of a single scalar; null has no type of its own.
 */
export function dtypeOfScalar(value: Scalar): DType | null {
  switch (typeof value) {
    case 'number':
      return 'float64';
    case 'string':
      return 'string';
    case 'boolean':
      return 'bool';
    default:
      return null;
  }
}

/**
 * dtype of a column, from its storage or its first non-null value.
 * An all-null general column reports float64.
 */
export function inferColumnDType(column: Column): DType {
  if (column instanceof Int32Array) return 'int32';
  if (column instanceof Float64Array) return 'float64';
  for (const value of column) {
    const dtype = dtypeOfScalar(value);
    if (dtype !== null) return dtype;
  }
  return 'float64';
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function isInt32(value: Scalar): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Build a column for `dtype`, using dense storage where the values allow it.
 * int32 values outside the int32 range are stored as float64 rather than
 * wrapped.
 */
export function columnFromScalars(values: Scalar[], dtype: DType): Column {
  if (dtype === 'float64' && values.every((v): v is number => typeof v === 'number')) {
    return Float64Array.from(values);
  }
  if (dtype === 'int32' && values.every((v): v is number => typeof v === 'number' && Number.isInteger(v))) {
    return values.every(isInt32) ? Int32Array.from(values) : Float64Array.from(values);
  }
  return values;
}

export function emptyColumn(dtype: DType): Column {
  switch (dtype) {
    case 'float64':
      return new Float64Array(0);
    case 'int32':
      return new Int32Array(0);
    default:
      return [];
  }
}

export function sliceColumn(column: Column, start: number, stop: number): Column {
  if (column instanceof Float64Array) return column.slice(start, stop);
  if (column instanceof Int32Array) return column.slice(start, stop);
  return column.slice(start, stop);
}

export function filterColumn(column: Column, mask: Uint8Array): Column {
  const indices: number[] = [];
  for (let i = 0; i < mask.length; i++) {
    if (mask[i] !== 0) indices.push(i);
  }
  return takeColumn(column, indices);
}

export function takeColumn(column: Column, indices: readonly number[]): Column {
  if (column instanceof Float64Array) {
    return Float64Array.from(indices, i => column[i]);
  }
  if (column instanceof Int32Array) {
    return Int32Array.from(indices, i => column[i]);
  }
  return indices.map(i => column[i]);
}

/**
 * Concatenate columns in order.
 *
 * Same-typed dense inputs stay that type, mixed dense inputs become
 * Float64Array, anything else becomes a general array.
 */
export function concatColumns(columns: readonly Column[]): Column {
  if (columns.length === 0) return [];

  if (columns.every(isNumericArray)) {
    const total = columns.reduce((sum, c) => sum + c.length, 0);
    const allInt = columns.every(c => c instanceof Int32Array);
    const out = allInt ? new Int32Array(total) : new Float64Array(total);
    let offset = 0;
    for (const c of columns) {
      out.set(c, offset);
      offset += c.length;
    }
    return out;
  }

  const out: Scalar[] = [];
  for (const c of columns) {
    for (const value of c) out.push(value);
  }
  return out;
}

export function scalarByteSize(value: Scalar): number {
  if (typeof value === 'string') {
    return BOXED_VALUE_BYTES + value.length * STRING_CHAR_BYTES;
  }
  return BOXED_VALUE_BYTES;
}

export function columnByteSize(column: Column): number {
  if (isNumericArray(column)) return column.byteLength;
  let size = 0;
  for (const value of column) size += scalarByteSize(value);
  return size;
}
