// Data model shared by sources, expressions and the engine

import type { Table } from './table.js';

// =============================================================================
// Element Types
// =============================================================================

/** Element type discriminators */
export type DType = 'float64' | 'int32' | 'bool' | 'string';

/** A named, typed field of a record element */
export interface Field {
  readonly name: string;
  readonly dtype: DType;
}

/** A single scalar element */
export interface ScalarElement {
  readonly kind: 'scalar';
  readonly dtype: DType;
}

/** A record element with named fields */
export interface RecordElement {
  readonly kind: 'record';
  readonly fields: readonly Field[];
}

export type ElementType = ScalarElement | RecordElement;

/**
 * Declared shape of a value: a collection of elements (length null when it
 * depends on the data) or a single element.
 */
export type DataShape =
  | { readonly kind: 'collection'; readonly length: number | null; readonly element: ElementType }
  | { readonly kind: 'scalar'; readonly element: ElementType };

// =============================================================================
// Materialized Values
// =============================================================================

export type Scalar = number | string | boolean | null;

/** One record of a table */
export type Row = Readonly<Record<string, Scalar>>;

/** Dense numeric storage */
export type NumericArray = Float64Array | Int32Array;

/** One column of values: dense numbers or general scalars */
export type Column = NumericArray | Scalar[];

/** One element yielded by lazy iteration over a collection */
export type Item = Scalar | Row;

/** Any materialized result */
export type Value = Scalar | Row | Column | Table;

// =============================================================================
// Shape Helpers
// =============================================================================

export function scalarElement(dtype: DType): ScalarElement {
  return { kind: 'scalar', dtype };
}

export function recordElement(fields: readonly Field[]): RecordElement {
  return { kind: 'record', fields };
}

export function collectionOf(element: ElementType, length: number | null = null): DataShape {
  return { kind: 'collection', length, element };
}

export function scalarOf(element: ElementType): DataShape {
  return { kind: 'scalar', element };
}

export function isNumericDType(dtype: DType): boolean {
  return dtype === 'float64' || dtype === 'int32';
}
