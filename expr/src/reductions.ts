/**
 * @chunkwise/expr - Reduction metadata
 *
 * Names and types of the state each algebraic reduction carries between
 * chunks, and the dtype each reduction produces.
 */

import type { DType, Field } from '@chunkwise/core';
import type { AlgebraicReduction, ReductionFn } from './types.js';

const COUNT: Field = { name: 'count', dtype: 'int32' };

export const REDUCTION_STATE_FIELDS: Readonly<Record<AlgebraicReduction, readonly Field[]>> = {
  count: [COUNT],
  nelements: [COUNT],
  sum: [{ name: 'sum', dtype: 'float64' }],
  mean: [COUNT, { name: 'sum', dtype: 'float64' }],
  var: [COUNT, { name: 'mean', dtype: 'float64' }, { name: 'm2', dtype: 'float64' }],
  std: [COUNT, { name: 'mean', dtype: 'float64' }, { name: 'm2', dtype: 'float64' }],
  min: [COUNT, { name: 'min', dtype: 'float64' }],
  max: [COUNT, { name: 'max', dtype: 'float64' }],
};

/**
 * dtype of a reduction's result for input elements of `input`.
 */
export function reductionResultDType(fn: ReductionFn, input: DType): DType {
  switch (fn) {
    case 'count':
    case 'nelements':
    case 'nunique':
      return 'int32';
    case 'sum':
      // a bool sum is bounded by the row count; an int32 sum is not
      return input === 'bool' ? 'int32' : 'float64';
    case 'min':
    case 'max':
      return input === 'int32' ? 'int32' : 'float64';
    case 'mean':
    case 'var':
    case 'std':
      return 'float64';
  }
}

/** Reductions that accept any element type, records included */
export function acceptsAnyElement(fn: ReductionFn): boolean {
  return fn === 'count' || fn === 'nelements' || fn === 'nunique';
}
