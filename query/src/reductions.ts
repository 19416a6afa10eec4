/**
 * @chunkwise/query - Reduction library
 *
 * Every algebraic reduction is expressed as a small state machine:
 *
 * - `accumulate` folds a run of values into a state
 * - `merge` folds several states into one
 * - `finalize` turns a state into the result
 *
 * Running in memory is `finalize(accumulate(values))`; running chunked is
 * `finalize(merge(states))` over one `accumulate` per chunk. States are plain
 * records whose fields match REDUCTION_STATE_FIELDS, so they can travel
 * between chunks as one-row tables.
 *
 * Variance uses Welford's online update within a chunk and the pairwise
 * update of Chan et al. across chunks.
 */

import {
  ErrorCode,
  NumericDomainError,
  ValidationError,
  type Column,
  type Field,
  type Item,
  type Row,
  type Scalar,
} from '@chunkwise/core';
import { REDUCTION_STATE_FIELDS, type AlgebraicReduction } from '@chunkwise/expr';

// =============================================================================
// Types
// =============================================================================

/** Mergeable reduction state, keyed by state field name */
export type ReductionState = Record<string, number>;

export interface FinalizeOptions {
  /** Divide variance by n - 1 instead of n (default: false) */
  unbiased?: boolean;
}

export interface Reducer {
  readonly name: AlgebraicReduction;
  readonly stateFields: readonly Field[];
  accumulate(values: Iterable<Item>): ReductionState;
  merge(states: Iterable<ReductionState>): ReductionState;
  finalize(state: ReductionState, options?: FinalizeOptions): number;
}

// =============================================================================
// Value Coercion
// =============================================================================

/**
 * Numeric value of an item for a numeric reduction. Nulls are skipped,
 * booleans count as 0 and 1.
 */
function numericValue(item: Item, reduction: string): number | null {
  if (item === null) return null;
  if (typeof item === 'number') return item;
  if (typeof item === 'boolean') return item ? 1 : 0;
  throw ValidationError.typeMismatch(reduction, 'number', typeof item === 'string' ? 'string' : 'record');
}

function* numericValues(values: Iterable<Item>, reduction: string): Generator<number> {
  for (const item of values) {
    const value = numericValue(item, reduction);
    if (value !== null) yield value;
  }
}

function stateValue(state: ReductionState, name: string): number {
  const value = state[name];
  if (typeof value !== 'number') {
    throw ValidationError.typeMismatch(`state.${name}`, 'number', typeof value);
  }
  return value;
}

// =============================================================================
// Variance
// =============================================================================

interface Moments {
  count: number;
  mean: number;
  m2: number;
}

function welford(values: Iterable<number>): Moments {
  let count = 0;
  let mean = 0;
  let m2 = 0;
  for (const value of values) {
    count++;
    const delta = value - mean;
    mean += delta / count;
    m2 += delta * (value - mean);
  }
  return { count, mean, m2 };
}

function mergeMoments(a: Moments, b: Moments): Moments {
  if (a.count === 0) return b;
  if (b.count === 0) return a;
  const count = a.count + b.count;
  const delta = b.mean - a.mean;
  return {
    count,
    mean: a.mean + (delta * b.count) / count,
    m2: a.m2 + b.m2 + (delta * delta * a.count * b.count) / count,
  };
}

/**
 * Rounding can leave a variance a hair below zero; report it as zero.
 */
export function clampVariance(value: number): number {
  return value < 0 ? 0 : value;
}

function finalizeVariance(state: ReductionState, reduction: string, unbiased: boolean): number {
  const count = stateValue(state, 'count');
  if (count === 0) throw NumericDomainError.emptyReduction(reduction);

  const ddof = unbiased ? 1 : 0;
  if (count - ddof <= 0) {
    throw new NumericDomainError(
      `Cannot compute ${reduction} of ${count} value(s) with ${ddof} delta degrees of freedom`,
      ErrorCode.NUMERIC_DOMAIN_ERROR,
      { reduction, count, ddof }
    );
  }
  return clampVariance(stateValue(state, 'm2') / (count - ddof));
}

function varianceReducer(name: 'var' | 'std'): Reducer {
  const toMoments = (state: ReductionState): Moments => ({
    count: stateValue(state, 'count'),
    mean: stateValue(state, 'mean'),
    m2: stateValue(state, 'm2'),
  });

  return {
    name,
    stateFields: REDUCTION_STATE_FIELDS[name],
    accumulate: (values) => ({ ...welford(numericValues(values, name)) }),
    merge: (states) => {
      let moments: Moments = { count: 0, mean: 0, m2: 0 };
      for (const state of states) moments = mergeMoments(moments, toMoments(state));
      return { ...moments };
    },
    finalize: (state, options = {}) => {
      const variance = finalizeVariance(state, name, options.unbiased ?? false);
      return name === 'std' ? Math.sqrt(variance) : variance;
    },
  };
}

// =============================================================================
// Extremes
// =============================================================================

function extremeReducer(name: 'min' | 'max'): Reducer {
  const better = name === 'min' ? (a: number, b: number) => a < b : (a: number, b: number) => a > b;

  const fold = (pairs: Iterable<[number, number]>): ReductionState => {
    let count = 0;
    let best = NaN;
    for (const [n, value] of pairs) {
      if (n === 0) continue;
      if (count === 0 || better(value, best)) best = value;
      count += n;
    }
    return { count, [name]: best };
  };

  return {
    name,
    stateFields: REDUCTION_STATE_FIELDS[name],
    accumulate: (values) => {
      const pairs = function* (): Generator<[number, number]> {
        for (const value of numericValues(values, name)) yield [1, value];
      };
      return fold(pairs());
    },
    merge: (states) => {
      const pairs = function* (): Generator<[number, number]> {
        for (const state of states) {
          const count = stateValue(state, 'count');
          yield [count, count === 0 ? NaN : stateValue(state, name)];
        }
      };
      return fold(pairs());
    },
    finalize: (state) => {
      if (stateValue(state, 'count') === 0) throw NumericDomainError.emptyReduction(name);
      return stateValue(state, name);
    },
  };
}

// =============================================================================
// Counting and Sums
// =============================================================================

function sumStates(states: Iterable<ReductionState>, names: readonly string[]): ReductionState {
  const out: ReductionState = {};
  for (const name of names) out[name] = 0;
  for (const state of states) {
    for (const name of names) out[name] += stateValue(state, name);
  }
  return out;
}

const countReducer: Reducer = {
  name: 'count',
  stateFields: REDUCTION_STATE_FIELDS.count,
  accumulate: (values) => {
    let count = 0;
    for (const item of values) {
      if (item !== null) count++;
    }
    return { count };
  },
  merge: (states) => sumStates(states, ['count']),
  finalize: (state) => stateValue(state, 'count'),
};

const nelementsReducer: Reducer = {
  name: 'nelements',
  stateFields: REDUCTION_STATE_FIELDS.nelements,
  accumulate: (values) => {
    let count = 0;
    for (const _ of values) count++;
    return { count };
  },
  merge: (states) => sumStates(states, ['count']),
  finalize: (state) => stateValue(state, 'count'),
};

const sumReducer: Reducer = {
  name: 'sum',
  stateFields: REDUCTION_STATE_FIELDS.sum,
  accumulate: (values) => {
    let sum = 0;
    for (const value of numericValues(values, 'sum')) sum += value;
    return { sum };
  },
  merge: (states) => sumStates(states, ['sum']),
  finalize: (state) => stateValue(state, 'sum'),
};

const meanReducer: Reducer = {
  name: 'mean',
  stateFields: REDUCTION_STATE_FIELDS.mean,
  accumulate: (values) => {
    let count = 0;
    let sum = 0;
    for (const value of numericValues(values, 'mean')) {
      count++;
      sum += value;
    }
    return { count, sum };
  },
  merge: (states) => sumStates(states, ['count', 'sum']),
  finalize: (state) => {
    const count = stateValue(state, 'count');
    if (count === 0) throw NumericDomainError.emptyReduction('mean');
    return stateValue(state, 'sum') / count;
  },
};

// =============================================================================
// Registry
// =============================================================================

const REDUCERS: Readonly<Record<AlgebraicReduction, Reducer>> = {
  count: countReducer,
  nelements: nelementsReducer,
  sum: sumReducer,
  mean: meanReducer,
  var: varianceReducer('var'),
  std: varianceReducer('std'),
  min: extremeReducer('min'),
  max: extremeReducer('max'),
};

export function getReducer(fn: AlgebraicReduction): Reducer {
  return REDUCERS[fn];
}

/**
 * Reduce `values` in one pass.
 */
export function reduce(fn: AlgebraicReduction, values: Iterable<Item>, options: FinalizeOptions = {}): number {
  const reducer = getReducer(fn);
  return reducer.finalize(reducer.accumulate(values), options);
}

// =============================================================================
// Distinct Values
// =============================================================================

/**
 * Encoding of a scalar that keeps types apart: null, NaN, 1 and '1' all
 * differ. 0 and -0 share a key.
 */
export function scalarKey(value: Scalar): string {
  if (value === null) return 'n';
  switch (typeof value) {
    case 'number':
      return `f${value}`;
    case 'boolean':
      return `b${value}`;
    default:
      return `s${JSON.stringify(value)}`;
  }
}

/** Key of a tuple of scalars, as used for group ids */
export function tupleKey(values: readonly Scalar[]): string {
  return values.map(scalarKey).join(',');
}

function rowKey(row: Row): string {
  return Object.entries(row)
    .map(([name, value]) => `${JSON.stringify(name)}:${scalarKey(value)}`)
    .join(',');
}

/**
 * Yield the first occurrence of every distinct item, nulls included.
 */
export function* uniqueItems(items: Iterable<Item>): Generator<Item> {
  const scalars = new Set<Scalar>();
  const rows = new Set<string>();
  for (const item of items) {
    if (item === null || typeof item !== 'object') {
      if (scalars.has(item)) continue;
      scalars.add(item);
    } else {
      const key = rowKey(item);
      if (rows.has(key)) continue;
      rows.add(key);
    }
    yield item;
  }
}

/**
 * Exact number of distinct non-null items.
 */
export function countDistinct(items: Iterable<Item>): number {
  let count = 0;
  for (const item of uniqueItems(items)) {
    if (item !== null) count++;
  }
  return count;
}

// =============================================================================
// Shape Helpers
// =============================================================================

/**
 * One-element column holding a reduction result.
 */
export function wrapKeepdims(value: Scalar): Column {
  return typeof value === 'number' ? Float64Array.of(value) : [value];
}
