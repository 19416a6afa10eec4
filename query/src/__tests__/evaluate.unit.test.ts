/**
 * Tests for the expression evaluator
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  QueryError,
  Table,
  ValidationError,
  collectionOf,
  recordElement,
  scalarElement,
  type Item,
  type Value,
} from '@chunkwise/core';
import {
  abs,
  add,
  and,
  by,
  combine,
  count,
  distinct,
  eq,
  field,
  gt,
  head,
  like,
  max,
  mean,
  mul,
  ne,
  neg,
  not,
  nunique,
  partial,
  project,
  relabel,
  select,
  slice,
  sqrt,
  sum,
  summary,
  symbol,
  type Expr,
} from '@chunkwise/expr';
import { binaryScalar, evaluate, globToRegExp, truthy, unaryScalar, type EvaluationInput } from '../evaluate.js';

const numbers = symbol('n', collectionOf(scalarElement('float64')));
const sales = symbol(
  'sales',
  collectionOf(
    recordElement([
      { name: 'region', dtype: 'string' },
      { name: 'amount', dtype: 'float64' },
      { name: 'units', dtype: 'int32' },
    ])
  )
);

const salesTable = new Table({
  region: ['north', 'south', 'north', 'east', 'south'],
  amount: Float64Array.from([10, 20, 30, 40, 50]),
  units: Int32Array.from([1, 2, 3, 4, 5]),
});

function run(expr: Expr, leaf: Expr, input: EvaluationInput): Value {
  return evaluate(expr, new Map([[leaf, input]]));
}

function toArray(value: Value): unknown[] {
  if (value instanceof Table) return [...value];
  if (Array.isArray(value) || value instanceof Float64Array || value instanceof Int32Array) {
    return Array.from(value);
  }
  throw new Error('expected a collection');
}

// =============================================================================
// Scalar Semantics
// =============================================================================

describe('scalar helpers', () => {
  it('should follow truthiness rules', () => {
    expect([null, 0, Number.NaN, '', false].map(truthy)).toEqual([false, false, false, false, false]);
    expect([1, -1, 'a', true, { a: 1 }].map((item: Item) => truthy(item))).toEqual([true, true, true, true, true]);
  });

  it('should apply arithmetic and comparisons', () => {
    expect(binaryScalar('+', 2, 3)).toBe(5);
    expect(binaryScalar('**', 2, 3)).toBe(8);
    expect(binaryScalar('%', 7, 4)).toBe(3);
    expect(binaryScalar('>=', 3, 3)).toBe(true);
    expect(binaryScalar('<', 'a', 'b')).toBe(true);
    expect(binaryScalar('+', 'a', 'b')).toBe('ab');
    expect(binaryScalar('+', true, 1)).toBe(2);
  });

  it('should propagate nulls except through logical operators', () => {
    expect(binaryScalar('+', null, 1)).toBeNull();
    expect(binaryScalar('>', 1, null)).toBeNull();
    expect(binaryScalar('|', null, 1)).toBe(true);
    expect(binaryScalar('&', null, 1)).toBe(false);
    expect(unaryScalar('neg', null)).toBeNull();
  });

  it('should treat NaN as unordered', () => {
    expect(binaryScalar('==', Number.NaN, Number.NaN)).toBe(false);
    expect(binaryScalar('!=', Number.NaN, 1)).toBe(true);
    expect(binaryScalar('<=', Number.NaN, 1)).toBe(false);
  });

  it('should compare strings and numbers only for equality', () => {
    expect(binaryScalar('==', 'a', 1)).toBe(false);
    expect(binaryScalar('!=', 'a', 1)).toBe(true);
    expect(() => binaryScalar('<', 'a', 1)).toThrow(ValidationError);
    expect(() => binaryScalar('-', 'a', 'b')).toThrow(ValidationError);
  });

  it('should apply unary operators', () => {
    expect(unaryScalar('abs', -3)).toBe(3);
    expect(unaryScalar('sqrt', 9)).toBe(3);
    expect(unaryScalar('not', 0)).toBe(true);
    expect(() => unaryScalar('exp', 'x')).toThrow(ValidationError);
  });

  it('should translate globs into anchored patterns', () => {
    const pattern = globToRegExp('a?c*.txt');
    expect(pattern.test('abc.txt')).toBe(true);
    expect(pattern.test('abcdef.txt')).toBe(true);
    expect(pattern.test('ac.txt')).toBe(false);
    expect(pattern.test('abcXtxt')).toBe(false);
    expect(pattern.test('xabc.txt')).toBe(false);
  });
});

// =============================================================================
// Elementwise and Selection
// =============================================================================

describe('evaluate: elementwise', () => {
  it('should evaluate arithmetic over a dense column', () => {
    const result = run(add(mul(numbers, 2), 1), numbers, Float64Array.from([1, 2, 3]));
    expect(result).toBeInstanceOf(Float64Array);
    expect(toArray(result)).toEqual([3, 5, 7]);
  });

  it('should combine two collections element by element', () => {
    const result = run(add(numbers, neg(numbers)), numbers, Float64Array.from([1, 2]));
    expect(toArray(result)).toEqual([0, 0]);

    const amountPerUnit = mul(field(sales, 'amount'), field(sales, 'units'));
    expect(toArray(run(amountPerUnit, sales, salesTable))).toEqual([10, 40, 90, 160, 250]);
  });

  it('should read fields, projections and relabels from tables', () => {
    expect(toArray(run(field(sales, 'units'), sales, salesTable))).toEqual([1, 2, 3, 4, 5]);

    const projected = run(project(sales, ['units']), sales, salesTable);
    expect(projected).toBeInstanceOf(Table);
    expect(projected instanceof Table ? projected.columnNames : []).toEqual(['units']);

    const renamed = run(relabel(sales, { amount: 'total' }), sales, salesTable);
    expect(renamed instanceof Table ? renamed.columnNames : []).toEqual(['region', 'total', 'units']);
  });

  it('should match glob patterns', () => {
    const result = run(like(field(sales, 'region'), '*th'), sales, salesTable);
    expect(toArray(result)).toEqual([true, true, true, false, true]);
  });

  it('should raise for an unbound symbol', () => {
    try {
      evaluate(sum(numbers), new Map());
      expect.fail('expected evaluate to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(QueryError);
      expect(error).toHaveProperty('code', ErrorCode.UNBOUND_SYMBOL);
    }
  });
});

describe('evaluate: selection', () => {
  it('should filter with a vectorised predicate', () => {
    const big = select(sales, row => gt(field(row, 'amount'), 25));
    const result = run(field(big, 'region'), sales, salesTable);
    expect(toArray(result)).toEqual(['north', 'east', 'south']);
  });

  it('should fall back to element-wise evaluation for string predicates', () => {
    const north = select(sales, row => eq(field(row, 'region'), 'north'));
    expect(toArray(run(field(north, 'amount'), sales, salesTable))).toEqual([10, 30]);
  });

  it('should combine conditions', () => {
    const picked = select(sales, row =>
      and(ne(field(row, 'region'), 'south'), not(gt(field(row, 'units'), 3)))
    );
    expect(toArray(run(field(picked, 'units'), sales, salesTable))).toEqual([1, 3]);
  });

  it('should filter a scalar column', () => {
    const positive = select(numbers, x => gt(abs(x), 1));
    expect(toArray(run(positive, numbers, Float64Array.from([-2, 0.5, 3])))).toEqual([-2, 3]);
  });

  it('should use values outside the element as constants', () => {
    const threshold = symbol('threshold', collectionOf(scalarElement('float64')));
    const aboveMean = select(numbers, x => gt(x, mean(threshold)));
    const result = evaluate(
      aboveMean,
      new Map<Expr, EvaluationInput>([
        [numbers, Float64Array.from([1, 5, 9])],
        [threshold, Float64Array.from([4, 6])],
      ])
    );
    expect(toArray(result)).toEqual([9]);
  });
});

// =============================================================================
// Lazy Inputs
// =============================================================================

describe('evaluate: lazy inputs', () => {
  function* counting(limit: number, seen: number[]): Generator<Item> {
    for (let i = 1; i <= limit; i++) {
      seen.push(i);
      yield i;
    }
  }

  it('should stop reading once head is satisfied', () => {
    const seen: number[] = [];
    const expr = head(select(numbers, x => gt(x, 2)), 2);
    const result = run(expr, numbers, counting(100, seen));
    expect(toArray(result)).toEqual([3, 4]);
    expect(seen).toEqual([1, 2, 3, 4]);
  });

  it('should reduce a lazy input in one pass', () => {
    const seen: number[] = [];
    expect(run(sum(numbers), numbers, counting(4, seen))).toBe(10);
    expect(seen).toEqual([1, 2, 3, 4]);
  });

  it('should keep distinct items lazily', () => {
    const items = (function* (): Generator<Item> {
      yield* [2, 2, 1, 2, 3];
    })();
    expect(toArray(run(distinct(numbers), numbers, items))).toEqual([2, 1, 3]);
  });

  it('should reject operands of different lengths', () => {
    const other = symbol('other', collectionOf(scalarElement('float64')));
    const expr = add(numbers, other);
    expect(() =>
      evaluate(
        expr,
        new Map<Expr, EvaluationInput>([
          [numbers, Float64Array.from([1, 2])],
          [other, Float64Array.from([1])],
        ])
      )
    ).toThrow(QueryError);
  });
});

// =============================================================================
// Collection Operations
// =============================================================================

describe('evaluate: collection operations', () => {
  const data = Float64Array.from([5, 6, 7, 8]);

  it('should take the first n elements', () => {
    expect(toArray(run(head(numbers, 2), numbers, data))).toEqual([5, 6]);
    expect(toArray(run(head(numbers, 10), numbers, data))).toEqual([5, 6, 7, 8]);
  });

  it('should slice with clamped bounds', () => {
    expect(toArray(run(slice(numbers, 1, 3), numbers, data))).toEqual([6, 7]);
    expect(toArray(run(slice(numbers, 2), numbers, data))).toEqual([7, 8]);
    expect(toArray(run(slice(numbers, 3, 100), numbers, data))).toEqual([8]);
    expect(toArray(run(slice(numbers, 9, 12), numbers, data))).toEqual([]);
  });

  it('should remove duplicate rows', () => {
    const regions = project(sales, ['region']);
    const result = run(distinct(regions), sales, salesTable);
    expect(toArray(result)).toEqual([{ region: 'north' }, { region: 'south' }, { region: 'east' }]);
  });
});

// =============================================================================
// Reductions
// =============================================================================

describe('evaluate: reductions', () => {
  it('should reduce to a scalar', () => {
    expect(run(sum(field(sales, 'amount')), sales, salesTable)).toBe(150);
    expect(run(count(sales), sales, salesTable)).toBe(5);
    expect(run(nunique(field(sales, 'region')), sales, salesTable)).toBe(3);
    expect(run(max(sqrt(numbers)), numbers, Float64Array.from([4, 16, 9]))).toBe(4);
  });

  it('should keep dimensions when asked', () => {
    const result = run(sum(numbers, { keepdims: true }), numbers, Float64Array.from([1, 2]));
    expect(result).toBeInstanceOf(Float64Array);
    expect(toArray(result)).toEqual([3]);
  });

  it('should build partial states and combine them', () => {
    const state = run(partial('mean', numbers), numbers, Float64Array.from([1, 2, 3]));
    expect(toArray(state)).toEqual([{ count: 3, sum: 6 }]);

    const states = symbol('states', collectionOf(recordElement([
      { name: 'count', dtype: 'int32' },
      { name: 'sum', dtype: 'float64' },
    ])));
    const merged = new Table({ count: Int32Array.from([3, 1]), sum: Float64Array.from([6, 10]) });
    expect(run(combine('mean', states), states, merged)).toBe(4);
  });

  it('should summarise several reductions at once', () => {
    const expr = summary(sales, s => ({
      total: sum(field(s, 'amount')),
      n: count(s),
    }));
    expect(run(expr, sales, salesTable)).toEqual({ total: 150, n: 5 });
  });

  it('should summarise into a one-row table when keeping dimensions', () => {
    const expr = summary(numbers, s => ({ total: sum(s) }), { keepdims: true });
    const result = run(expr, numbers, Float64Array.from([1, 2]));
    expect(toArray(result)).toEqual([{ total: 3 }]);
  });

  it('should group by key in order of first occurrence', () => {
    const expr = by(sales, ['region'], g => ({
      total: sum(field(g, 'amount')),
      n: count(g),
    }));
    expect(toArray(run(expr, sales, salesTable))).toEqual([
      { region: 'north', total: 40, n: 2 },
      { region: 'south', total: 70, n: 2 },
      { region: 'east', total: 40, n: 1 },
    ]);
  });

  it('should keep NaN and null keys in separate groups', () => {
    const readings = symbol(
      'readings',
      collectionOf(
        recordElement([
          { name: 'score', dtype: 'float64' },
          { name: 'w', dtype: 'float64' },
        ])
      )
    );
    const table = new Table({ score: [NaN, null, NaN, 1], w: Float64Array.from([1, 2, 3, 4]) });
    const expr = by(readings, ['score'], g => ({ n: count(g) }));
    expect(toArray(run(expr, readings, table))).toEqual([
      { score: NaN, n: 2 },
      { score: null, n: 1 },
      { score: 1, n: 1 },
    ]);
  });

  it('should bind any subexpression, not only symbols', () => {
    const amounts = field(sales, 'amount');
    const expr = sum(amounts);
    expect(evaluate(expr, new Map([[amounts, Float64Array.from([1, 1])]]))).toBe(2);
  });
});
