/**
 * Tests for traversal, substitution and formatting
 */

import { describe, it, expect } from 'vitest';
import { collectionOf, recordElement } from '@chunkwise/core';
import {
  add,
  by,
  distinct,
  field,
  gt,
  head,
  like,
  mul,
  project,
  select,
  slice,
  sum,
  summary,
  count,
  symbol,
  variance,
} from '../builders.js';
import { format } from '../format.js';
import { children, leaves, nodes, reaches, substitute } from '../traversal.js';

const schema = collectionOf(
  recordElement([
    { name: 'x', dtype: 'float64' },
    { name: 'k', dtype: 'string' },
  ])
);
const t = symbol('t', schema);
const u = symbol('u', schema);

describe('children and leaves', () => {
  it('should skip literal operands', () => {
    const x = field(t, 'x');
    expect(children(add(x, 1))).toEqual([x]);
    expect(children(t)).toEqual([]);
  });

  it('should list each leaf once', () => {
    expect(leaves(add(field(t, 'x'), mul(field(u, 'x'), field(t, 'x'))))).toEqual([t, u]);
  });

  it('should not descend into selection predicates', () => {
    const selection = select(t, row => gt(field(row, 'x'), 0));
    expect(leaves(selection)).toEqual([t]);
    expect(reaches(selection, selection.element)).toBe(false);
  });

  it('should stop at blocked nodes', () => {
    const selection = select(t, row => gt(field(row, 'x'), 0));
    const expr = field(selection, 'x');
    expect(reaches(expr, t)).toBe(true);
    expect(reaches(expr, t, new Set([selection]))).toBe(false);
  });

  it('should list nodes parents first', () => {
    const x = field(t, 'x');
    const total = sum(x);
    expect(nodes(total)).toEqual([total, x, t]);
  });
});

describe('substitute', () => {
  it('should rebuild the ancestors of a replaced node', () => {
    const expr = sum(field(t, 'x'));
    const replaced = substitute(expr, new Map([[t, u]]));
    expect(format(replaced)).toBe('sum(u.x)');
    expect(replaced).not.toBe(expr);
  });

  it('should return the same node when nothing changes', () => {
    const expr = add(sum(field(t, 'x')), 1);
    expect(substitute(expr, new Map([[u, t]]))).toBe(expr);
  });

  it('should keep selection predicates', () => {
    const expr = select(t, row => gt(field(row, 'x'), 3));
    expect(format(substitute(expr, new Map([[t, u]])))).toBe('u[(_.x > 3)]');
  });
});

describe('format', () => {
  it('should render each node kind', () => {
    expect(format(sum(field(t, 'x')))).toBe('sum(t.x)');
    expect(format(variance(field(t, 'x'), { unbiased: true }))).toBe('var(t.x, unbiased)');
    expect(format(head(t, 5))).toBe('t.head(5)');
    expect(format(slice(t, 2))).toBe('t[2:]');
    expect(format(slice(t, 2, 4))).toBe('t[2:4]');
    expect(format(project(t, ['x']))).toBe('t["x"]');
    expect(format(distinct(field(t, 'k')))).toBe('distinct(t.k)');
    expect(format(like(field(t, 'k'), 'a*'))).toBe('t.k.like("a*")');
    expect(format(add(field(t, 'k'), 'suffix'))).toBe('(t.k + "suffix")');
  });

  it('should render summaries and groups with their members', () => {
    expect(format(summary(t, s => ({ total: sum(field(s, 'x')), rows: count(s) })))).toBe(
      'summary(t, total=sum(summary.x), rows=count(summary))'
    );
    expect(format(by(t, ['k'], g => ({ total: sum(field(g, 'x')) })))).toBe(
      'by(t, [k], total=sum(group.x))'
    );
  });
});
