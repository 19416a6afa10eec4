/**
 * Tests for route selection
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  UnsupportedOperationError,
  collectionOf,
  recordElement,
  type SourceCapability,
} from '@chunkwise/core';
import { add, field, gt, head, select, sum, symbol, type Expr, type SymbolNode } from '@chunkwise/expr';
import { classifyOperation } from '../classifier.js';
import { ROUTE_TABLE, findMaskedSelection, selectRoute, type RouteContext } from '../routing.js';

const t = symbol(
  't',
  collectionOf(
    recordElement([
      { name: 'x', dtype: 'float64' },
      { name: 'y', dtype: 'float64' },
    ])
  )
);

const ALL: ReadonlySet<SourceCapability> = new Set<SourceCapability>(['slice', 'iterate', 'where']);
const PLAIN: ReadonlySet<SourceCapability> = new Set<SourceCapability>(['slice', 'iterate']);

function context(expr: Expr, overrides: Partial<RouteContext> = {}): RouteContext {
  return {
    expr,
    leaf: t,
    operationClass: classifyOperation(expr, t),
    capabilities: ALL,
    fits: true,
    forceChunked: false,
    ...overrides,
  };
}

describe('findMaskedSelection', () => {
  it('should find a selection taken directly over the leaf', () => {
    const selection = select(t, row => gt(field(row, 'x'), 0));
    expect(findMaskedSelection(field(selection, 'y'), t)).toBe(selection);
  });

  it('should reject trees where the leaf is also read outside the selection', () => {
    const selection = select(t, row => gt(field(row, 'x'), 0));
    expect(findMaskedSelection(add(field(selection, 'y'), sum(field(t, 'x'))), t)).toBeNull();
  });

  it('should reject selections over derived data', () => {
    const inner = head(t, 10);
    const selection = select(inner, row => gt(field(row, 'x'), 0));
    expect(findMaskedSelection(selection, t)).toBeNull();
  });

  it('should return null without a selection', () => {
    expect(findMaskedSelection(field(t, 'x'), t)).toBeNull();
  });
});

describe('selectRoute', () => {
  const filtered = select(t, row => gt(field(row, 'x'), 0));

  it('should run cheap expressions directly when the data fits', () => {
    const selection = selectRoute(context(filtered));
    expect(selection.route).toBe('direct');
    expect(selection.reason).toBe('cheap expression, fits in memory: data fits in memory');
    expect(selection.selection).toBeNull();
  });

  it('should mask a selection over a large filterable source', () => {
    const selection = selectRoute(context(filtered, { fits: false }));
    expect(selection.route).toBe('masked');
    expect(selection.selection).toBe(filtered);
    expect(selection.reason).toBe('cheap expression, does not fit in memory: selection directly over the source');
  });

  it('should stream cheap expressions otherwise', () => {
    expect(selectRoute(context(filtered, { fits: false, capabilities: PLAIN })).route).toBe('streamed');
    expect(selectRoute(context(field(t, 'x'), { fits: false })).route).toBe('streamed');
  });

  it('should run reductions in memory when the data fits', () => {
    expect(selectRoute(context(sum(field(t, 'x')))).route).toBe('in-memory');
  });

  it('should chunk reductions that do not fit or when forced', () => {
    expect(selectRoute(context(sum(field(t, 'x')), { fits: false })).route).toBe('chunked');
    expect(selectRoute(context(sum(field(t, 'x')), { forceChunked: true })).route).toBe('chunked');
  });

  it('should fail when no rule applies', () => {
    const onlyCheap = ROUTE_TABLE.filter(rule => rule.operationClass === 'cheap');
    try {
      selectRoute(context(sum(field(t, 'x'))), onlyCheap);
      expect.fail('expected selectRoute to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedOperationError);
      expect(error).toHaveProperty('code', ErrorCode.UNSUPPORTED_OPERATION);
    }
  });

  it('should skip rules whose capabilities the source lacks', () => {
    const leaf: SymbolNode = t;
    const iterateOnly = new Set<SourceCapability>(['iterate']);
    const selection = selectRoute({
      expr: field(leaf, 'x'),
      leaf,
      operationClass: 'cheap',
      capabilities: iterateOnly,
      fits: true,
      forceChunked: false,
    });
    expect(selection.route).toBe('streamed');
  });
});
