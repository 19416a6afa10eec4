/**
 * @chunkwise/query - Route selection
 *
 * One dispatch table decides how an expression runs against a source. Each
 * rule names the operation class it serves, the source capabilities it needs
 * and a guard over the planning context. The first applicable rule wins.
 *
 * | route     | class     | requires | guard                               |
 * |-----------|-----------|----------|-------------------------------------|
 * | direct    | cheap     | slice    | data fits in memory                 |
 * | masked    | cheap     | where    | a selection directly over the leaf  |
 * | streamed  | cheap     | iterate  |                                     |
 * | in-memory | reduction | slice    | data fits and chunking not forced   |
 * | chunked   | reduction | slice    |                                     |
 */

import { UnsupportedOperationError, type SourceCapability } from '@chunkwise/core';
import { format, nodes, reaches, type Expr, type SelectionNode, type SymbolNode } from '@chunkwise/expr';
import type { OperationClass } from './classifier.js';

// =============================================================================
// Types
// =============================================================================

export type Route = 'direct' | 'masked' | 'streamed' | 'in-memory' | 'chunked';

export interface RouteContext {
  expr: Expr;
  leaf: SymbolNode;
  operationClass: OperationClass;
  capabilities: ReadonlySet<SourceCapability>;
  /** Whether the source fits in memory */
  fits: boolean;
  /** Chunk reductions even when the source fits */
  forceChunked: boolean;
}

export interface RouteRule {
  route: Route;
  operationClass: OperationClass;
  requires: readonly SourceCapability[];
  /** Human-readable guard, used in selection reasons */
  description: string;
  applies(context: RouteContext): boolean;
}

export interface RouteSelection {
  route: Route;
  rule: RouteRule;
  /** Why the route was chosen */
  reason: string;
  /** Selection for the masked route */
  selection: SelectionNode | null;
}

// =============================================================================
// Guards
// =============================================================================

/**
 * The selection a masked scan can push into the source: the only node that
 * reads the leaf must be a selection taken directly over it.
 */
export function findMaskedSelection(expr: Expr, leaf: SymbolNode): SelectionNode | null {
  const candidates = nodes(expr).filter(
    (node): node is SelectionNode => node.tag === 'selection' && node.child === leaf
  );
  const unique = [...new Set(candidates)];
  if (unique.length !== 1) return null;
  const [selection] = unique;
  return reaches(expr, leaf, new Set<Expr>([selection])) ? null : selection;
}

// =============================================================================
// Dispatch Table
// =============================================================================

export const ROUTE_TABLE: readonly RouteRule[] = [
  {
    route: 'direct',
    operationClass: 'cheap',
    requires: ['slice'],
    description: 'data fits in memory',
    applies: (context) => context.fits,
  },
  {
    route: 'masked',
    operationClass: 'cheap',
    requires: ['where'],
    description: 'selection directly over the source',
    applies: (context) => findMaskedSelection(context.expr, context.leaf) !== null,
  },
  {
    route: 'streamed',
    operationClass: 'cheap',
    requires: ['iterate'],
    description: 'single pass over the source',
    applies: () => true,
  },
  {
    route: 'in-memory',
    operationClass: 'reduction',
    requires: ['slice'],
    description: 'data fits in memory',
    applies: (context) => context.fits && !context.forceChunked,
  },
  {
    route: 'chunked',
    operationClass: 'reduction',
    requires: ['slice'],
    description: 'split into chunk and aggregate parts',
    applies: () => true,
  },
];

/**
 * Pick the first rule whose class, capabilities and guard match.
 *
 * @throws UnsupportedOperationError when no rule matches
 */
export function selectRoute(context: RouteContext, table: readonly RouteRule[] = ROUTE_TABLE): RouteSelection {
  for (const rule of table) {
    if (rule.operationClass !== context.operationClass) continue;
    if (!rule.requires.every(capability => context.capabilities.has(capability))) continue;
    if (!rule.applies(context)) continue;

    return {
      route: rule.route,
      rule,
      reason: `${context.operationClass} expression, ${context.fits ? 'fits' : 'does not fit'} in memory: ${rule.description}`,
      selection: rule.route === 'masked' ? findMaskedSelection(context.expr, context.leaf) : null,
    };
  }

  throw new UnsupportedOperationError(
    `No execution route for ${format(context.expr)}`,
    undefined,
    {
      operation: 'route',
      operationClass: context.operationClass,
      capabilities: [...context.capabilities],
      fits: context.fits,
    },
    'Provide a source that supports slicing or iteration'
  );
}
