/**
 * @chunkwise/expr - Expression splitting
 *
 * Rewrites an expression over a leaf into a chunk expression, applied to every
 * partition of the leaf's data, and an aggregate expression, applied once to
 * the chunk results concatenated in partition order. Evaluating the pair gives
 * the same value as evaluating the original over the whole dataset.
 *
 * The split point (the center) is the lowest node on the path from the leaf
 * that is not elementwise. Everything below it moves into the chunk
 * expression; the center itself is rewritten into a chunk part and an
 * aggregate part; everything above it stays in the aggregate expression.
 *
 * @example
 * ```typescript
 * const chunk = symbol('chunk', collectionOf(t.schema.element, 1024));
 * const parts = split(t, mean(field(t, 'amount')), chunk);
 * format(parts.chunk.expr);      // 'partial_mean(chunk.amount)'
 * format(parts.aggregate.expr);  // 'combine_mean(aggregate)'
 * ```
 */

import { UnsupportedOperationError, collectionOf } from '@chunkwise/core';
import {
  byWith,
  combine,
  distinct,
  head,
  partial,
  reduction,
  slice,
  summaryWith,
  symbol,
} from './builders.js';
import { format } from './format.js';
import { children, reaches, substitute } from './traversal.js';
import type { AlgebraicReduction, Expr, SymbolNode } from './types.js';
import { ELEMENTWISE_TAGS, isAlgebraic } from './types.js';

export interface SplitPart {
  readonly symbol: SymbolNode;
  readonly expr: Expr;
}

export interface SplitResult {
  readonly chunk: SplitPart;
  readonly aggregate: SplitPart;
}

export type Splitter = (leaf: SymbolNode, expr: Expr, chunk: SymbolNode) => SplitResult;

// =============================================================================
// Center Discovery
// =============================================================================

/**
 * Lowest non-elementwise node between `expr` and `leaf`, or null when every
 * node on the way is elementwise.
 */
export function findCenter(expr: Expr, leaf: Expr): Expr | null {
  if (expr === leaf) return null;

  const reaching = children(expr).filter(child => reaches(child, leaf));
  const centers: Expr[] = [];
  for (const child of reaching) {
    const center = findCenter(child, leaf);
    if (center !== null) centers.push(center);
  }

  if (centers.length > 1) {
    throw UnsupportedOperationError.notSplittable(
      format(expr),
      'more than one branch reduces the leaf'
    );
  }
  if (centers.length === 1) {
    if (reaching.length > 1) {
      throw UnsupportedOperationError.notSplittable(
        format(expr),
        'a second branch still reaches the leaf'
      );
    }
    return centers[0];
  }
  if (reaching.length === 0 || ELEMENTWISE_TAGS.has(expr.tag)) return null;
  return expr;
}

// =============================================================================
// Member Rewriting
// =============================================================================

interface AlgebraicMember {
  fn: AlgebraicReduction;
  child: Expr;
  unbiased: boolean;
}

/**
 * A summary member or group aggregate that splits into partial and combine:
 * an algebraic reduction whose input is elementwise over `input`.
 */
function algebraicMember(owner: Expr, name: string, member: Expr, input: SymbolNode): AlgebraicMember {
  if (member.tag !== 'reduction' || !isAlgebraic(member.fn) || member.keepdims) {
    throw UnsupportedOperationError.notSplittable(
      format(owner),
      `member "${name}" is not an algebraic reduction`
    );
  }
  if (!reaches(member.child, input) || findCenter(member.child, input) !== null) {
    throw UnsupportedOperationError.notSplittable(
      format(owner),
      `member "${name}" does not reduce an elementwise expression of its input`
    );
  }
  return { fn: member.fn, child: member.child, unbiased: member.unbiased };
}

function splitMembers(
  owner: Expr,
  members: Readonly<Record<string, Expr>>,
  input: SymbolNode
): Array<[string, AlgebraicMember]> {
  return Object.entries(members).map(([name, member]): [string, AlgebraicMember] => [
    name,
    algebraicMember(owner, name, member, input),
  ]);
}

function partials(split: Array<[string, AlgebraicMember]>): Record<string, Expr> {
  return Object.fromEntries(split.map(([name, m]) => [name, partial(m.fn, m.child)]));
}

function combines(split: Array<[string, AlgebraicMember]>, input: SymbolNode): Record<string, Expr> {
  return Object.fromEntries(
    split.map(([name, m]) => [name, combine(m.fn, input, { prefix: `${name}.`, unbiased: m.unbiased })])
  );
}

// =============================================================================
// Split
// =============================================================================

/**
 * Split `expr` over `leaf` into chunk and aggregate expressions.
 *
 * @throws UnsupportedOperationError when no decomposition exists
 */
export function split(leaf: SymbolNode, expr: Expr, chunk: SymbolNode): SplitResult {
  const center = findCenter(expr, leaf);
  const toChunk = (node: Expr): Expr => substitute(node, new Map<Expr, Expr>([[leaf, chunk]]));

  if (center === null) {
    const chunkExpr = toChunk(expr);
    const aggregate = symbol('aggregate', collectionOf(chunkExpr.schema.element, null));
    return { chunk: { symbol: chunk, expr: chunkExpr }, aggregate: { symbol: aggregate, expr: aggregate } };
  }

  const [child] = children(center);
  const chunkChild = toChunk(child);
  let chunkExpr: Expr;
  let rewrite: (aggregate: SymbolNode) => Expr;

  switch (center.tag) {
    case 'head':
      chunkExpr = head(chunkChild, center.n);
      rewrite = aggregate => head(aggregate, center.n);
      break;
    case 'distinct':
      chunkExpr = distinct(chunkChild);
      rewrite = aggregate => distinct(aggregate);
      break;
    case 'slice':
      chunkExpr = chunkChild;
      rewrite = aggregate => slice(aggregate, center.start, center.stop);
      break;
    case 'reduction': {
      const fn = center.fn;
      if (!isAlgebraic(fn)) {
        // nunique: exact union of per-chunk distinct sets
        chunkExpr = distinct(chunkChild);
        rewrite = aggregate => reduction(fn, aggregate, { keepdims: center.keepdims });
        break;
      }
      chunkExpr = partial(fn, chunkChild);
      rewrite = aggregate =>
        combine(fn, aggregate, { keepdims: center.keepdims, unbiased: center.unbiased });
      break;
    }
    case 'summary': {
      const members = splitMembers(center, center.members, center.input);
      chunkExpr = summaryWith(chunkChild, center.input, partials(members), true);
      rewrite = aggregate => {
        const input = symbol('summary', aggregate.schema);
        return summaryWith(aggregate, input, combines(members, input), center.keepdims);
      };
      break;
    }
    case 'by': {
      const members = splitMembers(center, center.aggregates, center.group);
      chunkExpr = byWith(chunkChild, center.keys, center.group, partials(members));
      rewrite = aggregate => {
        const group = symbol('group', aggregate.schema);
        return byWith(aggregate, center.keys, group, combines(members, group));
      };
      break;
    }
    default:
      throw UnsupportedOperationError.notSplittable(
        format(expr),
        `${center.tag} has no chunk decomposition`
      );
  }

  const aggregate = symbol('aggregate', collectionOf(chunkExpr.schema.element, null));
  return {
    chunk: { symbol: chunk, expr: chunkExpr },
    aggregate: {
      symbol: aggregate,
      expr: substitute(expr, new Map<Expr, Expr>([[center, rewrite(aggregate)]])),
    },
  };
}
