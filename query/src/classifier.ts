/**
 * @chunkwise/query - Operation classifier
 *
 * Cheap operations can run element by element over a stream or a filtered
 * source without materializing it. Everything else needs the whole input,
 * or a chunk/aggregate split, and is classed as a reduction.
 */

import { reaches, children, type Expr, type ExprTag } from '@chunkwise/expr';

export type OperationClass = 'cheap' | 'reduction';

const CHEAP_TAGS: ReadonlySet<ExprTag> = new Set<ExprTag>([
  'symbol',
  'field',
  'projection',
  'selection',
  'binop',
  'unop',
  'like',
  'relabel',
  'head',
  'distinct',
]);

export function isCheap(expr: Expr): boolean {
  return CHEAP_TAGS.has(expr.tag);
}

/**
 * True when every node between `expr` and `leaf` (both included) is cheap.
 * Branches that do not reach the leaf are not inspected.
 */
export function isCheapPath(expr: Expr, leaf: Expr): boolean {
  if (expr === leaf) return true;
  if (!isCheap(expr)) return false;
  return children(expr)
    .filter(child => reaches(child, leaf))
    .every(child => isCheapPath(child, leaf));
}

export function classifyOperation(expr: Expr, leaf: Expr): OperationClass {
  return isCheapPath(expr, leaf) ? 'cheap' : 'reduction';
}
