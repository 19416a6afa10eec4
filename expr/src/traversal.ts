/**
 * @chunkwise/expr - Tree traversal and substitution
 *
 * Traversal follows children only. The internal expressions of selection,
 * summary and by nodes are over their own symbols and are not visited.
 */

import {
  binop,
  combine,
  byWith,
  distinct,
  field,
  head,
  like,
  partial,
  project,
  reduction,
  relabel,
  selectWith,
  slice,
  summaryWith,
  unop,
} from './builders.js';
import type { Expr, Operand, SymbolNode } from './types.js';
import { isExpr } from './types.js';

/**
 * Direct children of a node.
 */
export function children(expr: Expr): Expr[] {
  switch (expr.tag) {
    case 'symbol':
      return [];
    case 'binop':
      return [expr.lhs, expr.rhs].filter(isExpr);
    default:
      return [expr.child];
  }
}

/**
 * True when `target` occurs in the tree rooted at `expr`. Subtrees rooted at
 * a node in `blocked` are not searched.
 */
export function reaches(expr: Expr, target: Expr, blocked?: ReadonlySet<Expr>): boolean {
  if (expr === target) return true;
  if (blocked?.has(expr)) return false;
  return children(expr).some(child => reaches(child, target, blocked));
}

/**
 * Distinct symbols at the leaves of the tree, in depth-first order.
 */
export function leaves(expr: Expr): SymbolNode[] {
  const found: SymbolNode[] = [];
  const visit = (node: Expr): void => {
    if (node.tag === 'symbol') {
      if (!found.includes(node)) found.push(node);
      return;
    }
    for (const child of children(node)) visit(child);
  };
  visit(expr);
  return found;
}

/**
 * Every node of the tree, parents before children, each once.
 */
export function nodes(expr: Expr): Expr[] {
  const seen = new Set<Expr>();
  const visit = (node: Expr): void => {
    if (seen.has(node)) return;
    seen.add(node);
    for (const child of children(node)) visit(child);
  };
  visit(expr);
  return [...seen];
}

/**
 * Rebuild `expr` with each child replaced by `fn(child)`. Nodes whose
 * children are unchanged are returned as is.
 */
export function mapChildren(expr: Expr, fn: (child: Expr) => Expr): Expr {
  if (expr.tag === 'symbol') return expr;

  if (expr.tag === 'binop') {
    const mapOperand = (operand: Operand): Operand => (isExpr(operand) ? fn(operand) : operand);
    const lhs = mapOperand(expr.lhs);
    const rhs = mapOperand(expr.rhs);
    return lhs === expr.lhs && rhs === expr.rhs ? expr : binop(expr.op, lhs, rhs);
  }

  const child = fn(expr.child);
  if (child === expr.child) return expr;

  switch (expr.tag) {
    case 'field':
      return field(child, expr.name);
    case 'projection':
      return project(child, expr.fields);
    case 'selection':
      return selectWith(child, expr.element, expr.predicate);
    case 'head':
      return head(child, expr.n);
    case 'slice':
      return slice(child, expr.start, expr.stop);
    case 'unop':
      return unop(expr.op, child);
    case 'like':
      return like(child, expr.pattern);
    case 'relabel':
      return relabel(child, expr.mapping);
    case 'distinct':
      return distinct(child);
    case 'reduction':
      return reduction(expr.fn, child, { keepdims: expr.keepdims, unbiased: expr.unbiased });
    case 'summary':
      return summaryWith(child, expr.input, expr.members, expr.keepdims);
    case 'by':
      return byWith(child, expr.keys, expr.group, expr.aggregates);
    case 'partial':
      return partial(expr.fn, child);
    case 'combine':
      return combine(expr.fn, child, {
        prefix: expr.prefix,
        keepdims: expr.keepdims,
        unbiased: expr.unbiased,
      });
  }
}

/**
 * Replace every occurrence of each key of `replacements` by its value,
 * rebuilding the ancestors of replaced nodes.
 */
export function substitute(expr: Expr, replacements: ReadonlyMap<Expr, Expr>): Expr {
  const memo = new Map<Expr, Expr>();
  const visit = (node: Expr): Expr => {
    const replacement = replacements.get(node);
    if (replacement !== undefined) return replacement;
    const cached = memo.get(node);
    if (cached !== undefined) return cached;
    const rebuilt = mapChildren(node, visit);
    memo.set(node, rebuilt);
    return rebuilt;
  };
  return visit(expr);
}
