/**
 * @chunkwise/expr - Field usage
 *
 * Works out which fields of a record leaf an expression reads, so that only
 * those columns are loaded. Demand flows from the root down: a node asks its
 * child for the fields it needs to produce the fields asked of it.
 *
 * @example
 * ```typescript
 * requiredFields(sum(field(t, 'fare')), t);                      // ['fare']
 * requiredFields(count(select(t, r => gt(field(r, 'km'), 3))), t); // ['km']
 * requiredFields(head(t, 5), t);                                  // null
 * ```
 */

import type { Expr, SymbolNode } from './types.js';
import { isExpr } from './types.js';

/** Field names, or 'all' when the whole element is needed */
type Demand = ReadonlySet<string> | 'all';

const ROWS_ONLY: Demand = new Set<string>();

function union(a: Demand, b: Demand): Demand {
  if (a === 'all' || b === 'all') return 'all';
  return new Set([...a, ...b]);
}

/**
 * Demand that reaches `target` from every occurrence of it under `expr`,
 * given that `demand` is asked of `expr` itself. Null when `target` does not
 * occur.
 */
function demandOn(expr: Expr, target: SymbolNode, demand: Demand): Demand | null {
  if (expr === target) return demand;

  const down = (child: Expr, childDemand: Demand): Demand | null => demandOn(child, target, childDemand);
  const inner = (body: Expr, symbol: SymbolNode): Demand => demandOn(body, symbol, 'all') ?? ROWS_ONLY;

  switch (expr.tag) {
    case 'symbol':
      return null;
    case 'field':
      return down(expr.child, new Set([expr.name]));
    case 'projection': {
      const asked = demand;
      const kept = asked === 'all' ? expr.fields : expr.fields.filter(name => asked.has(name));
      return down(expr.child, new Set(kept));
    }
    case 'relabel': {
      if (demand === 'all') return down(expr.child, 'all');
      const original = new Map(Object.entries(expr.mapping).map(([from, to]) => [to, from]));
      return down(expr.child, new Set([...demand].map(name => original.get(name) ?? name)));
    }
    case 'selection':
      return down(expr.child, union(demand, inner(expr.predicate, expr.element)));
    case 'head':
    case 'slice':
      return down(expr.child, demand);
    case 'distinct':
      // duplicates are judged on whole elements
      return down(expr.child, 'all');
    case 'reduction':
      // counting records needs rows, not fields; nunique compares whole records
      return down(expr.child, expr.fn === 'count' || expr.fn === 'nelements' ? ROWS_ONLY : 'all');
    case 'partial':
      return down(expr.child, expr.fn === 'count' || expr.fn === 'nelements' ? ROWS_ONLY : 'all');
    case 'summary':
      return down(
        expr.child,
        Object.values(expr.members).reduce<Demand>((acc, member) => union(acc, inner(member, expr.input)), ROWS_ONLY)
      );
    case 'by':
      return down(
        expr.child,
        Object.values(expr.aggregates).reduce<Demand>(
          (acc, aggregate) => union(acc, inner(aggregate, expr.group)),
          new Set(expr.keys)
        )
      );
    case 'binop': {
      let found: Demand | null = null;
      for (const operand of [expr.lhs, expr.rhs].filter(isExpr)) {
        const reached = down(operand, 'all');
        if (reached !== null) found = found === null ? reached : union(found, reached);
      }
      return found;
    }
    case 'unop':
    case 'like':
    case 'combine':
      return down(expr.child, 'all');
  }
}

/**
 * Fields of the record leaf `leaf` that evaluating `expr` reads, in the
 * leaf's declared order. Null when every field is needed or the leaf is not a
 * collection of records. At least one field is kept so that row counts
 * survive.
 */
export function requiredFields(expr: Expr, leaf: SymbolNode): string[] | null {
  const element = leaf.schema.element;
  if (element.kind !== 'record') return null;

  const demand = demandOn(expr, leaf, 'all');
  if (demand === null || demand === 'all') return null;

  const declared = element.fields.map(f => f.name);
  const used = declared.filter(name => demand.has(name));
  if (used.length === declared.length) return null;
  return used.length > 0 ? used : declared.slice(0, 1);
}
