/**
 * @chunkwise/expr - Expression formatting
 *
 * Renders an expression as a compact single line for logs and plans.
 *
 * @example
 * ```typescript
 * format(sum(field(t, 'amount')));        // 'sum(t.amount)'
 * format(select(t, r => gt(field(r, 'amount'), 0)));  // 't[(_.amount > 0)]'
 * ```
 */

import type { Expr, Operand } from './types.js';
import { isExpr } from './types.js';

function formatOperand(operand: Operand): string {
  if (isExpr(operand)) return format(operand);
  return typeof operand === 'string' ? JSON.stringify(operand) : String(operand);
}

function formatMembers(members: Readonly<Record<string, Expr>>): string {
  return Object.entries(members)
    .map(([name, member]) => `${name}=${format(member)}`)
    .join(', ');
}

export function format(expr: Expr): string {
  switch (expr.tag) {
    case 'symbol':
      return expr.name;
    case 'field':
      return `${format(expr.child)}.${expr.name}`;
    case 'projection':
      return `${format(expr.child)}[${expr.fields.map(f => JSON.stringify(f)).join(', ')}]`;
    case 'selection':
      return `${format(expr.child)}[${format(expr.predicate)}]`;
    case 'head':
      return `${format(expr.child)}.head(${expr.n})`;
    case 'slice':
      return `${format(expr.child)}[${expr.start}:${expr.stop ?? ''}]`;
    case 'binop':
      return `(${formatOperand(expr.lhs)} ${expr.op} ${formatOperand(expr.rhs)})`;
    case 'unop':
      return `${expr.op}(${format(expr.child)})`;
    case 'like':
      return `${format(expr.child)}.like(${JSON.stringify(expr.pattern)})`;
    case 'relabel': {
      const pairs = Object.entries(expr.mapping).map(([from, to]) => `${from}=${to}`);
      return `${format(expr.child)}.relabel(${pairs.join(', ')})`;
    }
    case 'distinct':
      return `distinct(${format(expr.child)})`;
    case 'reduction':
      return `${expr.fn}(${format(expr.child)}${expr.unbiased ? ', unbiased' : ''})`;
    case 'summary':
      return `summary(${format(expr.child)}, ${formatMembers(expr.members)})`;
    case 'by':
      return `by(${format(expr.child)}, [${expr.keys.join(', ')}], ${formatMembers(expr.aggregates)})`;
    case 'partial':
      return `partial_${expr.fn}(${format(expr.child)})`;
    case 'combine':
      return `combine_${expr.fn}(${format(expr.child)}${expr.prefix === '' ? '' : `, ${JSON.stringify(expr.prefix)}`})`;
  }
}
