/**
 * @chunkwise/expr - Vectorised predicate compilation
 *
 * Turns a selection predicate into a function from a batch (a column or a
 * table) to a keep-mask. Only numeric and boolean data is supported: numeric
 * and boolean fields, numeric and boolean literals, arithmetic, comparisons,
 * `&`, `|`, `neg`, `abs` and `not`. Anything else raises
 * PredicateCompilationError, either while compiling or, for nulls and
 * strings met in the data, while applying the mask. Callers catch it and
 * evaluate the predicate element by element instead.
 */

import {
  PredicateCompilationError,
  isNumericArray,
  isTable,
  type BatchMask,
  type Column,
  type Table,
} from '@chunkwise/core';
import { format } from './format.js';
import type { BinaryOp, Expr, Operand, SymbolNode, UnaryOp } from './types.js';
import { isExpr } from './types.js';

/** A number per element, or one number broadcast over the batch */
type Vector = Float64Array | number;

type CompiledExpr = (batch: Column | Table) => Vector;

function unsupported(node: Expr, reason: string): PredicateCompilationError {
  return new PredicateCompilationError(`Cannot vectorise ${format(node)}: ${reason}`, {
    tag: node.tag,
    reason,
  });
}

/**
 * Dense float64 view of a column; booleans become 0/1.
 */
function toVector(column: Column, source: Expr): Float64Array {
  if (isNumericArray(column)) return Float64Array.from(column);
  const out = new Float64Array(column.length);
  for (let i = 0; i < column.length; i++) {
    const value = column[i];
    if (typeof value === 'number') {
      out[i] = value;
    } else if (typeof value === 'boolean') {
      out[i] = value ? 1 : 0;
    } else {
      throw unsupported(source, value === null ? 'null values' : 'string values');
    }
  }
  return out;
}

function applyBinary(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      return a / b;
    case '**':
      return a ** b;
    case '%':
      return a % b;
    case '>':
      return a > b ? 1 : 0;
    case '>=':
      return a >= b ? 1 : 0;
    case '<':
      return a < b ? 1 : 0;
    case '<=':
      return a <= b ? 1 : 0;
    case '==':
      return a === b ? 1 : 0;
    case '!=':
      return a !== b ? 1 : 0;
    case '&':
      return a !== 0 && b !== 0 ? 1 : 0;
    case '|':
      return a !== 0 || b !== 0 ? 1 : 0;
  }
}

function applyUnary(op: UnaryOp, a: number): number {
  switch (op) {
    case 'neg':
      return -a;
    case 'abs':
      return Math.abs(a);
    case 'not':
      return a === 0 ? 1 : 0;
    default:
      return Number.NaN;
  }
}

function broadcast2(a: Vector, b: Vector, fn: (x: number, y: number) => number): Vector {
  if (typeof a === 'number' && typeof b === 'number') return fn(a, b);
  const length = typeof a === 'number' ? (typeof b === 'number' ? 0 : b.length) : a.length;
  const out = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    out[i] = fn(typeof a === 'number' ? a : a[i], typeof b === 'number' ? b : b[i]);
  }
  return out;
}

function broadcast1(a: Vector, fn: (x: number) => number): Vector {
  return typeof a === 'number' ? fn(a) : a.map(fn);
}

function compileOperand(operand: Operand, element: SymbolNode, parent: Expr): CompiledExpr {
  if (isExpr(operand)) return compileNode(operand, element);
  if (typeof operand === 'number') return () => operand;
  if (typeof operand === 'boolean') {
    const value = operand ? 1 : 0;
    return () => value;
  }
  throw unsupported(parent, operand === null ? 'null literal' : 'string literal');
}

function compileNode(node: Expr, element: SymbolNode): CompiledExpr {
  switch (node.tag) {
    case 'symbol': {
      if (node !== element) throw unsupported(node, 'symbol is not the selected element');
      if (node.schema.element.kind !== 'scalar') throw unsupported(node, 'whole records');
      return batch => {
        if (isTable(batch)) throw unsupported(node, 'expected a column batch');
        return toVector(batch, node);
      };
    }
    case 'field': {
      if (node.child !== element) throw unsupported(node, 'nested field access');
      const name = node.name;
      return batch => {
        if (!isTable(batch)) throw unsupported(node, 'expected a table batch');
        return toVector(batch.column(name), node);
      };
    }
    case 'binop': {
      const lhs = compileOperand(node.lhs, element, node);
      const rhs = compileOperand(node.rhs, element, node);
      const op = node.op;
      return batch => broadcast2(lhs(batch), rhs(batch), (a, b) => applyBinary(op, a, b));
    }
    case 'unop': {
      const op = node.op;
      if (op !== 'neg' && op !== 'abs' && op !== 'not') {
        throw unsupported(node, `${op} is not vectorised`);
      }
      const child = compileNode(node.child, element);
      return batch => broadcast1(child(batch), a => applyUnary(op, a));
    }
    default:
      throw unsupported(node, `${node.tag} is not vectorised`);
  }
}

/**
 * Compile `predicate`, an expression over `element`, into a batch mask.
 *
 * @throws PredicateCompilationError when the predicate has no vectorised form
 */
export function compilePredicate(predicate: Expr, element: SymbolNode): BatchMask {
  const compiled = compileNode(predicate, element);
  return batch => {
    const result = compiled(batch);
    const mask = new Uint8Array(batch.length);
    for (let i = 0; i < mask.length; i++) {
      const value = typeof result === 'number' ? result : result[i];
      mask[i] = value !== 0 && !Number.isNaN(value) ? 1 : 0;
    }
    return mask;
  };
}
