/**
 * @chunkwise/expr - Expression builders
 *
 * Every builder validates its inputs, derives the node's schema from its
 * children and returns a frozen node.
 *
 * @example
 * ```typescript
 * const t = symbol('t', collectionOf(recordElement([
 *   { name: 'amount', dtype: 'float64' },
 *   { name: 'region', dtype: 'string' },
 * ])));
 *
 * const total = sum(field(select(t, row => gt(field(row, 'amount'), 0)), 'amount'));
 * const perRegion = by(t, ['region'], g => ({ total: sum(field(g, 'amount')) }));
 * ```
 */

import {
  ValidationError,
  collectionOf,
  dtypeOfScalar,
  recordElement,
  scalarElement,
  scalarOf,
  isNumericDType,
  type DType,
  type DataShape,
  type ElementType,
  type Field,
} from '@chunkwise/core';
import { REDUCTION_STATE_FIELDS, acceptsAnyElement, reductionResultDType } from './reductions.js';
import type {
  AlgebraicReduction,
  BinOpNode,
  BinaryOp,
  ByNode,
  CombineNode,
  DistinctNode,
  Expr,
  FieldNode,
  HeadNode,
  LikeNode,
  Operand,
  PartialNode,
  ProjectionNode,
  ReductionFn,
  ReductionNode,
  RelabelNode,
  SelectionNode,
  SliceNode,
  SummaryNode,
  SymbolNode,
  UnOpNode,
  UnaryOp,
} from './types.js';
import { isExpr } from './types.js';

let lastId = 0;

function nextId(): number {
  lastId += 1;
  return lastId;
}

function freeze<T extends Expr>(node: T): T {
  Object.freeze(node);
  return node;
}

// =============================================================================
// Schema Helpers
// =============================================================================

function withElement(shape: DataShape, element: ElementType, length?: number | null): DataShape {
  if (shape.kind === 'scalar') return scalarOf(element);
  return collectionOf(element, length === undefined ? shape.length : length);
}

function requireRecord(shape: DataShape, path: string): readonly Field[] {
  if (shape.element.kind !== 'record') {
    throw ValidationError.typeMismatch(path, 'record', shape.element.dtype);
  }
  return shape.element.fields;
}

function requireCollection(shape: DataShape, path: string): void {
  if (shape.kind !== 'collection') {
    throw ValidationError.typeMismatch(path, 'collection', 'scalar');
  }
}

function requireField(fields: readonly Field[], name: string): Field {
  const found = fields.find(f => f.name === name);
  if (found === undefined) {
    throw ValidationError.columnNotFound(name, fields.map(f => f.name));
  }
  return found;
}

function scalarDType(shape: DataShape, path: string): DType {
  if (shape.element.kind !== 'scalar') {
    throw ValidationError.typeMismatch(path, 'scalar', 'record');
  }
  return shape.element.dtype;
}

/**
 * Fields a summary member or group aggregate contributes to its record:
 * the member name, or `name.field` for members that produce records.
 */
function memberFields(members: Readonly<Record<string, Expr>>): Field[] {
  const fields: Field[] = [];
  for (const [name, member] of Object.entries(members)) {
    const element = member.schema.element;
    if (element.kind === 'record') {
      for (const f of element.fields) {
        fields.push({ name: `${name}.${f.name}`, dtype: f.dtype });
      }
    } else {
      fields.push({ name, dtype: element.dtype });
    }
  }
  return fields;
}

function reductionShape(dtype: DType, keepdims: boolean): DataShape {
  return keepdims ? collectionOf(scalarElement(dtype), 1) : scalarOf(scalarElement(dtype));
}

// =============================================================================
// Leaves and Record Access
// =============================================================================

export function symbol(name: string, schema: DataShape): SymbolNode {
  return freeze<SymbolNode>({ tag: 'symbol', id: nextId(), name, schema });
}

export function field(child: Expr, name: string): FieldNode {
  const f = requireField(requireRecord(child.schema, name), name);
  return freeze<FieldNode>({
    tag: 'field',
    id: nextId(),
    child,
    name,
    schema: withElement(child.schema, scalarElement(f.dtype)),
  });
}

export function project(child: Expr, fields: readonly string[]): ProjectionNode {
  const available = requireRecord(child.schema, fields.join(', '));
  const kept = fields.map(name => requireField(available, name));
  return freeze<ProjectionNode>({
    tag: 'projection',
    id: nextId(),
    child,
    fields: [...fields],
    schema: withElement(child.schema, recordElement(kept)),
  });
}

export function relabel(child: Expr, mapping: Readonly<Record<string, string>>): RelabelNode {
  const available = requireRecord(child.schema, 'relabel');
  for (const name of Object.keys(mapping)) requireField(available, name);
  return freeze<RelabelNode>({
    tag: 'relabel',
    id: nextId(),
    child,
    mapping: { ...mapping },
    schema: withElement(
      child.schema,
      recordElement(available.map(f => ({ name: mapping[f.name] ?? f.name, dtype: f.dtype })))
    ),
  });
}

// =============================================================================
// Row Selection
// =============================================================================

/**
 * Keep the elements for which `predicate(element)` is true.
 */
export function select(child: Expr, predicate: (element: SymbolNode) => Expr): SelectionNode {
  requireCollection(child.schema, 'selection');
  const element = symbol('_', scalarOf(child.schema.element));
  return selectWith(child, element, predicate(element));
}

/** Selection from an existing element symbol and predicate */
export function selectWith(child: Expr, element: SymbolNode, predicate: Expr): SelectionNode {
  requireCollection(child.schema, 'selection');
  if (predicate.schema.kind !== 'scalar') {
    throw ValidationError.typeMismatch('predicate', 'scalar', 'collection');
  }
  return freeze<SelectionNode>({
    tag: 'selection',
    id: nextId(),
    child,
    element,
    predicate,
    schema: collectionOf(child.schema.element, null),
  });
}

export function head(child: Expr, n: number): HeadNode {
  requireCollection(child.schema, 'head');
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError('head() takes a non-negative integer', undefined, { n });
  }
  const length = child.schema.kind === 'collection' && child.schema.length !== null
    ? Math.min(n, child.schema.length)
    : null;
  return freeze<HeadNode>({
    tag: 'head',
    id: nextId(),
    child,
    n,
    schema: collectionOf(child.schema.element, length),
  });
}

export function slice(child: Expr, start: number, stop: number | null = null): SliceNode {
  requireCollection(child.schema, 'slice');
  if (!Number.isInteger(start) || start < 0 || (stop !== null && (!Number.isInteger(stop) || stop < 0))) {
    throw new ValidationError('slice() takes non-negative integer bounds', undefined, { start, stop });
  }
  let length: number | null = null;
  if (child.schema.kind === 'collection' && child.schema.length !== null) {
    const total = child.schema.length;
    const end = stop === null ? total : Math.min(stop, total);
    length = Math.max(0, end - Math.min(start, total));
  }
  return freeze<SliceNode>({
    tag: 'slice',
    id: nextId(),
    child,
    start,
    stop,
    schema: collectionOf(child.schema.element, length),
  });
}

export function distinct(child: Expr): DistinctNode {
  requireCollection(child.schema, 'distinct');
  return freeze<DistinctNode>({
    tag: 'distinct',
    id: nextId(),
    child,
    schema: collectionOf(child.schema.element, null),
  });
}

// =============================================================================
// Elementwise Arithmetic
// =============================================================================

function operandDType(operand: Operand): DType {
  if (isExpr(operand)) return scalarDType(operand.schema, 'operand');
  return dtypeOfScalar(operand) ?? 'float64';
}

function binopDType(op: BinaryOp, lhs: DType, rhs: DType): DType {
  switch (op) {
    case '>':
    case '>=':
    case '<':
    case '<=':
    case '==':
    case '!=':
    case '&':
    case '|':
      return 'bool';
    case '+':
      return lhs === 'string' && rhs === 'string' ? 'string' : 'float64';
    case '%':
      // a remainder is never larger than its dividend
      return lhs === 'int32' && rhs === 'int32' ? 'int32' : 'float64';
    default:
      // int32 + - * can leave the int32 range
      return 'float64';
  }
}

export function binop(op: BinaryOp, lhs: Operand, rhs: Operand): BinOpNode {
  const dtype = binopDType(op, operandDType(lhs), operandDType(rhs));
  const collection = [lhs, rhs].find(
    (o): o is Expr => isExpr(o) && o.schema.kind === 'collection'
  );
  const schema = collection === undefined
    ? scalarOf(scalarElement(dtype))
    : withElement(collection.schema, scalarElement(dtype));
  return freeze<BinOpNode>({ tag: 'binop', id: nextId(), op, lhs, rhs, schema });
}

export const add = (lhs: Operand, rhs: Operand): BinOpNode => binop('+', lhs, rhs);
export const sub = (lhs: Operand, rhs: Operand): BinOpNode => binop('-', lhs, rhs);
export const mul = (lhs: Operand, rhs: Operand): BinOpNode => binop('*', lhs, rhs);
export const div = (lhs: Operand, rhs: Operand): BinOpNode => binop('/', lhs, rhs);
export const pow = (lhs: Operand, rhs: Operand): BinOpNode => binop('**', lhs, rhs);
export const mod = (lhs: Operand, rhs: Operand): BinOpNode => binop('%', lhs, rhs);
export const gt = (lhs: Operand, rhs: Operand): BinOpNode => binop('>', lhs, rhs);
export const ge = (lhs: Operand, rhs: Operand): BinOpNode => binop('>=', lhs, rhs);
export const lt = (lhs: Operand, rhs: Operand): BinOpNode => binop('<', lhs, rhs);
export const le = (lhs: Operand, rhs: Operand): BinOpNode => binop('<=', lhs, rhs);
export const eq = (lhs: Operand, rhs: Operand): BinOpNode => binop('==', lhs, rhs);
export const ne = (lhs: Operand, rhs: Operand): BinOpNode => binop('!=', lhs, rhs);
export const and = (lhs: Operand, rhs: Operand): BinOpNode => binop('&', lhs, rhs);
export const or = (lhs: Operand, rhs: Operand): BinOpNode => binop('|', lhs, rhs);

export function unop(op: UnaryOp, child: Expr): UnOpNode {
  const input = scalarDType(child.schema, op);
  let dtype: DType;
  if (op === 'not') {
    dtype = 'bool';
  } else if (op === 'neg' || op === 'abs') {
    dtype = input === 'int32' ? 'int32' : 'float64';
  } else {
    dtype = 'float64';
  }
  return freeze<UnOpNode>({
    tag: 'unop',
    id: nextId(),
    op,
    child,
    schema: withElement(child.schema, scalarElement(dtype)),
  });
}

export const neg = (child: Expr): UnOpNode => unop('neg', child);
export const abs = (child: Expr): UnOpNode => unop('abs', child);
export const sqrt = (child: Expr): UnOpNode => unop('sqrt', child);
export const exp = (child: Expr): UnOpNode => unop('exp', child);
export const log = (child: Expr): UnOpNode => unop('log', child);
export const not = (child: Expr): UnOpNode => unop('not', child);

export function like(child: Expr, pattern: string): LikeNode {
  const dtype = scalarDType(child.schema, 'like');
  if (dtype !== 'string') {
    throw ValidationError.typeMismatch('like', 'string', dtype);
  }
  return freeze<LikeNode>({
    tag: 'like',
    id: nextId(),
    child,
    pattern,
    schema: withElement(child.schema, scalarElement('bool')),
  });
}

// =============================================================================
// Reductions
// =============================================================================

export interface ReductionOptions {
  keepdims?: boolean;
  unbiased?: boolean;
}

export function reduction(fn: ReductionFn, child: Expr, options: ReductionOptions = {}): ReductionNode {
  requireCollection(child.schema, fn);
  const element = child.schema.element;
  let input: DType = 'float64';
  if (element.kind === 'scalar') {
    input = element.dtype;
    if (!acceptsAnyElement(fn) && !isNumericDType(input) && input !== 'bool') {
      throw ValidationError.typeMismatch(fn, 'numeric', input);
    }
  } else if (!acceptsAnyElement(fn)) {
    throw ValidationError.typeMismatch(fn, 'numeric', 'record');
  }
  const keepdims = options.keepdims ?? false;
  return freeze<ReductionNode>({
    tag: 'reduction',
    id: nextId(),
    fn,
    child,
    keepdims,
    unbiased: options.unbiased ?? false,
    schema: reductionShape(reductionResultDType(fn, input), keepdims),
  });
}

export const sum = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('sum', child, options);
export const count = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('count', child, options);
export const nelements = (child: Expr, options?: ReductionOptions): ReductionNode =>
  reduction('nelements', child, options);
export const mean = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('mean', child, options);
export const variance = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('var', child, options);
export const std = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('std', child, options);
export const min = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('min', child, options);
export const max = (child: Expr, options?: ReductionOptions): ReductionNode => reduction('max', child, options);
export const nunique = (child: Expr, options?: ReductionOptions): ReductionNode =>
  reduction('nunique', child, options);

// =============================================================================
// Summaries and Grouping
// =============================================================================

/**
 * A record of several reductions over the same input.
 *
 * @example
 * ```typescript
 * summary(t, s => ({ total: sum(field(s, 'amount')), n: count(s) }));
 * ```
 */
export function summary(
  child: Expr,
  members: (input: SymbolNode) => Record<string, Expr>,
  options: { keepdims?: boolean } = {}
): SummaryNode {
  requireCollection(child.schema, 'summary');
  const input = symbol('summary', child.schema);
  return summaryWith(child, input, members(input), options.keepdims ?? false);
}

export function summaryWith(
  child: Expr,
  input: SymbolNode,
  members: Readonly<Record<string, Expr>>,
  keepdims: boolean
): SummaryNode {
  for (const [name, member] of Object.entries(members)) {
    if (member.schema.kind !== 'scalar' && member.schema.length !== 1) {
      throw ValidationError.typeMismatch(`summary.${name}`, 'reduction', 'collection');
    }
  }
  const element = recordElement(memberFields(members));
  return freeze<SummaryNode>({
    tag: 'summary',
    id: nextId(),
    child,
    input,
    members: { ...members },
    keepdims,
    schema: keepdims ? collectionOf(element, 1) : scalarOf(element),
  });
}

/**
 * Group by `keys`; each aggregate is a reduction over the group symbol.
 * Groups appear in order of first occurrence.
 */
export function by(
  child: Expr,
  keys: readonly string[],
  aggregates: (group: SymbolNode) => Record<string, Expr>
): ByNode {
  requireCollection(child.schema, 'by');
  const group = symbol('group', collectionOf(child.schema.element, null));
  return byWith(child, keys, group, aggregates(group));
}

export function byWith(
  child: Expr,
  keys: readonly string[],
  group: SymbolNode,
  aggregates: Readonly<Record<string, Expr>>
): ByNode {
  const available = requireRecord(child.schema, 'by');
  if (keys.length === 0) {
    throw new ValidationError('by() needs at least one key', undefined, { keys: [] });
  }
  const keyFields = keys.map(name => requireField(available, name));
  for (const [name, aggregate] of Object.entries(aggregates)) {
    if (aggregate.schema.kind !== 'scalar' && aggregate.schema.length !== 1) {
      throw ValidationError.typeMismatch(`by.${name}`, 'reduction', 'collection');
    }
  }
  return freeze<ByNode>({
    tag: 'by',
    id: nextId(),
    child,
    keys: [...keys],
    group,
    aggregates: { ...aggregates },
    schema: collectionOf(recordElement([...keyFields, ...memberFields(aggregates)]), null),
  });
}

// =============================================================================
// Split Reductions
// =============================================================================

export function partial(fn: AlgebraicReduction, child: Expr): PartialNode {
  requireCollection(child.schema, `partial ${fn}`);
  return freeze<PartialNode>({
    tag: 'partial',
    id: nextId(),
    fn,
    child,
    schema: collectionOf(recordElement(REDUCTION_STATE_FIELDS[fn]), 1),
  });
}

export interface CombineOptions extends ReductionOptions {
  /** Prefix of the state columns, e.g. `total.` */
  prefix?: string;
}

export function combine(fn: AlgebraicReduction, child: Expr, options: CombineOptions = {}): CombineNode {
  const fields = requireRecord(child.schema, `combine ${fn}`);
  const prefix = options.prefix ?? '';
  for (const f of REDUCTION_STATE_FIELDS[fn]) {
    requireField(fields, `${prefix}${f.name}`);
  }
  const keepdims = options.keepdims ?? false;
  return freeze<CombineNode>({
    tag: 'combine',
    id: nextId(),
    fn,
    child,
    prefix,
    keepdims,
    unbiased: options.unbiased ?? false,
    schema: reductionShape(reductionResultDType(fn, 'float64'), keepdims),
  });
}
