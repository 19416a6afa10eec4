/**
 * @chunkwise/query - Expression evaluator
 *
 * Evaluates an expression against bound inputs. Bindings map expression
 * nodes (usually symbols, but any subexpression may be bound) to materialized
 * values or to lazy iterables of items.
 *
 * Lazy inputs stay lazy through elementwise nodes, selection, head and
 * distinct. Reductions consume them in one pass. Every other node
 * materializes its input first. The final result is materialized to the
 * shape the expression declares.
 *
 * @example
 * ```typescript
 * const t = symbol('t', collectionOf(scalarElement('float64')));
 * evaluate(sum(t), new Map([[t, Float64Array.from([1, 2, 3])]])); // 6
 * ```
 */

import {
  PredicateCompilationError,
  QueryError,
  Table,
  ValidationError,
  columnFromScalars,
  filterColumn,
  fromItems,
  isColumn,
  isRow,
  isScalar,
  isTable,
  sliceColumn,
  type Column,
  type DataShape,
  type ElementType,
  type Field,
  type Item,
  type Row,
  type Scalar,
  type Value,
} from '@chunkwise/core';
import {
  REDUCTION_STATE_FIELDS,
  compilePredicate,
  format,
  isAlgebraic,
  isExpr,
  nodes,
  reaches,
  type BinOpNode,
  type BinaryOp,
  type ByNode,
  type CombineNode,
  type Expr,
  type FieldNode,
  type LikeNode,
  type Operand,
  type ProjectionNode,
  type ReductionNode,
  type RelabelNode,
  type SelectionNode,
  type SummaryNode,
  type UnOpNode,
  type UnaryOp,
} from '@chunkwise/expr';
import {
  countDistinct,
  getReducer,
  reduce,
  tupleKey,
  uniqueItems,
  wrapKeepdims,
  type ReductionState,
} from './reductions.js';

// =============================================================================
// Types
// =============================================================================

/** A materialized value or a lazy sequence of items */
export type EvaluationInput = Value | Iterable<Item>;

export type Bindings = ReadonlyMap<Expr, EvaluationInput>;

export type Evaluator = (expr: Expr, bindings: Bindings) => Value;

type ElementwiseNode = FieldNode | ProjectionNode | RelabelNode | BinOpNode | UnOpNode | LikeNode;

function isElementwise(expr: Expr): expr is ElementwiseNode {
  switch (expr.tag) {
    case 'field':
    case 'projection':
    case 'relabel':
    case 'binop':
    case 'unop':
    case 'like':
      return true;
    default:
      return false;
  }
}

// =============================================================================
// Lazy Sequences
// =============================================================================

/**
 * Restartable lazy sequence. Each iteration re-runs the pipeline from its
 * input, so an input that can be iterated again can be read more than once.
 */
class Stream implements Iterable<Item> {
  constructor(private readonly start: () => Iterator<Item>) {}

  [Symbol.iterator](): Iterator<Item> {
    return this.start();
  }

  static of(items: Iterable<Item>): Stream {
    return new Stream(() => items[Symbol.iterator]());
  }
}

type Evaluated = Value | Stream;

function mapStream(stream: Stream, fn: (item: Item) => Item): Stream {
  return new Stream(function* () {
    for (const item of stream) yield fn(item);
  });
}

function filterStream(stream: Stream, keep: (item: Item) => boolean): Stream {
  return new Stream(function* () {
    for (const item of stream) {
      if (keep(item)) yield item;
    }
  });
}

function takeStream(stream: Stream, n: number): Stream {
  return new Stream(function* () {
    if (n === 0) return;
    let taken = 0;
    for (const item of stream) {
      yield item;
      if (++taken >= n) return;
    }
  });
}

function* mapItems(items: Iterable<Item>, fn: (item: Item) => Item): Generator<Item> {
  for (const item of items) yield fn(item);
}

/**
 * Pair items of two sequences; they must have the same length.
 */
function* zipItems(a: Iterable<Item>, b: Iterable<Item>, node: Expr): Generator<[Item, Item]> {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done === true && r.done === true) return;
    if (l.done === true || r.done === true) {
      throw new QueryError(`Operands of ${format(node)} have different lengths`, undefined, {
        operation: 'evaluate',
      });
    }
    yield [l.value, r.value];
  }
}

function isIterable(value: unknown): value is Iterable<Item> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

// =============================================================================
// Item Semantics
// =============================================================================

/** null, false, 0, NaN and '' are false; everything else is true */
export function truthy(item: Item): boolean {
  if (item === null) return false;
  if (typeof item === 'number') return item !== 0 && !Number.isNaN(item);
  if (typeof item === 'string') return item.length > 0;
  if (typeof item === 'boolean') return item;
  return true;
}

function describe(item: Item): string {
  if (item === null) return 'null';
  return typeof item === 'object' ? 'record' : typeof item;
}

function requireRow(item: Item, path: string): Row {
  if (item === null || typeof item !== 'object') {
    throw ValidationError.typeMismatch(path, 'record', describe(item));
  }
  return item;
}

function requireScalar(item: Item, path: string): Scalar {
  if (item !== null && typeof item === 'object') {
    throw ValidationError.typeMismatch(path, 'scalar', 'record');
  }
  return item;
}

function toNumber(value: number | boolean): number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/** -1, 0 or 1; NaN when the values are unordered */
function order(a: number | string, b: number | string): number {
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    if (a < b) return -1;
    if (a > b) return 1;
    return a === b ? 0 : NaN;
  }
  return NaN;
}

function compare(op: BinaryOp, sign: number): boolean {
  switch (op) {
    case '>':
      return sign > 0;
    case '>=':
      return sign >= 0;
    case '<':
      return sign < 0;
    case '<=':
      return sign <= 0;
    case '==':
      return sign === 0;
    default:
      return sign !== 0;
  }
}

export function binaryScalar(op: BinaryOp, a: Scalar, b: Scalar): Scalar {
  if (op === '&') return truthy(a) && truthy(b);
  if (op === '|') return truthy(a) || truthy(b);
  if (a === null || b === null) return null;

  if (typeof a === 'string' || typeof b === 'string') {
    if (typeof a === 'string' && typeof b === 'string') {
      if (op === '+') return a + b;
      if (op !== '-' && op !== '*' && op !== '/' && op !== '**' && op !== '%') return compare(op, order(a, b));
    } else if (op === '==') {
      return false;
    } else if (op === '!=') {
      return true;
    }
    throw ValidationError.typeMismatch(`operator ${op}`, 'number', 'string');
  }

  const x = toNumber(a);
  const y = toNumber(b);
  switch (op) {
    case '+':
      return x + y;
    case '-':
      return x - y;
    case '*':
      return x * y;
    case '/':
      return x / y;
    case '**':
      return x ** y;
    case '%':
      return x % y;
    default:
      return compare(op, order(x, y));
  }
}

export function unaryScalar(op: UnaryOp, value: Scalar): Scalar {
  if (value === null) return null;
  if (op === 'not') return !truthy(value);
  if (typeof value === 'string') {
    throw ValidationError.typeMismatch(op, 'number', 'string');
  }
  const x = toNumber(value);
  switch (op) {
    case 'neg':
      return -x;
    case 'abs':
      return Math.abs(x);
    case 'sqrt':
      return Math.sqrt(x);
    case 'exp':
      return Math.exp(x);
    default:
      return Math.log(x);
  }
}

/**
 * Anchored glob: `*` matches any run of characters, `?` exactly one.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, 's');
}

const likePatterns = new WeakMap<LikeNode, RegExp>();

function likePattern(node: LikeNode): RegExp {
  let pattern = likePatterns.get(node);
  if (pattern === undefined) {
    pattern = globToRegExp(node.pattern);
    likePatterns.set(node, pattern);
  }
  return pattern;
}

/**
 * Apply an elementwise node to one element, reading its operands through
 * `resolve`.
 */
function applyElementwise(node: ElementwiseNode, resolve: (operand: Operand) => Item): Item {
  switch (node.tag) {
    case 'field':
      return requireRow(resolve(node.child), node.name)[node.name] ?? null;
    case 'projection': {
      const row = requireRow(resolve(node.child), 'projection');
      const out: Record<string, Scalar> = {};
      for (const name of node.fields) out[name] = row[name] ?? null;
      return out;
    }
    case 'relabel': {
      const row = requireRow(resolve(node.child), 'relabel');
      const out: Record<string, Scalar> = {};
      for (const [name, value] of Object.entries(row)) out[node.mapping[name] ?? name] = value;
      return out;
    }
    case 'binop':
      return binaryScalar(
        node.op,
        requireScalar(resolve(node.lhs), node.op),
        requireScalar(resolve(node.rhs), node.op)
      );
    case 'unop':
      return unaryScalar(node.op, requireScalar(resolve(node.child), node.op));
    case 'like': {
      const value = requireScalar(resolve(node.child), 'like');
      if (value === null) return null;
      if (typeof value !== 'string') {
        throw ValidationError.typeMismatch('like', 'string', typeof value);
      }
      return likePattern(node).test(value);
    }
  }
}

// =============================================================================
// Evaluation
// =============================================================================

class Evaluation {
  private readonly memo = new Map<Expr, Evaluated>();

  constructor(private readonly bindings: Bindings) {}

  value(expr: Expr): Evaluated {
    let result = this.memo.get(expr);
    if (result === undefined) {
      result = this.compute(expr);
      this.memo.set(expr, result);
    }
    return result;
  }

  private compute(expr: Expr): Evaluated {
    const bound = this.bindings.get(expr);
    if (bound !== undefined) return fromBinding(bound);

    switch (expr.tag) {
      case 'symbol':
        throw QueryError.unboundSymbol(expr.name);
      case 'field':
      case 'projection':
      case 'relabel':
      case 'unop':
      case 'like':
        return this.elementwise(expr);
      case 'binop':
        return this.binop(expr);
      case 'selection':
        return this.selection(expr);
      case 'head': {
        const child = this.value(expr.child);
        if (child instanceof Stream) return takeStream(child, expr.n);
        const collection = requireCollection(child, 'head');
        return sliceCollection(collection, 0, Math.min(expr.n, collection.length));
      }
      case 'slice': {
        const collection = this.collection(expr.child);
        const stop = Math.min(expr.stop ?? collection.length, collection.length);
        const start = Math.min(expr.start, stop);
        return sliceCollection(collection, start, stop);
      }
      case 'distinct': {
        const child = this.value(expr.child);
        if (child instanceof Stream) return Stream.of(uniqueItems(child));
        return fromItems(uniqueItems(itemsOf(child, 'distinct')), expr.child.schema.element);
      }
      case 'reduction':
        return this.reduction(expr);
      case 'summary':
        return this.summary(expr);
      case 'by':
        return this.by(expr);
      case 'partial': {
        const state = getReducer(expr.fn).accumulate(this.items(expr.child, `partial ${expr.fn}`));
        return Table.fromRows([state], REDUCTION_STATE_FIELDS[expr.fn]);
      }
      case 'combine':
        return this.combine(expr);
    }
  }

  // ===========================================================================
  // Access Helpers
  // ===========================================================================

  private items(expr: Expr, path: string): Iterable<Item> {
    const value = this.value(expr);
    return value instanceof Stream ? value : itemsOf(value, path);
  }

  private collection(expr: Expr): Column | Table {
    const value = this.value(expr);
    if (value instanceof Stream) return fromItems(value, expr.schema.element);
    return requireCollection(value, format(expr));
  }

  private constant(expr: Expr): Item {
    const value = this.value(expr);
    if (value instanceof Stream || isColumn(value) || isTable(value)) {
      throw new QueryError(`Expected a single value from ${format(expr)}`, undefined, {
        operation: 'evaluate',
      });
    }
    return value;
  }

  private isCollectionOperand(operand: Operand): operand is Expr {
    return isExpr(operand) && operand.schema.kind === 'collection';
  }

  // ===========================================================================
  // Elementwise Nodes
  // ===========================================================================

  private scalarOperand = (operand: Operand): Item => (isExpr(operand) ? this.constant(operand) : operand);

  private elementwise(expr: FieldNode | ProjectionNode | RelabelNode | UnOpNode | LikeNode): Evaluated {
    if (expr.schema.kind === 'scalar') {
      return applyElementwise(expr, this.scalarOperand);
    }

    const child = this.value(expr.child);
    if (isTable(child)) {
      if (expr.tag === 'field') return child.column(expr.name);
      if (expr.tag === 'projection') return child.select(expr.fields);
      if (expr.tag === 'relabel') return child.rename(expr.mapping);
    }
    return mapCollection(child, item => applyElementwise(expr, () => item), expr.schema.element, format(expr));
  }

  private binop(expr: BinOpNode): Evaluated {
    const { lhs, rhs } = expr;
    const left = this.isCollectionOperand(lhs) ? lhs : null;
    const right = this.isCollectionOperand(rhs) ? rhs : null;
    const collection = left ?? right;

    if (collection === null) {
      return applyElementwise(expr, this.scalarOperand);
    }

    if (left === null || right === null || left === right) {
      const resolve = (item: Item) => (operand: Operand): Item =>
        operand === collection ? item : this.scalarOperand(operand);
      return mapCollection(
        this.value(collection),
        item => applyElementwise(expr, resolve(item)),
        expr.schema.element,
        format(expr)
      );
    }

    const leftValue = this.value(left);
    const rightValue = this.value(right);
    const pairs = (): Generator<Item> =>
      mapPairs(zipItems(asItems(leftValue, format(left)), asItems(rightValue, format(right)), expr), ([a, b]) =>
        applyElementwise(expr, operand => (operand === left ? a : b))
      );
    if (leftValue instanceof Stream || rightValue instanceof Stream) {
      return new Stream(pairs);
    }
    return fromItems(pairs(), expr.schema.element);
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  private selection(expr: SelectionNode): Evaluated {
    const child = this.value(expr.child);
    if (child instanceof Stream) {
      const predicate = this.elementPredicate(expr);
      return filterStream(child, item => truthy(predicate(item)));
    }

    const collection = requireCollection(child, 'selection');
    let mask: Uint8Array;
    try {
      mask = compilePredicate(expr.predicate, expr.element)(collection);
    } catch (error) {
      if (!(error instanceof PredicateCompilationError)) throw error;
      mask = this.maskByElement(expr, collection);
    }
    return isTable(collection) ? collection.filter(mask) : filterColumn(collection, mask);
  }

  /**
   * Keep-mask computed by evaluating the predicate element by element.
   */
  private maskByElement(expr: SelectionNode, collection: Column | Table): Uint8Array {
    const predicate = this.elementPredicate(expr);
    const mask = new Uint8Array(collection.length);
    let i = 0;
    for (const item of itemsOf(collection, 'selection')) {
      mask[i++] = truthy(predicate(item)) ? 1 : 0;
    }
    return mask;
  }

  /**
   * Predicate as a function of one element. Subexpressions that do not
   * depend on the element are evaluated once.
   */
  private elementPredicate(expr: SelectionNode): (item: Item) => Item {
    const dependent = new Set(nodes(expr.predicate).filter(node => reaches(node, expr.element)));

    const at = (node: Expr, item: Item): Item => {
      if (node === expr.element) return item;
      if (!dependent.has(node)) return this.constant(node);
      if (!isElementwise(node)) {
        throw new QueryError(`Cannot evaluate ${format(node)} for a single element`, undefined, {
          operation: 'evaluate',
          tag: node.tag,
        });
      }
      return applyElementwise(node, operand => (isExpr(operand) ? at(operand, item) : operand));
    };

    return item => at(expr.predicate, item);
  }

  // ===========================================================================
  // Reductions
  // ===========================================================================

  private reduction(expr: ReductionNode): Evaluated {
    const items = this.items(expr.child, expr.fn);
    const result = isAlgebraic(expr.fn)
      ? reduce(expr.fn, items, { unbiased: expr.unbiased })
      : countDistinct(items);
    return expr.keepdims ? wrapKeepdims(result) : result;
  }

  private combine(expr: CombineNode): Evaluated {
    const reducer = getReducer(expr.fn);
    const table = requireTable(this.collection(expr.child), `combine ${expr.fn}`);
    const states: ReductionState[] = [];
    for (const row of table) {
      const state: ReductionState = {};
      for (const f of reducer.stateFields) {
        const name = `${expr.prefix}${f.name}`;
        const value = row[name];
        if (typeof value !== 'number') {
          throw ValidationError.typeMismatch(name, 'number', describe(value ?? null));
        }
        state[f.name] = value;
      }
      states.push(state);
    }
    const result = reducer.finalize(reducer.merge(states), { unbiased: expr.unbiased });
    return expr.keepdims ? wrapKeepdims(result) : result;
  }

  private summary(expr: SummaryNode): Evaluated {
    const input = this.collection(expr.child);
    const row = this.members(expr.members, expr.input, input);
    if (!expr.keepdims) return row;
    return Table.fromRows([row], recordFields(expr.schema));
  }

  private by(expr: ByNode): Evaluated {
    const table = requireTable(this.collection(expr.child), 'by');
    const keyColumns = expr.keys.map(key => table.column(key));

    const groups = new Map<string, { keys: Scalar[]; indices: number[] }>();
    for (let i = 0; i < table.length; i++) {
      const keys = keyColumns.map(column => column[i]);
      const id = tupleKey(keys);
      let group = groups.get(id);
      if (group === undefined) {
        group = { keys, indices: [] };
        groups.set(id, group);
      }
      group.indices.push(i);
    }

    const rows: Row[] = [];
    for (const group of groups.values()) {
      const row: Record<string, Scalar> = {};
      expr.keys.forEach((key, k) => {
        row[key] = group.keys[k];
      });
      Object.assign(row, this.members(expr.aggregates, expr.group, table.take(group.indices)));
      rows.push(row);
    }
    return Table.fromRows(rows, recordFields(expr.schema));
  }

  /**
   * Evaluate each member with `symbol` bound to `input` and flatten the
   * results into one record.
   */
  private members(members: Readonly<Record<string, Expr>>, symbol: Expr, input: Column | Table): Row {
    const bindings = new Map<Expr, EvaluationInput>(this.bindings);
    bindings.set(symbol, input);
    const out: Record<string, Scalar> = {};
    for (const [name, member] of Object.entries(members)) {
      flattenMember(name, evaluate(member, bindings), out);
    }
    return out;
  }
}

// =============================================================================
// Value Helpers
// =============================================================================

function fromBinding(input: EvaluationInput): Evaluated {
  if (isScalar(input) || isColumn(input) || isTable(input)) return input;
  if (isIterable(input)) return Stream.of(input);
  return input;
}

function requireCollection(value: Value, path: string): Column | Table {
  if (isColumn(value) || isTable(value)) return value;
  throw ValidationError.typeMismatch(path, 'collection', isRow(value) ? 'record' : describe(value));
}

function requireTable(value: Column | Table, path: string): Table {
  if (isTable(value)) return value;
  throw ValidationError.typeMismatch(path, 'table', 'column');
}

function itemsOf(value: Value, path: string): Iterable<Item> {
  return requireCollection(value, path);
}

function asItems(value: Evaluated, path: string): Iterable<Item> {
  return value instanceof Stream ? value : itemsOf(value, path);
}

function sliceCollection(collection: Column | Table, start: number, stop: number): Column | Table {
  return isTable(collection) ? collection.slice(start, stop) : sliceColumn(collection, start, stop);
}

function mapCollection(
  input: Evaluated,
  fn: (item: Item) => Item,
  element: ElementType,
  path: string
): Evaluated {
  if (input instanceof Stream) return mapStream(input, fn);
  const items = mapItems(itemsOf(input, path), fn);
  if (element.kind === 'scalar') {
    const values: Scalar[] = [];
    for (const item of items) values.push(requireScalar(item, path));
    return columnFromScalars(values, element.dtype);
  }
  return fromItems(items, element);
}

function* mapPairs(pairs: Iterable<[Item, Item]>, fn: (pair: [Item, Item]) => Item): Generator<Item> {
  for (const pair of pairs) yield fn(pair);
}

function recordFields(shape: DataShape): readonly Field[] {
  if (shape.element.kind !== 'record') {
    throw ValidationError.typeMismatch('shape', 'record', shape.element.dtype);
  }
  return shape.element.fields;
}

/**
 * Write a member result into `out`: scalars under `name`, records and
 * one-row tables as `name.field`.
 */
function flattenMember(name: string, value: Value, out: Record<string, Scalar>): void {
  if (isTable(value)) {
    if (value.length !== 1) {
      throw ValidationError.typeMismatch(name, 'one row', `${value.length} rows`);
    }
    flattenMember(name, value.row(0), out);
    return;
  }
  if (isColumn(value)) {
    if (value.length !== 1) {
      throw ValidationError.typeMismatch(name, 'one value', `${value.length} values`);
    }
    out[name] = value[0];
    return;
  }
  if (isRow(value)) {
    for (const [key, scalar] of Object.entries(value)) out[`${name}.${key}`] = scalar;
    return;
  }
  out[name] = value;
}

/**
 * Materialize a result to the declared shape.
 */
function materialize(value: Evaluated, shape: DataShape): Value {
  return value instanceof Stream ? fromItems(value, shape.element) : value;
}

// =============================================================================
// Entry Point
// =============================================================================

export function evaluate(expr: Expr, bindings: Bindings): Value {
  return materialize(new Evaluation(bindings).value(expr), expr.schema);
}
