/**
 * @chunkwise/expr - Expression node types
 *
 * Expressions are immutable trees. Every node carries a `tag` naming its
 * operation, the `schema` of the value it produces and an `id` unique within
 * the process. Leaves are symbols, matched to data by identity.
 *
 * Nodes that apply an expression to parts of their input (selection, summary,
 * by) hold that expression over an internal symbol of their own. The internal
 * expression is not a child: it is bound per element or per group when the
 * node is evaluated.
 */

import type { DataShape, Scalar } from '@chunkwise/core';

// =============================================================================
// Operators
// =============================================================================

export type ArithmeticOp = '+' | '-' | '*' | '/' | '**' | '%';
export type ComparisonOp = '>' | '>=' | '<' | '<=' | '==' | '!=';
export type LogicalOp = '&' | '|';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export type UnaryOp = 'neg' | 'abs' | 'sqrt' | 'exp' | 'log' | 'not';

/** Reductions whose state merges across chunks */
export type AlgebraicReduction = 'count' | 'nelements' | 'sum' | 'mean' | 'var' | 'std' | 'min' | 'max';

export type ReductionFn = AlgebraicReduction | 'nunique';

// =============================================================================
// Nodes
// =============================================================================

interface NodeBase {
  readonly id: number;
  readonly schema: DataShape;
}

export interface SymbolNode extends NodeBase {
  readonly tag: 'symbol';
  readonly name: string;
}

/** One field of a record, elementwise */
export interface FieldNode extends NodeBase {
  readonly tag: 'field';
  readonly child: Expr;
  readonly name: string;
}

export interface ProjectionNode extends NodeBase {
  readonly tag: 'projection';
  readonly child: Expr;
  readonly fields: readonly string[];
}

/** Elements of `child` for which `predicate`, bound to `element`, is true */
export interface SelectionNode extends NodeBase {
  readonly tag: 'selection';
  readonly child: Expr;
  readonly element: SymbolNode;
  readonly predicate: Expr;
}

export interface HeadNode extends NodeBase {
  readonly tag: 'head';
  readonly child: Expr;
  readonly n: number;
}

/** Elements `[start, stop)`; a null stop runs to the end */
export interface SliceNode extends NodeBase {
  readonly tag: 'slice';
  readonly child: Expr;
  readonly start: number;
  readonly stop: number | null;
}

/** An operand is a subexpression or a literal */
export type Operand = Expr | Scalar;

export interface BinOpNode extends NodeBase {
  readonly tag: 'binop';
  readonly op: BinaryOp;
  readonly lhs: Operand;
  readonly rhs: Operand;
}

export interface UnOpNode extends NodeBase {
  readonly tag: 'unop';
  readonly op: UnaryOp;
  readonly child: Expr;
}

/** Glob match on strings: `*` any run, `?` one character */
export interface LikeNode extends NodeBase {
  readonly tag: 'like';
  readonly child: Expr;
  readonly pattern: string;
}

export interface RelabelNode extends NodeBase {
  readonly tag: 'relabel';
  readonly child: Expr;
  readonly mapping: Readonly<Record<string, string>>;
}

export interface DistinctNode extends NodeBase {
  readonly tag: 'distinct';
  readonly child: Expr;
}

export interface ReductionNode extends NodeBase {
  readonly tag: 'reduction';
  readonly fn: ReductionFn;
  readonly child: Expr;
  /** Wrap the result in a one-element collection */
  readonly keepdims: boolean;
  /** Divide variance by n - 1 instead of n */
  readonly unbiased: boolean;
}

/** Several reductions of one input, as a record */
export interface SummaryNode extends NodeBase {
  readonly tag: 'summary';
  readonly child: Expr;
  readonly input: SymbolNode;
  readonly members: Readonly<Record<string, Expr>>;
  readonly keepdims: boolean;
}

/** Group `child` by `keys` and apply `aggregates` to each group */
export interface ByNode extends NodeBase {
  readonly tag: 'by';
  readonly child: Expr;
  readonly keys: readonly string[];
  readonly group: SymbolNode;
  readonly aggregates: Readonly<Record<string, Expr>>;
}

/** Mergeable state of a reduction over `child`, as a one-row table */
export interface PartialNode extends NodeBase {
  readonly tag: 'partial';
  readonly fn: AlgebraicReduction;
  readonly child: Expr;
}

/**
 * Merge the states stored in columns `${prefix}${field}` of `child` and
 * finish the reduction.
 */
export interface CombineNode extends NodeBase {
  readonly tag: 'combine';
  readonly fn: AlgebraicReduction;
  readonly child: Expr;
  readonly prefix: string;
  readonly keepdims: boolean;
  readonly unbiased: boolean;
}

export type Expr =
  | SymbolNode
  | FieldNode
  | ProjectionNode
  | SelectionNode
  | HeadNode
  | SliceNode
  | BinOpNode
  | UnOpNode
  | LikeNode
  | RelabelNode
  | DistinctNode
  | ReductionNode
  | SummaryNode
  | ByNode
  | PartialNode
  | CombineNode;

export type ExprTag = Expr['tag'];

export function isExpr(operand: Operand): operand is Expr {
  return typeof operand === 'object' && operand !== null;
}

// =============================================================================
// Tag Groups
// =============================================================================

/** Nodes applied element by element; the splitter pushes them into chunks */
export const ELEMENTWISE_TAGS: ReadonlySet<ExprTag> = new Set<ExprTag>([
  'field',
  'projection',
  'selection',
  'binop',
  'unop',
  'like',
  'relabel',
]);

export const ALGEBRAIC_REDUCTIONS: ReadonlySet<ReductionFn> = new Set<ReductionFn>([
  'count',
  'nelements',
  'sum',
  'mean',
  'var',
  'std',
  'min',
  'max',
]);

export function isAlgebraic(fn: ReductionFn): fn is AlgebraicReduction {
  return ALGEBRAIC_REDUCTIONS.has(fn);
}
