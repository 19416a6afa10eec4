// @chunkwise/expr
// Expression trees over symbols, splitting into chunk/aggregate parts and
// vectorised predicate compilation

export {
  isExpr,
  isAlgebraic,
  ELEMENTWISE_TAGS,
  ALGEBRAIC_REDUCTIONS,
  type Expr,
  type ExprTag,
  type Operand,
  type ArithmeticOp,
  type ComparisonOp,
  type LogicalOp,
  type BinaryOp,
  type UnaryOp,
  type AlgebraicReduction,
  type ReductionFn,
  type SymbolNode,
  type FieldNode,
  type ProjectionNode,
  type SelectionNode,
  type HeadNode,
  type SliceNode,
  type BinOpNode,
  type UnOpNode,
  type LikeNode,
  type RelabelNode,
  type DistinctNode,
  type ReductionNode,
  type SummaryNode,
  type ByNode,
  type PartialNode,
  type CombineNode,
} from './types.js';

export {
  symbol,
  field,
  project,
  relabel,
  select,
  selectWith,
  head,
  slice,
  distinct,
  binop,
  add,
  sub,
  mul,
  div,
  pow,
  mod,
  gt,
  ge,
  lt,
  le,
  eq,
  ne,
  and,
  or,
  unop,
  neg,
  abs,
  sqrt,
  exp,
  log,
  not,
  like,
  reduction,
  sum,
  count,
  nelements,
  mean,
  variance,
  std,
  min,
  max,
  nunique,
  summary,
  summaryWith,
  by,
  byWith,
  partial,
  combine,
  type ReductionOptions,
  type CombineOptions,
} from './builders.js';

export { REDUCTION_STATE_FIELDS, reductionResultDType, acceptsAnyElement } from './reductions.js';

export { children, reaches, leaves, nodes, mapChildren, substitute } from './traversal.js';

export { format } from './format.js';

export { split, findCenter, type Splitter, type SplitResult, type SplitPart } from './split.js';

export { compilePredicate } from './predicate.js';

export { requiredFields } from './fields.js';
