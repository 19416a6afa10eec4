/**
 * @chunkwise/query - Chunked execution of expressions over columnar data
 *
 * @example
 * ```typescript
 * import { createQueryEngine } from '@chunkwise/query';
 * import { symbol, mean } from '@chunkwise/expr';
 * import { collectionOf, scalarElement } from '@chunkwise/core';
 *
 * const t = symbol('t', collectionOf(scalarElement('float64')));
 * const engine = createQueryEngine({ chunkSize: 1 << 20, forceChunked: true });
 * const { value, stats } = await engine.execute(mean(t), readings);
 * ```
 */

// =============================================================================
// Engine
// =============================================================================
export {
  QueryEngine,
  createQueryEngine,
  execute,
  type EngineInput,
  type ExecuteOptions,
  type QueryEngineOptions,
  type ExecutionStats,
  type ExecutionResult,
  type ExecutionPlan,
} from './engine.js';

// =============================================================================
// Planning
// =============================================================================
export {
  createMemoryPolicy,
  systemAvailableMemory,
  type MemoryPolicy,
  type MemoryPolicyOptions,
} from './memory.js';

export { classifyOperation, isCheap, isCheapPath, type OperationClass } from './classifier.js';

export { planPartitions, type Partition, type PartitionPlan } from './partition.js';

export {
  ROUTE_TABLE,
  selectRoute,
  findMaskedSelection,
  type Route,
  type RouteContext,
  type RouteRule,
  type RouteSelection,
} from './routing.js';

// =============================================================================
// Execution
// =============================================================================
export {
  evaluate,
  truthy,
  binaryScalar,
  unaryScalar,
  globToRegExp,
  type Bindings,
  type EvaluationInput,
  type Evaluator,
} from './evaluate.js';

export {
  executeChunks,
  sequentialMap,
  createParallelMap,
  type MapStrategy,
  type ChunkResult,
  type ExecuteChunksOptions,
} from './executor.js';

export { mergeChunkResults, emptyOf } from './merge.js';

export {
  getReducer,
  reduce,
  clampVariance,
  uniqueItems,
  countDistinct,
  scalarKey,
  tupleKey,
  wrapKeepdims,
  type Reducer,
  type ReductionState,
  type FinalizeOptions,
} from './reductions.js';
