/**
 * @chunkwise/query - Query Engine
 *
 * Executes an expression against one data source. For each query the engine:
 *
 * - classifies the expression as cheap or reduction-like
 * - asks the memory policy whether the source fits in memory
 * - picks a route from the dispatch table (direct, masked, streamed,
 *   in-memory or chunked)
 * - runs the route and reports execution statistics
 *
 * The chunked route splits the expression into a per-chunk part and an
 * aggregate part, evaluates the chunk part over every partition of the
 * source, merges the chunk results in partition order and evaluates the
 * aggregate part over the merged intermediate.
 *
 * @example
 * ```typescript
 * const t = symbol('t', collectionOf(scalarElement('float64')));
 * const engine = createQueryEngine({ chunkSize: 65536 });
 * const { value, stats } = await engine.execute(mean(t), Float64Array.from(values));
 * console.log(value, stats.route, stats.partitions);
 * ```
 */

import {
  PredicateCompilationError,
  UnsupportedOperationError,
  ValidationError,
  capabilitiesOf,
  checkElementType,
  collectionOf,
  createConsoleLogger,
  createSource,
  isColumn,
  isTable,
  type Column,
  type DataSource,
  type Logger,
  type Table,
  type Value,
} from '@chunkwise/core';
import {
  compilePredicate,
  format,
  leaves,
  requiredFields,
  split,
  symbol,
  type Expr,
  type SelectionNode,
  type SplitResult,
  type Splitter,
  type SymbolNode,
} from '@chunkwise/expr';
import {
  createConfig,
  validateConfig,
  type ChunkwiseConfig,
  type DeepPartial,
} from '@chunkwise/config';
import { classifyOperation, type OperationClass } from './classifier.js';
import { evaluate as defaultEvaluate, type Evaluator } from './evaluate.js';
import { createParallelMap, executeChunks, sequentialMap, type MapStrategy } from './executor.js';
import { createMemoryPolicy } from './memory.js';
import { mergeChunkResults } from './merge.js';
import { planPartitions, type PartitionPlan } from './partition.js';
import { selectRoute, type Route, type RouteSelection } from './routing.js';

// =============================================================================
// Types
// =============================================================================

/** Data an expression's leaf can be bound to */
export type EngineInput = DataSource | Column | Table;

/**
 * Settings that may differ from one query to the next.
 */
export interface ExecuteOptions {
  /** Elements per partition on the chunked route */
  chunkSize?: number;
  /** Fixed fit threshold in bytes; replaces availableMemory() / divisor */
  cheapThresholdBytes?: number;
  /** Chunk reductions even when the data fits in memory */
  forceChunked?: boolean;
  /** How partitions are evaluated */
  map?: MapStrategy;
}

export interface QueryEngineOptions extends ExecuteOptions {
  /** Configuration overrides, merged onto the defaults */
  config?: DeepPartial<ChunkwiseConfig>;
  /** Bytes currently available (default: host free memory) */
  availableMemory?: () => number;
  evaluator?: Evaluator;
  splitter?: Splitter;
  /** Default: console logger built from the observability config */
  logger?: Logger;
}

export interface ExecutionStats {
  /** Route the query actually ran on */
  route: Route;
  /** Partitions evaluated; 1 unless the route is chunked */
  partitions: number;
  /** Elements in the source */
  rowsScanned: number;
  executionTimeMs: number;
}

export interface ExecutionResult {
  value: Value;
  stats: ExecutionStats;
}

/**
 * What execute() would do, without doing it.
 */
export interface ExecutionPlan {
  route: Route;
  reason: string;
  operationClass: OperationClass;
  fits: boolean;
  byteSize: number;
  chunkSize: number;
  partitions: number;
  /** Per-chunk expression on the chunked route */
  chunk: string | null;
  /** Aggregate expression on the chunked route */
  aggregate: string | null;
}

interface PlannedQuery {
  expr: Expr;
  leaf: SymbolNode;
  source: DataSource;
  operationClass: OperationClass;
  fits: boolean;
  byteSize: number;
  chunkSize: number;
  selection: RouteSelection;
  split: SplitResult | null;
  partitions: PartitionPlan | null;
}

// =============================================================================
// Helpers
// =============================================================================

function toSource(input: EngineInput): DataSource {
  if (isColumn(input) || isTable(input)) {
    return createSource(input);
  }
  return input;
}

function singleLeaf(expr: Expr): SymbolNode {
  const found = leaves(expr);
  if (found.length !== 1) {
    throw new UnsupportedOperationError(
      `Expression must read exactly one source, found ${found.length}`,
      undefined,
      { operation: 'plan', expression: format(expr), leaves: found.map(leaf => leaf.name) },
      'Bind every other input through a single record source'
    );
  }
  return found[0];
}

/**
 * Check the source against the leaf's declared element type, then restrict it
 * to the fields the expression reads where the source can do so.
 */
function narrow(source: DataSource, expr: Expr, leaf: SymbolNode): DataSource {
  checkElementType(leaf.schema.element, source.schema(), leaf.name);
  const fields = requiredFields(expr, leaf);
  return fields === null || source.project === undefined ? source : source.project(fields);
}

function createMapStrategy(config: ChunkwiseConfig): MapStrategy {
  return config.engine.maxParallelism <= 1 ? sequentialMap : createParallelMap(config.engine.maxParallelism);
}

// =============================================================================
// Query Engine
// =============================================================================

export class QueryEngine {
  readonly config: ChunkwiseConfig;
  private readonly logger: Logger;
  private readonly map: MapStrategy;
  private readonly evaluator: Evaluator;
  private readonly splitter: Splitter;

  constructor(private readonly options: QueryEngineOptions = {}) {
    this.config = createConfig(options.config);

    const validation = validateConfig(this.config);
    if (!validation.valid) {
      throw new ValidationError(
        `Invalid engine configuration: ${validation.errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
        undefined,
        { errors: validation.errors.map(e => e.path) }
      );
    }

    this.logger = options.logger ?? createConsoleLogger({
      minLevel: this.config.observability.logLevel,
      format: this.config.observability.logFormat,
    });
    for (const warning of validation.warnings) {
      this.logger.warn(warning.message, { operation: 'configure', path: warning.path });
    }

    this.map = options.map ?? createMapStrategy(this.config);
    this.evaluator = options.evaluator ?? defaultEvaluate;
    this.splitter = options.splitter ?? split;
  }

  /**
   * Execute an expression against a source.
   *
   * @throws UnsupportedOperationError when no route can run the expression
   */
  async execute(expr: Expr, input: EngineInput, overrides: ExecuteOptions = {}): Promise<ExecutionResult> {
    const started = Date.now();
    const planned = this.plan(expr, input, overrides);
    const { leaf, source, selection } = planned;

    this.logger.debug('Route selected', {
      operation: 'execute',
      route: selection.route,
      reason: selection.reason,
      bytesProcessed: planned.byteSize,
    });

    let route = selection.route;
    let value: Value;
    switch (selection.route) {
      case 'in-memory':
        value = this.evaluator(expr, new Map([[leaf, source.slice(0, source.length())]]));
        break;
      case 'masked': {
        const filtered = this.maskedScan(source, selection.selection);
        if (filtered === null) {
          route = 'streamed';
          value = this.evaluator(expr, new Map([[leaf, source]]));
        } else {
          value = this.evaluator(expr, new Map<Expr, Value>([[filtered.selection, filtered.value]]));
        }
        break;
      }
      case 'direct':
      case 'streamed':
        // cheap nodes consume the source lazily
        value = this.evaluator(expr, new Map([[leaf, source]]));
        break;
      case 'chunked':
        value = await this.runChunked(planned, overrides.map ?? this.map);
        break;
    }

    const stats: ExecutionStats = {
      route,
      partitions: planned.partitions?.count ?? 1,
      rowsScanned: source.length(),
      executionTimeMs: Date.now() - started,
    };

    this.logger.info('Query completed', {
      operation: 'execute',
      route: stats.route,
      partitions: stats.partitions,
      rowsProcessed: stats.rowsScanned,
      durationMs: stats.executionTimeMs,
    });

    return { value, stats };
  }

  /**
   * Describe the route and split execute() would use.
   */
  explain(expr: Expr, input: EngineInput, overrides: ExecuteOptions = {}): ExecutionPlan {
    const planned = this.plan(expr, input, overrides);
    return {
      route: planned.selection.route,
      reason: planned.selection.reason,
      operationClass: planned.operationClass,
      fits: planned.fits,
      byteSize: planned.byteSize,
      chunkSize: planned.chunkSize,
      partitions: planned.partitions?.count ?? 1,
      chunk: planned.split === null ? null : format(planned.split.chunk.expr),
      aggregate: planned.split === null ? null : format(planned.split.aggregate.expr),
    };
  }

  // ===========================================================================
  // Planning
  // ===========================================================================

  private plan(expr: Expr, input: EngineInput, overrides: ExecuteOptions): PlannedQuery {
    const leaf = singleLeaf(expr);
    const source = narrow(toSource(input), expr, leaf);
    const chunkSize = overrides.chunkSize ?? this.options.chunkSize ?? this.config.engine.chunkSize;

    const policy = createMemoryPolicy({
      availableMemory: this.options.availableMemory,
      fractionDivisor: this.config.engine.memoryFractionDivisor,
      thresholdBytes:
        overrides.cheapThresholdBytes ?? this.options.cheapThresholdBytes ?? this.config.engine.cheapThresholdBytes,
    });
    const byteSize = source.byteSize();
    const fits = policy.fitsInMemory(byteSize);
    const operationClass = classifyOperation(expr, leaf);

    const selection = selectRoute({
      expr,
      leaf,
      operationClass,
      capabilities: capabilitiesOf(source),
      fits,
      forceChunked: overrides.forceChunked ?? this.options.forceChunked ?? this.config.engine.forceChunked,
    });

    let parts: SplitResult | null = null;
    let partitions: PartitionPlan | null = null;
    if (selection.route === 'chunked') {
      partitions = planPartitions(source.length(), chunkSize);
      const chunk = symbol('chunk', collectionOf(leaf.schema.element, chunkSize));
      parts = this.splitter(leaf, expr, chunk);
    }

    return {
      expr,
      leaf,
      source,
      operationClass,
      fits,
      byteSize,
      chunkSize,
      selection,
      split: parts,
      partitions,
    };
  }

  // ===========================================================================
  // Routes
  // ===========================================================================

  /**
   * Filter the source block by block with a vectorised predicate. Returns
   * null when the predicate cannot be vectorised for this data.
   */
  private maskedScan(
    source: DataSource,
    selection: SelectionNode | null
  ): { selection: SelectionNode; value: Column | Table } | null {
    if (selection === null || source.where === undefined) {
      return null;
    }
    try {
      const mask = compilePredicate(selection.predicate, selection.element);
      return { selection, value: source.where(mask) };
    } catch (error) {
      if (!(error instanceof PredicateCompilationError)) throw error;
      this.logger.debug('Predicate not vectorised, streaming instead', {
        operation: 'mask',
        reason: error.message,
        capabilities: [...capabilitiesOf(source)],
      });
      return null;
    }
  }

  private async runChunked(planned: PlannedQuery, map: MapStrategy): Promise<Value> {
    const { source, split: parts, partitions } = planned;
    if (parts === null || partitions === null) {
      throw new UnsupportedOperationError(`No chunk plan for ${format(planned.expr)}`);
    }

    const results = await executeChunks({
      source,
      partitions,
      symbol: parts.chunk.symbol,
      expr: parts.chunk.expr,
      evaluate: this.evaluator,
      map,
      logger: this.logger,
    });

    const intermediate = mergeChunkResults(
      results.map(result => result.value),
      parts.chunk.expr.schema
    );
    return this.evaluator(parts.aggregate.expr, new Map([[parts.aggregate.symbol, intermediate]]));
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a query engine.
 */
export function createQueryEngine(options: QueryEngineOptions = {}): QueryEngine {
  return new QueryEngine(options);
}

/**
 * Execute an expression once and return only its value.
 *
 * @example
 * ```typescript
 * const total = await execute(sum(t), Float64Array.from([1, 2, 3])); // 6
 * ```
 */
export async function execute(expr: Expr, input: EngineInput, options: QueryEngineOptions = {}): Promise<Value> {
  const { value } = await createQueryEngine(options).execute(expr, input);
  return value;
}
