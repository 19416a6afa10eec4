/**
 * @chunkwise/query - Chunk executor
 *
 * Evaluates the chunk expression once per partition. Partitions are
 * independent, so the work is handed to a pluggable map strategy that may run
 * it sequentially or with bounded concurrency. Results are tagged with their
 * partition index and put back into partition order whatever order the
 * strategy returns them in.
 */

import {
  ValidationError,
  createNoopLogger,
  type DataSource,
  type Logger,
  type Value,
} from '@chunkwise/core';
import type { SymbolNode, Expr } from '@chunkwise/expr';
import type { Evaluator } from './evaluate.js';
import type { Partition } from './partition.js';

// =============================================================================
// Map Strategies
// =============================================================================

/**
 * Applies `fn` to every item. Results may come back in any order.
 */
export type MapStrategy = <T, R>(items: Iterable<T>, fn: (item: T) => Promise<R>) => Promise<R[]>;

/**
 * One item at a time, in order.
 */
export const sequentialMap: MapStrategy = async <T, R>(
  items: Iterable<T>,
  fn: (item: T) => Promise<R>
): Promise<R[]> => {
  const results: R[] = [];
  for (const item of items) {
    await fn(item).then(value => {
      results.push(value);
    });
  }
  return results;
};

/**
 * Up to `concurrency` items in flight at once. Results are returned in
 * completion order. After the first failure no further items are started and
 * that failure is rethrown.
 */
export function createParallelMap(concurrency: number): MapStrategy {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError('Concurrency must be a positive integer', undefined, { concurrency });
  }

  return async <T, R>(items: Iterable<T>, fn: (item: T) => Promise<R>): Promise<R[]> => {
    const iterator = items[Symbol.iterator]();
    const results: R[] = [];
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed) {
        const next = iterator.next();
        if (next.done === true) return;
        try {
          await fn(next.value).then(value => {
            results.push(value);
          });
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));
    return results;
  };
}

// =============================================================================
// Executor
// =============================================================================

export interface ChunkResult {
  /** Partition index the result belongs to */
  readonly index: number;
  readonly value: Value;
}

export interface ExecuteChunksOptions {
  source: DataSource;
  partitions: Iterable<Partition>;
  /** Symbol each partition's data is bound to */
  symbol: SymbolNode;
  /** Expression evaluated once per partition */
  expr: Expr;
  evaluate: Evaluator;
  /** Default: sequentialMap */
  map?: MapStrategy;
  logger?: Logger;
}

export async function executeChunks(options: ExecuteChunksOptions): Promise<ChunkResult[]> {
  const { source, symbol, expr, evaluate } = options;
  const map = options.map ?? sequentialMap;
  const logger = options.logger ?? createNoopLogger();

  const runChunk = async (partition: Partition): Promise<ChunkResult> => {
    try {
      const data = source.slice(partition.start, partition.stop);
      return { index: partition.index, value: evaluate(expr, new Map([[symbol, data]])) };
    } catch (error) {
      logger.error('Chunk evaluation failed', error instanceof Error ? error : new Error(String(error)), {
        operation: 'chunk',
        chunkIndex: partition.index,
        start: partition.start,
        stop: partition.stop,
      });
      throw error;
    }
  };

  const results = await map(options.partitions, runChunk);
  return [...results].sort((a, b) => a.index - b.index);
}
