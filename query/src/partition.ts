/**
 * @chunkwise/query - Partition planner
 *
 * Splits `[0, length)` into consecutive half-open ranges of `chunkSize`
 * elements. The last range may be short. Plans are lazy and can be iterated
 * any number of times.
 *
 * @example
 * ```typescript
 * const plan = planPartitions(10, 3);
 * plan.count;       // 4
 * [...plan];        // [0,3) [3,6) [6,9) [9,10)
 * ```
 */

import { ValidationError } from '@chunkwise/core';

export interface Partition {
  /** Position of the partition in source order */
  readonly index: number;
  /** First element, inclusive */
  readonly start: number;
  /** Last element, exclusive */
  readonly stop: number;
}

export interface PartitionPlan extends Iterable<Partition> {
  readonly length: number;
  readonly chunkSize: number;
  /** Number of partitions the plan yields */
  readonly count: number;
}

export function planPartitions(length: number, chunkSize: number): PartitionPlan {
  if (!Number.isInteger(length) || length < 0) {
    throw ValidationError.invalidPartition(`Length must be a non-negative integer, got ${length}`, { length });
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw ValidationError.invalidPartition(`Chunk size must be a positive integer, got ${chunkSize}`, {
      chunkSize,
    });
  }

  return {
    length,
    chunkSize,
    count: Math.ceil(length / chunkSize),
    *[Symbol.iterator](): Iterator<Partition> {
      let index = 0;
      for (let start = 0; start < length; start += chunkSize) {
        yield { index: index++, start, stop: Math.min(start + chunkSize, length) };
      }
    },
  };
}
