/**
 * @chunkwise/query - Memory policy
 *
 * Decides whether a dataset of a given size can be materialized at once.
 * The decision is re-evaluated on every call; available memory is read
 * fresh each time.
 */

import { freemem } from 'node:os';
import { DEFAULT_MEMORY_FRACTION_DIVISOR, ValidationError } from '@chunkwise/core';

export interface MemoryPolicyOptions {
  /** Bytes currently available to the process (default: host free memory) */
  availableMemory?: () => number;
  /** Data fits when smaller than availableMemory() / divisor (default: 4) */
  fractionDivisor?: number;
  /** Fixed threshold in bytes; replaces the computed one when set */
  thresholdBytes?: number;
}

export interface MemoryPolicy {
  fitsInMemory(byteSize: number): boolean;
  /** Current threshold in bytes */
  threshold(): number;
}

export function systemAvailableMemory(): number {
  return freemem();
}

export function createMemoryPolicy(options: MemoryPolicyOptions = {}): MemoryPolicy {
  const availableMemory = options.availableMemory ?? systemAvailableMemory;
  const divisor = options.fractionDivisor ?? DEFAULT_MEMORY_FRACTION_DIVISOR;

  if (!(divisor > 0)) {
    throw new ValidationError('Memory fraction divisor must be positive', undefined, { divisor });
  }
  if (options.thresholdBytes !== undefined && !(options.thresholdBytes >= 0)) {
    throw new ValidationError('Memory threshold must be non-negative', undefined, {
      thresholdBytes: options.thresholdBytes,
    });
  }

  const threshold = (): number => options.thresholdBytes ?? availableMemory() / divisor;

  return {
    threshold,
    fitsInMemory: (byteSize) => byteSize < threshold(),
  };
}
