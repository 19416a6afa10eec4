/**
 * @chunkwise/config - Default Configuration Values
 *
 * Values are sourced from @chunkwise/core constants where applicable.
 *
 * @packageDocumentation
 */

import { DEFAULT_CHUNK_SIZE, DEFAULT_MEMORY_FRACTION_DIVISOR } from '@chunkwise/core';

import type { ChunkwiseConfig } from './types.js';

/**
 * Default engine configuration.
 */
const DEFAULT_ENGINE_CONFIG = Object.freeze({
  chunkSize: DEFAULT_CHUNK_SIZE,
  memoryFractionDivisor: DEFAULT_MEMORY_FRACTION_DIVISOR,
  maxParallelism: 1,
  forceChunked: false,
});

/**
 * Default observability configuration. Only warnings and errors are printed
 * unless a caller asks for more.
 */
const DEFAULT_OBSERVABILITY_CONFIG = Object.freeze({
  logLevel: 'warn' as const,
  logFormat: 'json' as const,
});

/**
 * Default configuration for the engine.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@chunkwise/config';
 *
 * console.log(DEFAULT_CONFIG.engine.chunkSize); // 1048576
 *
 * const config = createConfig({
 *   engine: { maxParallelism: 4 },
 * });
 * ```
 */
export const DEFAULT_CONFIG: ChunkwiseConfig = Object.freeze({
  engine: DEFAULT_ENGINE_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
});
