/**
 * @chunkwise/config - Type Definitions
 *
 * Configuration schema for the chunked execution engine.
 *
 * Naming Conventions:
 * - All sizes: *Bytes, *Size (element counts)
 * - All counts: max*, *Divisor
 *
 * @packageDocumentation
 * @module @chunkwise/config
 */

import type { LogLevel } from '@chunkwise/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

/**
 * Deep readonly type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = T extends object
  ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
  : T;

// =============================================================================
// Engine Configuration
// =============================================================================

/**
 * Execution engine configuration.
 *
 * @example
 * ```typescript
 * const engineConfig: EngineConfig = {
 *   chunkSize: 65536,
 *   memoryFractionDivisor: 4,
 *   maxParallelism: 4,
 *   forceChunked: false,
 * };
 * ```
 */
export interface EngineConfig {
  /** Elements per partition on the chunked route */
  chunkSize: number;

  /** Data fits in memory when smaller than available memory divided by this */
  memoryFractionDivisor: number;

  /** Fixed fit threshold in bytes; replaces the computed one when set */
  cheapThresholdBytes?: number;

  /** Partitions evaluated at once (1 = sequential) */
  maxParallelism: number;

  /** Chunk reductions even when the data fits in memory */
  forceChunked: boolean;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export type LogFormat = 'json' | 'pretty';

/**
 * Logging configuration.
 */
export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;
}

// =============================================================================
// Unified Configuration
// =============================================================================

export interface ChunkwiseConfig {
  engine: EngineConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'engine.chunkSize') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ConfigValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  /** List of validation errors */
  errors: ConfigValidationError[];

  /** List of validation warnings */
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'CHUNKWISE') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
