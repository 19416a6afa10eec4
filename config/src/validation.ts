/**
 * @chunkwise/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { GB, MB } from '@chunkwise/core';

import type {
  ChunkwiseConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
} from './types.js';

/**
 * Validate a complete ChunkwiseConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * if (result.warnings.length > 0) {
 *   console.warn('Config warnings:', result.warnings);
 * }
 * ```
 */
export function validateConfig(config: ChunkwiseConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateEngineConfig(config.engine, errors, warnings);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate engine configuration.
 */
function validateEngineConfig(
  engine: ChunkwiseConfig['engine'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isPositiveInteger(engine.chunkSize)) {
    errors.push({
      path: 'engine.chunkSize',
      message: 'Chunk size must be a positive integer',
      value: engine.chunkSize,
      suggestion: 'Use a power of two such as 65536 or 1048576',
    });
  } else if (engine.chunkSize < 1024) {
    warnings.push({
      path: 'engine.chunkSize',
      message: 'Chunk size below 1024 elements adds a large per-chunk overhead',
      value: engine.chunkSize,
      recommendation: 'Use at least 65536 elements per chunk outside of tests',
    });
  }

  if (!(engine.memoryFractionDivisor > 0) || !Number.isFinite(engine.memoryFractionDivisor)) {
    errors.push({
      path: 'engine.memoryFractionDivisor',
      message: 'Memory fraction divisor must be a positive number',
      value: engine.memoryFractionDivisor,
    });
  } else if (engine.memoryFractionDivisor < 2) {
    warnings.push({
      path: 'engine.memoryFractionDivisor',
      message: 'A divisor below 2 lets a single query claim most of the available memory',
      value: engine.memoryFractionDivisor,
      recommendation: 'Keep the divisor at 4 or above',
    });
  }

  if (engine.cheapThresholdBytes !== undefined) {
    if (!(engine.cheapThresholdBytes >= 0)) {
      errors.push({
        path: 'engine.cheapThresholdBytes',
        message: 'Memory threshold must be a non-negative number of bytes',
        value: engine.cheapThresholdBytes,
      });
    } else if (engine.cheapThresholdBytes > 16 * GB) {
      warnings.push({
        path: 'engine.cheapThresholdBytes',
        message: 'Memory threshold exceeds 16GB, which may cause memory pressure',
        value: engine.cheapThresholdBytes,
        recommendation: `Consider a threshold below ${16 * GB} bytes or leave it unset`,
      });
    } else if (engine.cheapThresholdBytes > 0 && engine.cheapThresholdBytes < MB) {
      warnings.push({
        path: 'engine.cheapThresholdBytes',
        message: 'Memory threshold below 1MB sends almost every reduction down the chunked route',
        value: engine.cheapThresholdBytes,
      });
    }
  }

  if (!isPositiveInteger(engine.maxParallelism)) {
    errors.push({
      path: 'engine.maxParallelism',
      message: 'Max parallelism must be a positive integer',
      value: engine.maxParallelism,
      suggestion: 'Use 1 for sequential execution',
    });
  } else if (engine.maxParallelism > 64) {
    warnings.push({
      path: 'engine.maxParallelism',
      message: 'High parallelism keeps many chunks in memory at once',
      value: engine.maxParallelism,
      recommendation: 'Consider values between 1 and 16 for most workloads',
    });
  }
}

/**
 * Validate observability configuration.
 */
function validateObservabilityConfig(
  observability: ChunkwiseConfig['observability'],
  errors: ConfigValidationError[]
): void {
  const validLogLevels: readonly string[] = ['debug', 'info', 'warn', 'error'];
  if (!validLogLevels.includes(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: `Log level must be one of: ${validLogLevels.join(', ')}`,
      value: observability.logLevel,
    });
  }

  const validLogFormats: readonly string[] = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }
}
