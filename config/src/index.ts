/**
 * @chunkwise/config - Configuration for the chunked execution engine
 *
 * Key Features:
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with clear error messages
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@chunkwise/config';
 *
 * const config = createConfig({ engine: { chunkSize: 65536 } });
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @chunkwise/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // Utility types
  DeepPartial,
  DeepReadonly,

  // Sections
  EngineConfig,
  LogFormat,
  ObservabilityConfig,

  // Main config
  ChunkwiseConfig,

  // Validation types
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,

  // Environment types
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';
