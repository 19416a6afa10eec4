/**
 * @chunkwise/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { LogLevels } from '@chunkwise/core';

import type {
  ChunkwiseConfig,
  DeepPartial,
  EngineConfig,
  EnvConfigOptions,
  LogFormat,
  ObservabilityConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

const ENGINE_FIELDS: readonly (keyof EngineConfig)[] = [
  'chunkSize',
  'memoryFractionDivisor',
  'cheapThresholdBytes',
  'maxParallelism',
  'forceChunked',
];

const OBSERVABILITY_FIELDS: readonly (keyof ObservabilityConfig)[] = ['logLevel', 'logFormat'];

/**
 * Merge the listed fields of each layer in order. Undefined values never
 * override.
 */
function mergeSection<T extends object>(
  fields: readonly (keyof T)[],
  ...layers: Array<Partial<T> | null | undefined>
): Partial<T> {
  const result: Partial<T> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of fields) {
      const value = layer[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

function freezeConfig(config: ChunkwiseConfig): ChunkwiseConfig {
  Object.freeze(config.engine);
  Object.freeze(config.observability);
  return Object.freeze(config);
}

/**
 * Create a complete ChunkwiseConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen ChunkwiseConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   engine: { chunkSize: 4096, maxParallelism: 4 },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ observability: { logLevel: 'debug' } }, config2);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<ChunkwiseConfig> | null,
  base: ChunkwiseConfig = DEFAULT_CONFIG
): ChunkwiseConfig {
  return freezeConfig({
    engine: { ...base.engine, ...mergeSection<EngineConfig>(ENGINE_FIELDS, overrides?.engine) },
    observability: {
      ...base.observability,
      ...mergeSection<ObservabilityConfig>(OBSERVABILITY_FIELDS, overrides?.observability),
    },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const base = { engine: { maxParallelism: 4 } };
 * const override = { engine: { maxParallelism: 8, chunkSize: 4096 } };
 * const merged = mergeConfigs(base, override);
 * // merged.engine.maxParallelism === 8
 * // merged.engine.chunkSize === 4096
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<ChunkwiseConfig> | null | undefined>
): DeepPartial<ChunkwiseConfig> {
  const result: DeepPartial<ChunkwiseConfig> = {};
  const engine = mergeSection<EngineConfig>(ENGINE_FIELDS, ...configs.map(config => config?.engine));
  const observability = mergeSection<ObservabilityConfig>(
    OBSERVABILITY_FIELDS,
    ...configs.map(config => config?.observability)
  );

  if (Object.keys(engine).length > 0) result.engine = engine;
  if (Object.keys(observability).length > 0) result.observability = observability;
  return result;
}

/**
 * Parse a numeric environment value; anything that is not a number is ignored.
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: CHUNKWISE_<SECTION>_<FIELD>
 * For example:
 * - CHUNKWISE_ENGINE_CHUNK_SIZE=65536
 * - CHUNKWISE_ENGINE_FORCE_CHUNKED=true
 * - CHUNKWISE_OBSERVABILITY_LOG_LEVEL=debug
 *
 * Values that do not parse, such as an unknown log level, are ignored.
 *
 * @example
 * ```typescript
 * // Basic usage
 * const config = getConfigFromEnv();
 *
 * // Custom prefix
 * const config = getConfigFromEnv({ prefix: 'MYAPP' });
 *
 * // Custom environment object
 * const config = getConfigFromEnv({ env: { CHUNKWISE_ENGINE_CHUNK_SIZE: '4096' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): ChunkwiseConfig {
  const prefix = options.prefix ?? 'CHUNKWISE';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});

  const engine: Partial<EngineConfig> = {
    chunkSize: parseNumber(getEnvVar(env, prefix, 'ENGINE', 'CHUNK', 'SIZE')),
    memoryFractionDivisor: parseNumber(getEnvVar(env, prefix, 'ENGINE', 'MEMORY', 'FRACTION', 'DIVISOR')),
    cheapThresholdBytes: parseNumber(getEnvVar(env, prefix, 'ENGINE', 'CHEAP', 'THRESHOLD', 'BYTES')),
    maxParallelism: parseNumber(getEnvVar(env, prefix, 'ENGINE', 'MAX', 'PARALLELISM')),
    forceChunked: parseBoolean(getEnvVar(env, prefix, 'ENGINE', 'FORCE', 'CHUNKED')),
  };

  const logLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL');
  const logFormat = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT');
  const observability: Partial<ObservabilityConfig> = {
    ...(logLevel !== undefined && LogLevels.isLogLevel(logLevel) && { logLevel }),
    ...(logFormat !== undefined && isLogFormat(logFormat) && { logFormat }),
  };

  return createConfig({ engine, observability });
}
