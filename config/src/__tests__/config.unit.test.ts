/**
 * @chunkwise/config - Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createConfig,
  validateConfig,
  getConfigFromEnv,
  mergeConfigs,
  DEFAULT_CONFIG,
  type ChunkwiseConfig,
  type DeepPartial,
} from '../index.js';

describe('@chunkwise/config', () => {
  // =============================================================================
  // DEFAULT_CONFIG Tests
  // =============================================================================

  describe('DEFAULT_CONFIG', () => {
    it('should export a complete default configuration', () => {
      expect(DEFAULT_CONFIG.engine).toEqual({
        chunkSize: 1048576,
        memoryFractionDivisor: 4,
        maxParallelism: 1,
        forceChunked: false,
      });
      expect(DEFAULT_CONFIG.observability).toEqual({ logLevel: 'warn', logFormat: 'json' });
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
      expect(Object.isFrozen(DEFAULT_CONFIG.engine)).toBe(true);
    });

    it('should pass validation without warnings', () => {
      const result = validateConfig(DEFAULT_CONFIG);
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });
  });

  // =============================================================================
  // createConfig Tests
  // =============================================================================

  describe('createConfig', () => {
    it('should return the defaults without overrides', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
      expect(createConfig(null)).toEqual(DEFAULT_CONFIG);
    });

    it('should override individual fields', () => {
      const config = createConfig({ engine: { chunkSize: 4096 } });
      expect(config.engine.chunkSize).toBe(4096);
      expect(config.engine.maxParallelism).toBe(1);
      expect(config.observability.logLevel).toBe('warn');
    });

    it('should ignore undefined overrides', () => {
      const config = createConfig({ engine: { chunkSize: undefined, forceChunked: true } });
      expect(config.engine.chunkSize).toBe(1048576);
      expect(config.engine.forceChunked).toBe(true);
    });

    it('should build on a base configuration', () => {
      const base = createConfig({ engine: { maxParallelism: 4 } });
      const config = createConfig({ observability: { logLevel: 'debug' } }, base);
      expect(config.engine.maxParallelism).toBe(4);
      expect(config.observability.logLevel).toBe('debug');
    });

    it('should return a frozen configuration', () => {
      const config = createConfig({ engine: { chunkSize: 4096 } });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.engine)).toBe(true);
      expect(Object.isFrozen(config.observability)).toBe(true);
    });
  });

  // =============================================================================
  // validateConfig Tests
  // =============================================================================

  describe('validateConfig', () => {
    function withEngine(engine: Partial<ChunkwiseConfig['engine']>): ChunkwiseConfig {
      return { engine: { ...DEFAULT_CONFIG.engine, ...engine }, observability: DEFAULT_CONFIG.observability };
    }

    it('should reject a chunk size that is not a positive integer', () => {
      for (const chunkSize of [0, -1, 1.5]) {
        const result = validateConfig(withEngine({ chunkSize }));
        expect(result.valid).toBe(false);
        expect(result.errors.map(e => e.path)).toEqual(['engine.chunkSize']);
        expect(result.errors[0].suggestion).toBe('Use a power of two such as 65536 or 1048576');
      }
    });

    it('should warn about small chunk sizes', () => {
      const result = validateConfig(withEngine({ chunkSize: 16 }));
      expect(result.valid).toBe(true);
      expect(result.warnings.map(w => w.path)).toEqual(['engine.chunkSize']);
    });

    it('should check the memory fraction divisor', () => {
      expect(validateConfig(withEngine({ memoryFractionDivisor: 0 })).valid).toBe(false);
      expect(validateConfig(withEngine({ memoryFractionDivisor: Infinity })).valid).toBe(false);

      const low = validateConfig(withEngine({ memoryFractionDivisor: 1 }));
      expect(low.valid).toBe(true);
      expect(low.warnings.map(w => w.path)).toEqual(['engine.memoryFractionDivisor']);
    });

    it('should check the fixed memory threshold', () => {
      expect(validateConfig(withEngine({ cheapThresholdBytes: -1 })).errors.map(e => e.path)).toEqual([
        'engine.cheapThresholdBytes',
      ]);
      expect(validateConfig(withEngine({ cheapThresholdBytes: 0 })).warnings).toEqual([]);
      expect(validateConfig(withEngine({ cheapThresholdBytes: 512 })).warnings).toHaveLength(1);
      expect(validateConfig(withEngine({ cheapThresholdBytes: 17 * 1024 ** 3 })).warnings).toHaveLength(1);
      expect(validateConfig(withEngine({ cheapThresholdBytes: 64 * 1024 ** 2 })).warnings).toEqual([]);
    });

    it('should check parallelism', () => {
      expect(validateConfig(withEngine({ maxParallelism: 0 })).valid).toBe(false);
      const high = validateConfig(withEngine({ maxParallelism: 128 }));
      expect(high.valid).toBe(true);
      expect(high.warnings.map(w => w.path)).toEqual(['engine.maxParallelism']);
    });

    it('should reject unknown log levels and formats', () => {
      const config = {
        engine: DEFAULT_CONFIG.engine,
        observability: JSON.parse('{"logLevel":"verbose","logFormat":"xml"}'),
      };
      const result = validateConfig(config);
      expect(result.valid).toBe(false);
      expect(result.errors.map(e => e.path)).toEqual(['observability.logLevel', 'observability.logFormat']);
    });

    it('should collect every error at once', () => {
      const result = validateConfig(withEngine({ chunkSize: 0, maxParallelism: -2 }));
      expect(result.errors.map(e => e.path)).toEqual(['engine.chunkSize', 'engine.maxParallelism']);
    });
  });

  // =============================================================================
  // getConfigFromEnv Tests
  // =============================================================================

  describe('getConfigFromEnv', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv };
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('should return defaults when no variables are set', () => {
      expect(getConfigFromEnv({ env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should read engine settings', () => {
      const config = getConfigFromEnv({
        env: {
          CHUNKWISE_ENGINE_CHUNK_SIZE: '65536',
          CHUNKWISE_ENGINE_MEMORY_FRACTION_DIVISOR: '8',
          CHUNKWISE_ENGINE_CHEAP_THRESHOLD_BYTES: '1048576',
          CHUNKWISE_ENGINE_MAX_PARALLELISM: '4',
          CHUNKWISE_ENGINE_FORCE_CHUNKED: 'true',
        },
      });
      expect(config.engine).toEqual({
        chunkSize: 65536,
        memoryFractionDivisor: 8,
        cheapThresholdBytes: 1048576,
        maxParallelism: 4,
        forceChunked: true,
      });
    });

    it('should read observability settings', () => {
      const config = getConfigFromEnv({
        env: {
          CHUNKWISE_OBSERVABILITY_LOG_LEVEL: 'debug',
          CHUNKWISE_OBSERVABILITY_LOG_FORMAT: 'pretty',
        },
      });
      expect(config.observability).toEqual({ logLevel: 'debug', logFormat: 'pretty' });
    });

    it('should read process.env by default', () => {
      process.env.CHUNKWISE_ENGINE_MAX_PARALLELISM = '16';
      expect(getConfigFromEnv().engine.maxParallelism).toBe(16);
    });

    it('should ignore values that do not parse', () => {
      const config = getConfigFromEnv({
        env: {
          CHUNKWISE_ENGINE_CHUNK_SIZE: 'not-a-number',
          CHUNKWISE_ENGINE_MAX_PARALLELISM: '',
          CHUNKWISE_OBSERVABILITY_LOG_LEVEL: 'toString',
          CHUNKWISE_OBSERVABILITY_LOG_FORMAT: 'xml',
        },
      });
      expect(config.engine.chunkSize).toBe(1048576);
      expect(config.engine.maxParallelism).toBe(1);
      expect(config.observability).toEqual({ logLevel: 'warn', logFormat: 'json' });
    });

    it('should treat anything but true or 1 as false', () => {
      expect(getConfigFromEnv({ env: { CHUNKWISE_ENGINE_FORCE_CHUNKED: '1' } }).engine.forceChunked).toBe(true);
      expect(getConfigFromEnv({ env: { CHUNKWISE_ENGINE_FORCE_CHUNKED: 'yes' } }).engine.forceChunked).toBe(false);
    });

    it('should support a custom prefix', () => {
      const config = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_ENGINE_CHUNK_SIZE: '2048' } });
      expect(config.engine.chunkSize).toBe(2048);
    });
  });

  // =============================================================================
  // mergeConfigs Tests
  // =============================================================================

  describe('mergeConfigs', () => {
    it('should let later configurations win', () => {
      const merged = mergeConfigs(
        { engine: { maxParallelism: 4 } },
        { engine: { maxParallelism: 8, chunkSize: 4096 } }
      );
      expect(merged).toEqual({ engine: { maxParallelism: 8, chunkSize: 4096 } });
    });

    it('should skip null and undefined entries', () => {
      const merged = mergeConfigs(null, { observability: { logLevel: 'info' } }, undefined);
      expect(merged).toEqual({ observability: { logLevel: 'info' } });
    });

    it('should return an empty object for no input', () => {
      expect(mergeConfigs()).toEqual({});
    });

    it('should feed createConfig', () => {
      const layers: DeepPartial<ChunkwiseConfig>[] = [
        { engine: { chunkSize: 4096 } },
        { engine: { forceChunked: true }, observability: { logFormat: 'pretty' } },
      ];
      const config = createConfig(mergeConfigs(...layers));
      expect(config.engine.chunkSize).toBe(4096);
      expect(config.engine.forceChunked).toBe(true);
      expect(config.observability.logFormat).toBe('pretty');
    });
  });
});
