/**
 * Chunkwise common constants
 *
 * @module constants
 */

// =============================================================================
// BYTE SIZE CONSTANTS
// =============================================================================

/** 1 Kilobyte in bytes */
export const KB = 1024;

/** 1 Megabyte in bytes */
export const MB = 1024 * 1024;

/** 1 Gigabyte in bytes */
export const GB = 1024 * 1024 * 1024;

// =============================================================================
// EXECUTION CONSTANTS
// =============================================================================

/** Elements per partition when the caller does not choose (2^20) */
export const DEFAULT_CHUNK_SIZE = 2 ** 20;

/** Data fits in memory when it is smaller than available memory divided by this */
export const DEFAULT_MEMORY_FRACTION_DIVISOR = 4;

/** Block length used by sources when they scan themselves (2^15) */
export const STORAGE_BLOCK_SIZE = 2 ** 15;

// =============================================================================
// SIZE ESTIMATES
// =============================================================================

/** Estimated bytes per boxed value in a general array */
export const BOXED_VALUE_BYTES = 8;

/** Estimated bytes per UTF-16 code unit of a string */
export const STRING_CHAR_BYTES = 2;
