// @chunkwise/core
// Errors, logging, the columnar data model and data sources

// =============================================================================
// Errors
// =============================================================================
export {
  ErrorCode,
  isErrorCode,
  captureStackTrace,
  ChunkwiseError,
  QueryError,
  UnsupportedOperationError,
  isUnsupportedOperation,
  ValidationError,
  NumericDomainError,
  PredicateCompilationError,
  hasErrorCode,
} from './errors.js';

// =============================================================================
// Logging
// =============================================================================
export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Constants
// =============================================================================
export {
  KB,
  MB,
  GB,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MEMORY_FRACTION_DIVISOR,
  STORAGE_BLOCK_SIZE,
  BOXED_VALUE_BYTES,
  STRING_CHAR_BYTES,
} from './constants.js';

// =============================================================================
// Data Model
// =============================================================================
export {
  scalarElement,
  recordElement,
  collectionOf,
  scalarOf,
  isNumericDType,
  type DType,
  type Field,
  type ScalarElement,
  type RecordElement,
  type ElementType,
  type DataShape,
  type Scalar,
  type Row,
  type NumericArray,
  type Column,
  type Item,
  type Value,
} from './types.js';

export {
  isNumericArray,
  isColumn,
  dtypeOfScalar,
  inferColumnDType,
  columnFromScalars,
  emptyColumn,
  sliceColumn,
  filterColumn,
  takeColumn,
  concatColumns,
  scalarByteSize,
  columnByteSize,
} from './column.js';

export { Table, isTable } from './table.js';

export { isScalar, isRow, isCollection, fromItems, checkElementType, valueByteSize } from './values.js';

// =============================================================================
// Data Sources
// =============================================================================
export {
  ArraySource,
  TableSource,
  capabilitiesOf,
  createSource,
  type DataSource,
  type SourceCapability,
  type BatchMask,
  type TableSourceOptions,
} from './source.js';
