/**
 * Tests for the typed error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ChunkwiseError,
  ErrorCode,
  NumericDomainError,
  PredicateCompilationError,
  QueryError,
  UnsupportedOperationError,
  ValidationError,
  hasErrorCode,
  isErrorCode,
  isUnsupportedOperation,
} from '../errors.js';

describe('ChunkwiseError base class', () => {
  it('should be an instance of Error', () => {
    const error = new ChunkwiseError('Test error', 'TEST_ERROR');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ChunkwiseError');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_ERROR');
  });

  it('should default to the UNKNOWN code', () => {
    expect(new ChunkwiseError('Test error').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should have undefined details when not provided', () => {
    const error = new ChunkwiseError('Test error', 'TEST_ERROR');
    expect(error.details).toBeUndefined();
    expect(error.suggestion).toBeUndefined();
  });

  it('should capture stack trace', () => {
    const error = new ChunkwiseError('Test error');
    expect(error.stack).toBeDefined();
  });

  it('should record a timestamp', () => {
    const before = Date.now();
    const error = new ChunkwiseError('Test error');
    expect(error.timestamp).toBeGreaterThanOrEqual(before);
    expect(error.timestamp).toBeLessThanOrEqual(Date.now());
  });

  it('should render a log context without empty fields', () => {
    const error = new ChunkwiseError('Test error', 'TEST_ERROR');
    expect(error.toLogContext()).toEqual({
      name: 'ChunkwiseError',
      message: 'Test error',
      code: 'TEST_ERROR',
      timestamp: error.timestamp,
    });
  });

  it('should render details and suggestion in the detailed string', () => {
    const error = new ChunkwiseError('Bad input', 'TEST_ERROR', { index: 3, name: 'x' }, 'Try again');
    expect(error.toDetailedString()).toBe(
      '[TEST_ERROR] Bad input\n  Details: index=3, name="x"\n  Suggestion: Try again'
    );
  });
});

describe('QueryError', () => {
  it('should extend ChunkwiseError with default code QUERY_ERROR', () => {
    const error = new QueryError('Evaluation failed');
    expect(error).toBeInstanceOf(ChunkwiseError);
    expect(error.name).toBe('QueryError');
    expect(error.code).toBe(ErrorCode.QUERY_ERROR);
  });

  it('should describe an unbound symbol', () => {
    const error = QueryError.unboundSymbol('chunk');
    expect(error.code).toBe(ErrorCode.UNBOUND_SYMBOL);
    expect(error.message).toBe('Symbol "chunk" is not bound to any data');
    expect(error.details).toEqual({ operation: 'evaluate', symbol: 'chunk' });
  });
});

describe('UnsupportedOperationError', () => {
  it('should be distinguishable from runtime failures', () => {
    const unsupported = new UnsupportedOperationError('No strategy');
    const runtime = new QueryError('Boom');
    expect(isUnsupportedOperation(unsupported)).toBe(true);
    expect(isUnsupportedOperation(runtime)).toBe(false);
    expect(unsupported.code).toBe(ErrorCode.UNSUPPORTED_OPERATION);
  });

  it('should carry the expression and reason when a split is not derivable', () => {
    const error = UnsupportedOperationError.notSplittable('sum(x) + count(x)', 'two branches reach the leaf');
    expect(error.code).toBe(ErrorCode.SPLIT_NOT_DERIVABLE);
    expect(error.message).toBe(
      'Cannot split "sum(x) + count(x)" into chunk and aggregate parts: two branches reach the leaf'
    );
    expect(error.details).toEqual({
      operation: 'split',
      expression: 'sum(x) + count(x)',
      reason: 'two branches reach the leaf',
    });
    expect(isUnsupportedOperation(error)).toBe(true);
  });
});

describe('ValidationError', () => {
  it('should default to VALIDATION_ERROR', () => {
    expect(new ValidationError('Invalid').code).toBe(ErrorCode.VALIDATION_ERROR);
  });

  it('should describe a type mismatch', () => {
    const error = ValidationError.typeMismatch('amount', 'float64', 'string');
    expect(error.code).toBe(ErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('Type mismatch at "amount": expected float64, got string');
  });

  it('should list available columns when a column is missing', () => {
    const error = ValidationError.columnNotFound('price', ['id', 'amount']);
    expect(error.code).toBe(ErrorCode.COLUMN_NOT_FOUND);
    expect(error.suggestion).toBe('Available columns: id, amount');
  });

  it('should omit the suggestion when no columns exist', () => {
    expect(ValidationError.columnNotFound('price', []).suggestion).toBeUndefined();
  });

  it('should tag invalid partitions with the plan operation', () => {
    const error = ValidationError.invalidPartition('Chunk size must be at least 1', { chunkSize: 0 });
    expect(error.code).toBe(ErrorCode.INVALID_PARTITION);
    expect(error.details).toEqual({ operation: 'plan', chunkSize: 0 });
  });
});

describe('NumericDomainError', () => {
  it('should describe an empty reduction', () => {
    const error = NumericDomainError.emptyReduction('mean');
    expect(error).toBeInstanceOf(ChunkwiseError);
    expect(error.name).toBe('NumericDomainError');
    expect(error.code).toBe(ErrorCode.EMPTY_REDUCTION);
    expect(error.message).toBe('Cannot compute mean of an empty dataset');
  });

  it('should default to NUMERIC_DOMAIN_ERROR', () => {
    expect(new NumericDomainError('Negative variance').code).toBe(ErrorCode.NUMERIC_DOMAIN_ERROR);
  });
});

describe('PredicateCompilationError', () => {
  it('should use the PREDICATE_COMPILATION_ERROR code', () => {
    const error = new PredicateCompilationError('like is not vectorisable', { tag: 'like' });
    expect(error.code).toBe(ErrorCode.PREDICATE_COMPILATION_ERROR);
    expect(error.details).toEqual({ tag: 'like' });
  });
});

describe('error utilities', () => {
  it('hasErrorCode should match only ChunkwiseErrors with that code', () => {
    expect(hasErrorCode(NumericDomainError.emptyReduction('std'), ErrorCode.EMPTY_REDUCTION)).toBe(true);
    expect(hasErrorCode(new QueryError('x'), ErrorCode.EMPTY_REDUCTION)).toBe(false);
    expect(hasErrorCode(new Error('x'), ErrorCode.UNKNOWN)).toBe(false);
  });

  it('isErrorCode should recognise enum values', () => {
    expect(isErrorCode('UNBOUND_SYMBOL')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });
});
