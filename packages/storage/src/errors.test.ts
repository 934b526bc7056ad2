/**
 * Tests for Storage Error Mapping
 *
 * Validates that SQLite errors are correctly mapped to Trellis error types.
 */

import { describe, it, expect } from 'vitest';
import {
  SqliteResultCode,
  isBusyError,
  isConstraintError,
  isUniqueViolation,
  isForeignKeyViolation,
  isCorruptionError,
  mapStorageError,
  connectionError,
  migrationError,
} from './errors.js';
import {
  StorageError,
  ConflictError,
  ConstraintError,
  NotFoundError,
  ErrorCode,
} from '@trellis/core';

function sqliteError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isBusyError', () => {
  it('should detect BUSY error by code', () => {
    expect(isBusyError(sqliteError('busy', SqliteResultCode.BUSY))).toBe(true);
  });

  it('should detect extended LOCKED codes', () => {
    expect(isBusyError(sqliteError('locked', 'SQLITE_LOCKED_SHAREDCACHE'))).toBe(true);
  });

  it('should detect busy error by message', () => {
    expect(isBusyError(new Error('database is locked'))).toBe(true);
  });

  it('should return false for other errors and non-Error values', () => {
    expect(isBusyError(new Error('some other error'))).toBe(false);
    expect(isBusyError('string')).toBe(false);
    expect(isBusyError(null)).toBe(false);
    expect(isBusyError(undefined)).toBe(false);
  });
});

describe('isConstraintError', () => {
  it('should detect extended CONSTRAINT codes', () => {
    expect(isConstraintError(sqliteError('x', 'SQLITE_CONSTRAINT_CHECK'))).toBe(true);
  });

  it('should not treat a code that merely shares a prefix as a constraint', () => {
    expect(isConstraintError(sqliteError('x', 'SQLITE_CONSTRAINTS'))).toBe(false);
  });

  it('should detect constraint failures by message', () => {
    expect(isConstraintError(new Error('UNIQUE constraint failed: records.id'))).toBe(true);
    expect(isConstraintError(new Error('NOT NULL constraint failed: records.kind'))).toBe(true);
    expect(isConstraintError(new Error('CHECK constraint failed: kind'))).toBe(true);
  });

  it('should return false for non-constraint errors', () => {
    expect(isConstraintError(new Error('some other error'))).toBe(false);
  });
});

describe('isUniqueViolation', () => {
  it('should detect UNIQUE and PRIMARY KEY violations', () => {
    expect(isUniqueViolation(new Error('UNIQUE constraint failed: records.id'))).toBe(true);
    expect(isUniqueViolation(new Error('PRIMARY KEY constraint failed'))).toBe(true);
  });

  it('should return false for other constraint types', () => {
    expect(isUniqueViolation(new Error('FOREIGN KEY constraint failed'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});

describe('isForeignKeyViolation', () => {
  it('should detect FOREIGN KEY violations', () => {
    expect(isForeignKeyViolation(new Error('FOREIGN KEY constraint failed'))).toBe(true);
    expect(isForeignKeyViolation(new Error('UNIQUE constraint failed: records.id'))).toBe(false);
  });
});

describe('isCorruptionError', () => {
  it('should detect corruption by code and by message', () => {
    expect(isCorruptionError(sqliteError('x', SqliteResultCode.CORRUPT))).toBe(true);
    expect(isCorruptionError(sqliteError('x', SqliteResultCode.NOTADB))).toBe(true);
    expect(isCorruptionError(new Error('database disk image is malformed'))).toBe(true);
    expect(isCorruptionError(new Error('file is not a database'))).toBe(true);
  });

  it('should return false for other errors', () => {
    expect(isCorruptionError(new Error('syntax error'))).toBe(false);
  });
});

describe('mapStorageError', () => {
  it('should pass Trellis errors through unchanged', () => {
    const original = new NotFoundError('Capture not found: cap-abc123');
    expect(mapStorageError(original)).toBe(original);
  });

  it('should map unique violations to ALREADY_EXISTS', () => {
    const cause = new Error('UNIQUE constraint failed: records.id');
    const mapped = mapStorageError(cause, { operation: 'insert', recordId: 'cap-abc123' });
    expect(mapped).toBeInstanceOf(ConflictError);
    expect(mapped.code).toBe(ErrorCode.ALREADY_EXISTS);
    expect(mapped.message).toBe('Record already exists (duplicate id)');
    expect(mapped.details.table).toBe('records');
    expect(mapped.details.column).toBe('id');
    expect(mapped.details.recordId).toBe('cap-abc123');
    expect(mapped.cause).toBe(cause);
  });

  it('should map foreign key violations to DANGLING_REFERENCE', () => {
    const mapped = mapStorageError(new Error('FOREIGN KEY constraint failed'), { operation: 'run' });
    expect(mapped).toBeInstanceOf(ConstraintError);
    expect(mapped.code).toBe(ErrorCode.DANGLING_REFERENCE);
    expect(mapped.message).toBe('Referenced record does not exist');
  });

  it('should map other constraint violations to ConstraintError', () => {
    const mapped = mapStorageError(new Error('CHECK constraint failed: kind'));
    expect(mapped).toBeInstanceOf(ConstraintError);
    expect(mapped.message).toBe('Database constraint violation: CHECK constraint failed: kind');
  });

  it('should map busy errors to DATABASE_BUSY', () => {
    const mapped = mapStorageError(sqliteError('database is locked', SqliteResultCode.BUSY));
    expect(mapped).toBeInstanceOf(StorageError);
    expect(mapped.code).toBe(ErrorCode.DATABASE_BUSY);
    expect(mapped.httpStatus).toBe(503);
    expect(mapped.details.retryable).toBe(true);
  });

  it('should flag corruption', () => {
    const mapped = mapStorageError(new Error('database disk image is malformed'));
    expect(mapped.code).toBe(ErrorCode.DATABASE_ERROR);
    expect(mapped.details.corrupted).toBe(true);
  });

  it('should wrap generic errors with the sqlite code', () => {
    const mapped = mapStorageError(sqliteError('near "SELEC": syntax error', 'SQLITE_ERROR'), {
      operation: 'query',
    });
    expect(mapped).toBeInstanceOf(StorageError);
    expect(mapped.message).toBe('Database operation failed: near "SELEC": syntax error');
    expect(mapped.details.sqliteCode).toBe('SQLITE_ERROR');
    expect(mapped.details.operation).toBe('query');
  });

  it('should wrap non-Error values', () => {
    const mapped = mapStorageError('boom', { operation: 'exec' });
    expect(mapped.message).toBe('Storage operation failed: boom');
    expect(mapped.code).toBe(ErrorCode.DATABASE_ERROR);
  });
});

describe('connectionError', () => {
  it('should describe the path that failed to open', () => {
    const error = connectionError('/tmp/x.db', new Error('unable to open database file'));
    expect(error.message).toBe('Failed to open database at /tmp/x.db: unable to open database file');
    expect(error.details.path).toBe('/tmp/x.db');
  });

  it('should accept non-Error values', () => {
    expect(connectionError('/tmp/x.db', 'nope').message).toBe('Failed to open database at /tmp/x.db: nope');
  });
});

describe('migrationError', () => {
  it('should use MIGRATION_FAILED with the version', () => {
    const error = migrationError(2, new Error('table settings already exists'));
    expect(error.code).toBe(ErrorCode.MIGRATION_FAILED);
    expect(error.message).toBe('Failed to apply migration version 2: table settings already exists');
    expect(error.details.version).toBe(2);
  });
});
