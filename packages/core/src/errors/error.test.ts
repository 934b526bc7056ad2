import { describe, it, expect } from 'vitest';
import {
  TrellisError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  IdentityError,
  isTrellisError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isConstraintError,
  isStorageError,
  isIdentityError,
  hasErrorCode,
} from './error.js';
import { ErrorCode, ErrorHttpStatus, getErrorCategory } from './codes.js';

describe('TrellisError', () => {
  describe('constructor', () => {
    it('should create error with required parameters', () => {
      const error = new TrellisError('Test error', ErrorCode.INVALID_INPUT);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.details).toEqual({});
      expect(error.name).toBe('TrellisError');
      expect(error.httpStatus).toBe(400);
    });

    it('should keep the cause', () => {
      const cause = new Error('Original error');
      const error = new TrellisError('Wrapped error', ErrorCode.DATABASE_ERROR, {}, cause);

      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(Error);
    });

    it('should have correct HTTP status for each error code', () => {
      for (const code of Object.values(ErrorCode)) {
        const error = new TrellisError('Test', code);
        expect(error.httpStatus).toBe(ErrorHttpStatus[code]);
      }
    });
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new TrellisError('Capture not found: cap-abc', ErrorCode.NOT_FOUND, {
        recordId: 'cap-abc',
      });

      expect(error.toJSON()).toEqual({
        name: 'TrellisError',
        message: 'Capture not found: cap-abc',
        code: 'NOT_FOUND',
        details: { recordId: 'cap-abc' },
        httpStatus: 404,
      });
    });
  });
});

describe('subclasses', () => {
  it('should apply default codes and names', () => {
    expect(new ValidationError('x').code).toBe(ErrorCode.INVALID_INPUT);
    expect(new NotFoundError('x').code).toBe(ErrorCode.NOT_FOUND);
    expect(new StorageError('x').code).toBe(ErrorCode.DATABASE_ERROR);
    expect(new IdentityError('x').code).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
    expect(new ConflictError('x', ErrorCode.ALREADY_ASSIGNED).name).toBe('ConflictError');
    expect(new ConstraintError('x', ErrorCode.CAPACITY_EXCEEDED).name).toBe('ConstraintError');
  });

  it('should map domain error kinds to HTTP statuses', () => {
    expect(new IdentityError('x', ErrorCode.NOT_OWNER).httpStatus).toBe(403);
    expect(new ConstraintError('x', ErrorCode.DANGLING_REFERENCE).httpStatus).toBe(422);
    expect(new ConstraintError('x', ErrorCode.CAPACITY_EXCEEDED).httpStatus).toBe(409);
    expect(new ConflictError('x', ErrorCode.CYCLE_DETECTED).httpStatus).toBe(409);
  });
});

describe('type guards', () => {
  it('should narrow by class', () => {
    const validation = new ValidationError('x');
    const notFound = new NotFoundError('x');
    const conflict = new ConflictError('x', ErrorCode.NOT_ASSIGNED);
    const constraint = new ConstraintError('x', ErrorCode.HAS_DEPENDENTS);
    const storage = new StorageError('x');
    const identity = new IdentityError('x');

    expect(isTrellisError(validation)).toBe(true);
    expect(isTrellisError(new Error('plain'))).toBe(false);
    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(notFound)).toBe(false);
    expect(isNotFoundError(notFound)).toBe(true);
    expect(isConflictError(conflict)).toBe(true);
    expect(isConstraintError(constraint)).toBe(true);
    expect(isStorageError(storage)).toBe(true);
    expect(isIdentityError(identity)).toBe(true);
  });

  it('should match error codes', () => {
    const error = new ConflictError('x', ErrorCode.ALREADY_ASSIGNED);
    expect(hasErrorCode(error, ErrorCode.ALREADY_ASSIGNED)).toBe(true);
    expect(hasErrorCode(error, ErrorCode.NOT_ASSIGNED)).toBe(false);
    expect(hasErrorCode('ALREADY_ASSIGNED', ErrorCode.ALREADY_ASSIGNED)).toBe(false);
  });
});

describe('getErrorCategory', () => {
  it('should report the group a code belongs to', () => {
    expect(getErrorCategory(ErrorCode.INVALID_FIELD)).toBe('validation');
    expect(getErrorCategory(ErrorCode.FOLDER_NOT_FOUND)).toBe('not_found');
    expect(getErrorCategory(ErrorCode.CYCLE_DETECTED)).toBe('conflict');
    expect(getErrorCategory(ErrorCode.TYPE_MISMATCH)).toBe('constraint');
    expect(getErrorCategory(ErrorCode.MIGRATION_FAILED)).toBe('storage');
    expect(getErrorCategory(ErrorCode.NOT_OWNER)).toBe('identity');
  });
});
