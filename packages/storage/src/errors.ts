/**
 * Storage Error Mapping
 *
 * Maps SQLite error codes and messages to Trellis error types so callers
 * see one error vocabulary whatever the failing statement was.
 */

import {
  ConflictError,
  ConstraintError,
  ErrorCode,
  StorageError,
  isTrellisError,
  type TrellisError,
} from '@trellis/core';

// ============================================================================
// SQLite Error Codes
// ============================================================================

/**
 * SQLite primary result codes, as better-sqlite3 reports them in `error.code`
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  /** Generic error */
  ERROR: 'SQLITE_ERROR',
  /** Database file is locked */
  BUSY: 'SQLITE_BUSY',
  /** Table in the database is locked */
  LOCKED: 'SQLITE_LOCKED',
  /** Attempt to write a readonly database */
  READONLY: 'SQLITE_READONLY',
  /** Disk I/O error */
  IOERR: 'SQLITE_IOERR',
  /** Database disk image is malformed */
  CORRUPT: 'SQLITE_CORRUPT',
  /** Database or disk is full */
  FULL: 'SQLITE_FULL',
  /** Unable to open database file */
  CANTOPEN: 'SQLITE_CANTOPEN',
  /** Constraint violation */
  CONSTRAINT: 'SQLITE_CONSTRAINT',
  /** File opened that is not a database file */
  NOTADB: 'SQLITE_NOTADB',
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

/**
 * Extended codes carry the primary code as a prefix (SQLITE_CONSTRAINT_UNIQUE)
 */
function getSqliteCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

function hasPrimaryCode(error: Error, primary: SqliteResultCode): boolean {
  const code = getSqliteCode(error);
  return code !== undefined && (code === primary || code.startsWith(`${primary}_`));
}

// ============================================================================
// Constraint Violation Detection
// ============================================================================

/**
 * Patterns for detecting specific constraint violations from error messages
 */
const CONSTRAINT_PATTERNS = {
  /** UNIQUE constraint violation */
  UNIQUE: /UNIQUE constraint failed/i,
  /** PRIMARY KEY constraint violation */
  PRIMARY_KEY: /PRIMARY KEY constraint failed/i,
  /** FOREIGN KEY constraint violation */
  FOREIGN_KEY: /FOREIGN KEY constraint failed/i,
  /** NOT NULL constraint violation */
  NOT_NULL: /NOT NULL constraint failed/i,
  /** CHECK constraint violation */
  CHECK: /CHECK constraint failed/i,
} as const;

/**
 * Extract table and column from constraint error message
 */
function parseConstraintError(message: string): { table?: string; column?: string } {
  // SQLite format: "UNIQUE constraint failed: tablename.columnname"
  const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
  if (match) {
    return { table: match[1], column: match[2] };
  }
  return {};
}

// ============================================================================
// Error Detection
// ============================================================================

/**
 * Check if an error is a SQLite busy/locked error
 */
export function isBusyError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasPrimaryCode(error, SqliteResultCode.BUSY) || hasPrimaryCode(error, SqliteResultCode.LOCKED)) {
      return true;
    }
    return /database is locked/i.test(error.message);
  }
  return false;
}

/**
 * Check if an error is a SQLite constraint violation
 */
export function isConstraintError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasPrimaryCode(error, SqliteResultCode.CONSTRAINT)) {
      return true;
    }
    return Object.values(CONSTRAINT_PATTERNS).some((pattern) => pattern.test(error.message));
  }
  return false;
}

/**
 * Check if an error is a unique constraint violation
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof Error) {
    return (
      CONSTRAINT_PATTERNS.UNIQUE.test(error.message) ||
      CONSTRAINT_PATTERNS.PRIMARY_KEY.test(error.message)
    );
  }
  return false;
}

/**
 * Check if an error is a foreign key constraint violation
 */
export function isForeignKeyViolation(error: unknown): boolean {
  if (error instanceof Error) {
    return CONSTRAINT_PATTERNS.FOREIGN_KEY.test(error.message);
  }
  return false;
}

/**
 * Check if an error indicates database corruption
 */
export function isCorruptionError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasPrimaryCode(error, SqliteResultCode.CORRUPT) || hasPrimaryCode(error, SqliteResultCode.NOTADB)) {
      return true;
    }
    return /malformed|corrupt|not a database/i.test(error.message);
  }
  return false;
}

// ============================================================================
// Error Conversion
// ============================================================================

/**
 * Convert a SQLite error to the matching Trellis error type.
 * Errors that are already Trellis errors pass through unchanged.
 */
export function mapStorageError(
  error: unknown,
  context?: { operation?: string; recordId?: string; table?: string }
): TrellisError {
  if (isTrellisError(error)) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new StorageError(
      `Storage operation failed: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { operation: context?.operation }
    );
  }

  const message = error.message;

  if (isUniqueViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConflictError(
      `Record already exists${column ? ` (duplicate ${column})` : ''}`,
      ErrorCode.ALREADY_EXISTS,
      {
        recordId: context?.recordId,
        table: table ?? context?.table,
        column,
        operation: context?.operation,
      },
      error
    );
  }

  if (isForeignKeyViolation(error)) {
    return new ConstraintError(
      'Referenced record does not exist',
      ErrorCode.DANGLING_REFERENCE,
      {
        recordId: context?.recordId,
        operation: context?.operation,
      },
      error
    );
  }

  if (isConstraintError(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConstraintError(
      `Database constraint violation: ${message}`,
      ErrorCode.DANGLING_REFERENCE,
      {
        table: table ?? context?.table,
        column,
        operation: context?.operation,
      },
      error
    );
  }

  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      {
        operation: context?.operation,
        retryable: true,
      },
      error
    );
  }

  if (isCorruptionError(error)) {
    return new StorageError(
      'Database is corrupted or not a valid database file',
      ErrorCode.DATABASE_ERROR,
      {
        operation: context?.operation,
        corrupted: true,
      },
      error
    );
  }

  return new StorageError(
    `Database operation failed: ${message}`,
    ErrorCode.DATABASE_ERROR,
    {
      sqliteCode: getSqliteCode(error),
      operation: context?.operation,
      recordId: context?.recordId,
    },
    error
  );
}

// ============================================================================
// Error Helper Functions
// ============================================================================

/**
 * Create a storage error for connection failures
 */
export function connectionError(path: string, error: unknown): StorageError {
  if (!(error instanceof Error)) {
    return new StorageError(
      `Failed to open database at ${path}: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { path }
    );
  }

  return new StorageError(
    `Failed to open database at ${path}: ${error.message}`,
    ErrorCode.DATABASE_ERROR,
    { path },
    error
  );
}

/**
 * Create a storage error for schema migration failures
 */
export function migrationError(version: number, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return new StorageError(
    `Failed to apply migration version ${version}: ${cause?.message ?? String(error)}`,
    ErrorCode.MIGRATION_FAILED,
    { version, operation: 'migrate' },
    cause
  );
}
