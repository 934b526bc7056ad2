/**
 * Storage Backend Interface
 *
 * Defines the interface the record store runs against. The Node.js
 * implementation uses better-sqlite3; tests use the same backend on
 * an in-memory database.
 */

import type {
  Row,
  MutationResult,
  Transaction,
  TransactionOptions,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

// ============================================================================
// Storage Backend Interface
// ============================================================================

/**
 * The core storage backend interface.
 *
 * The interface is synchronous: SQLite calls through better-sqlite3 are
 * synchronous, and every store operation runs to completion inside one
 * transaction.
 */
export interface StorageBackend {
  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  /**
   * Check if the database connection is open
   */
  readonly isOpen: boolean;

  /**
   * Get the path to the database file
   */
  readonly path: string;

  /**
   * Close the database connection.
   * After closing, no further operations can be performed.
   */
  close(): void;

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  /**
   * Execute a SQL statement without returning results.
   * Use for DDL statements (CREATE, DROP, ALTER) and batch operations.
   *
   * @throws StorageError on SQL syntax error or constraint violation
   */
  exec(sql: string): void;

  /**
   * Execute a parameterized query and return all matching rows.
   *
   * @param sql - The SQL query with ? placeholders
   * @param params - Parameter values to bind to placeholders
   */
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  /**
   * Execute a parameterized query and return the first matching row.
   *
   * @returns The first row or undefined if no match
   */
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  /**
   * Execute a parameterized mutation (INSERT, UPDATE, DELETE).
   *
   * @returns Mutation result with changes count and last insert ID
   * @throws ConflictError/ConstraintError on constraint violation, StorageError otherwise
   */
  run(sql: string, params?: unknown[]): MutationResult;

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  /**
   * Execute a function within a database transaction.
   *
   * The outermost call opens a transaction; nested calls open a savepoint.
   * Returning commits (or releases the savepoint); throwing rolls back every
   * write made inside the call and rethrows.
   */
  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T;

  /**
   * Check if currently inside a transaction
   */
  readonly inTransaction: boolean;

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  /**
   * Get the current schema version
   */
  getSchemaVersion(): number;

  /**
   * Set the schema version
   */
  setSchemaVersion(version: number): void;

  /**
   * Run pending migrations to bring schema up to date
   */
  migrate(migrations: Migration[]): MigrationResult;

  // --------------------------------------------------------------------------
  // Record Count (for ID generation)
  // --------------------------------------------------------------------------

  /**
   * Get the total number of records, or 0 if the records table doesn't exist
   */
  getRecordCount(): number;

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  /**
   * Check database integrity
   *
   * @returns true if database passes integrity check
   */
  checkIntegrity(): boolean;

  /**
   * Optimize the database (VACUUM, ANALYZE)
   */
  optimize(): void;

  /**
   * Get database statistics
   */
  getStats(): StorageStats;
}

// ============================================================================
// Storage Statistics
// ============================================================================

/**
 * Database statistics for monitoring and diagnostics
 */
export interface StorageStats {
  /** Database file size in bytes */
  fileSize: number;
  /** Number of tables in the database */
  tableCount: number;
  /** Number of indexes in the database */
  indexCount: number;
  /** Current schema version */
  schemaVersion: number;
  /** Total number of records in the database */
  recordCount: number;
  /** Whether the database is in WAL mode */
  walMode: boolean;
}

// ============================================================================
// Storage Factory
// ============================================================================

/**
 * Factory function type for creating storage backends
 */
export type StorageFactory = (config: StorageConfig) => StorageBackend;
