/**
 * @trellis/storage
 *
 * SQLite storage layer for the Trellis record store, built on better-sqlite3.
 */

// Type definitions
export type {
  Row,
  MutationResult,
  IsolationLevel,
  TransactionOptions,
  Transaction,
  SqlitePragmas,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

// Backend interface
export type {
  StorageBackend,
  StorageStats,
  StorageFactory,
} from './backend.js';

// Error mapping
export {
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

// Backends
export { NodeStorageBackend, UNICODE_LOWER_FUNCTION, createNodeStorage } from './node-backend.js';
export { createStorage, openStorage } from './create-backend.js';

// Schema management
export {
  CURRENT_SCHEMA_VERSION,
  MIGRATIONS,
  EXPECTED_TABLES,
  initializeSchema,
  getSchemaVersion,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  validateSchema,
  getTableColumns,
  getTableIndexes,
} from './schema.js';
