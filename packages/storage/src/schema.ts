/**
 * Schema Management
 *
 * Defines the database schema migrations for the record store.
 * Uses a migration-based approach for schema versioning.
 *
 * Every record lives in one `records` table: the kind and owner are columns,
 * the rest of the record is a JSON document in `data`. Sprint membership is
 * the one relationship kept in its own table, so ordering and uniqueness are
 * enforced by SQLite.
 */

import type { Migration, MigrationResult } from './types.js';
import type { StorageBackend } from './backend.js';

// ============================================================================
// Schema Constants
// ============================================================================

/**
 * Current schema version
 */
export const CURRENT_SCHEMA_VERSION = 2;

// ============================================================================
// Migrations
// ============================================================================

/**
 * Migration 1: Initial schema
 *
 * Creates the records table, sprint membership and their indexes.
 */
const migration001: Migration = {
  version: 1,
  description: 'Initial schema with records and sprint membership tables',
  up: `
-- Record storage
CREATE TABLE records (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    owner TEXT NOT NULL,
    data TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (kind IN ('capture', 'sprint', 'workspace', 'document', 'template'))
);

-- Sprint membership in assignment order
CREATE TABLE sprint_captures (
    sprint_id TEXT NOT NULL REFERENCES records(id) ON DELETE CASCADE,
    capture_id TEXT NOT NULL REFERENCES records(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    added_at TEXT NOT NULL,
    PRIMARY KEY (sprint_id, capture_id)
);

-- Listing order is (created_at, id) within an owner and kind
CREATE INDEX idx_records_owner_kind ON records(owner, kind, created_at, id);
CREATE INDEX idx_records_kind ON records(kind, created_at, id);
CREATE INDEX idx_records_parent ON records(json_extract(data, '$.parentId'));
CREATE INDEX idx_records_workspace ON records(json_extract(data, '$.workspaceId'));
CREATE INDEX idx_sprint_captures_capture ON sprint_captures(capture_id);
`,
  down: `
DROP INDEX IF EXISTS idx_sprint_captures_capture;
DROP INDEX IF EXISTS idx_records_workspace;
DROP INDEX IF EXISTS idx_records_parent;
DROP INDEX IF EXISTS idx_records_kind;
DROP INDEX IF EXISTS idx_records_owner_kind;
DROP TABLE IF EXISTS sprint_captures;
DROP TABLE IF EXISTS records;
`,
};

/**
 * Migration 2: Settings table
 *
 * Server-side key/value settings (the auth service binding and its controllers).
 */
const migration002: Migration = {
  version: 2,
  description: 'Add settings table for server-side configuration',
  up: `
CREATE TABLE settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
);
`,
  down: `
DROP TABLE IF EXISTS settings;
`,
};

/**
 * All migrations in order
 */
export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

// ============================================================================
// Schema Functions
// ============================================================================

/**
 * Initialize the database schema
 *
 * Applies all pending migrations to bring the database up to the current version.
 *
 * @param backend - The storage backend to initialize
 * @returns Migration result with details of what was applied
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate([...MIGRATIONS]);
}

/**
 * Get the current schema version from a backend
 *
 * @param backend - The storage backend to check
 * @returns Current schema version number
 */
export function getSchemaVersion(backend: StorageBackend): number {
  return backend.getSchemaVersion();
}

/**
 * Check if the schema is up to date
 *
 * @param backend - The storage backend to check
 * @returns True if schema is at the current version
 */
export function isSchemaUpToDate(backend: StorageBackend): boolean {
  return backend.getSchemaVersion() === CURRENT_SCHEMA_VERSION;
}

/**
 * Get pending migrations that need to be applied
 *
 * @param backend - The storage backend to check
 * @returns Array of migrations that haven't been applied yet
 */
export function getPendingMigrations(backend: StorageBackend): Migration[] {
  const currentVersion = backend.getSchemaVersion();
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

/**
 * Reset the database schema
 *
 * WARNING: This drops all tables and data! Use only for testing.
 *
 * @param backend - The storage backend to reset
 */
export function resetSchema(backend: StorageBackend): void {
  // Run all down scripts in reverse order (newest first)
  const reversedMigrations = [...MIGRATIONS].reverse();
  for (const migration of reversedMigrations) {
    if (migration.down) {
      backend.exec(migration.down);
    }
  }

  // Reset version
  backend.setSchemaVersion(0);
}

// ============================================================================
// Schema Validation
// ============================================================================

/**
 * Table names that should exist after schema initialization
 */
export const EXPECTED_TABLES = [
  'records',
  'sprint_captures',
  'settings',
] as const;

/**
 * Validate that all expected tables exist
 *
 * @param backend - The storage backend to validate
 * @returns Object with validation results
 */
export function validateSchema(backend: StorageBackend): {
  valid: boolean;
  missingTables: string[];
  extraTables: string[];
} {
  // Query actual tables
  const rows = backend.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
  );

  const actualTables = new Set(rows.map((r) => r.name));
  const expectedSet = new Set<string>(EXPECTED_TABLES);

  const missingTables = EXPECTED_TABLES.filter((t) => !actualTables.has(t));
  const extraTables = [...actualTables].filter((t) => !expectedSet.has(t));

  return {
    valid: missingTables.length === 0,
    missingTables,
    extraTables,
  };
}

/**
 * Validate table columns match expected schema
 *
 * @param backend - The storage backend
 * @param tableName - Name of table to validate
 * @returns Column information
 */
export function getTableColumns(
  backend: StorageBackend,
  tableName: string
): Array<{
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}> {
  const rows = backend.query<{
    name: string;
    type: string;
    notnull: number;
    pk: number;
  }>(`PRAGMA table_info(${tableName})`);

  return rows.map((r) => ({
    name: r.name,
    type: r.type,
    notnull: r.notnull === 1,
    pk: r.pk === 1,
  }));
}

/**
 * Get indexes for a table
 *
 * @param backend - The storage backend
 * @param tableName - Name of table
 * @returns Index names for the table
 */
export function getTableIndexes(backend: StorageBackend, tableName: string): string[] {
  const rows = backend.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%'`,
    [tableName]
  );
  return rows.map((r) => r.name);
}
