/**
 * Node.js SQLite Backend Implementation
 *
 * Implements the StorageBackend interface using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, RunResult } from 'better-sqlite3';
import { statSync } from 'fs';
import type { StorageBackend, StorageStats, StorageFactory } from './backend.js';
import type {
  Row,
  MutationResult,
  Transaction,
  TransactionOptions,
  IsolationLevel,
  StorageConfig,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { connectionError, mapStorageError, migrationError } from './errors.js';

// ============================================================================
// Parameter Binding
// ============================================================================

/**
 * SQLite rejects undefined and booleans; bind them as NULL and 0/1
 */
function bindParams(params?: unknown[]): unknown[] {
  if (!params) {
    return [];
  }
  return params.map((p) => {
    if (p === undefined) return null;
    if (typeof p === 'boolean') return p ? 1 : 0;
    return p;
  });
}

function runStatement(db: DatabaseType, sql: string, params?: unknown[]): MutationResult {
  const result: RunResult = db.prepare(sql).run(...bindParams(params));
  return {
    changes: result.changes,
    lastInsertRowid: result.lastInsertRowid,
  };
}

// ============================================================================
// Transaction Implementation
// ============================================================================

/**
 * Transaction context for better-sqlite3
 */
class NodeTransaction implements Transaction {
  constructor(
    private db: DatabaseType,
    readonly depth: number
  ) {}

  exec(sql: string): void {
    this.db.exec(sql);
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    return this.db.prepare(sql).all(...bindParams(params)) as T[];
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    return this.db.prepare(sql).get(...bindParams(params)) as T | undefined;
  }

  run(sql: string, params?: unknown[]): MutationResult {
    return runStatement(this.db, sql, params);
  }

  savepoint(name: string): void {
    this.db.exec(`SAVEPOINT ${name}`);
  }

  release(name: string): void {
    this.db.exec(`RELEASE SAVEPOINT ${name}`);
  }

  rollbackTo(name: string): void {
    this.db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
  }
}

// ============================================================================
// Node.js Storage Backend
// ============================================================================

/** Unicode-aware lower(), available in every query */
export const UNICODE_LOWER_FUNCTION = 'unicode_lower';

/**
 * Node.js SQLite storage backend implementation using better-sqlite3
 */
export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private _path: string;
  private depth = 0;

  constructor(config: StorageConfig) {
    this._path = config.path;

    try {
      this.db = new Database(config.path, {
        readonly: config.readonly ?? false,
      });
      this.applyPragmas(config.pragmas);
      this.registerFunctions();
    } catch (error) {
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    if (!this.db) return;

    this.db.pragma(`journal_mode = ${settings.journal_mode}`);
    this.db.pragma(`synchronous = ${settings.synchronous}`);
    this.db.pragma(`foreign_keys = ${settings.foreign_keys ? 'ON' : 'OFF'}`);
    this.db.pragma(`busy_timeout = ${settings.busy_timeout}`);
    this.db.pragma(`cache_size = ${settings.cache_size}`);

    const tempStoreValue = settings.temp_store === 'memory' ? 2 : settings.temp_store === 'file' ? 1 : 0;
    this.db.pragma(`temp_store = ${tempStoreValue}`);
  }

  /**
   * SQL functions the query layer relies on. SQLite's own lower() folds
   * ASCII letters only.
   */
  private registerFunctions(): void {
    if (!this.db) return;

    this.db.function(UNICODE_LOWER_FUNCTION, { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : value
    );
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this._path;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw connectionError(this._path, new Error('Database is closed'));
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  exec(sql: string): void {
    try {
      this.ensureOpen().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      return this.ensureOpen().prepare(sql).all(...bindParams(params)) as T[];
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      return this.ensureOpen().prepare(sql).get(...bindParams(params)) as T | undefined;
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      return runStatement(this.ensureOpen(), sql, params);
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T {
    const db = this.ensureOpen();

    if (this.depth > 0) {
      return this.nested(db, fn);
    }

    this.depth = 1;
    try {
      db.exec(this.getBeginSql(options?.isolation ?? 'deferred'));
      const result = fn(new NodeTransaction(db, 1));
      db.exec('COMMIT');
      return result;
    } catch (error) {
      // SQLite may already have rolled back (e.g. on SQLITE_FULL)
      if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth = 0;
    }
  }

  private nested<T>(db: DatabaseType, fn: (tx: Transaction) => T): T {
    const depth = this.depth + 1;
    const name = `sp_${depth}`;
    const tx = new NodeTransaction(db, depth);

    tx.savepoint(name);
    this.depth = depth;
    try {
      const result = fn(tx);
      tx.release(name);
      return result;
    } catch (error) {
      if (db.inTransaction) {
        tx.rollbackTo(name);
        tx.release(name);
      }
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth = depth - 1;
    }
  }

  private getBeginSql(isolation: IsolationLevel): string {
    switch (isolation) {
      case 'immediate':
        return 'BEGIN IMMEDIATE';
      case 'exclusive':
        return 'BEGIN EXCLUSIVE';
      case 'deferred':
      default:
        return 'BEGIN DEFERRED';
    }
  }

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number {
    const db = this.ensureOpen();
    const result = db.pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
  }

  setSchemaVersion(version: number): void {
    const db = this.ensureOpen();
    db.pragma(`user_version = ${version}`);
  }

  migrate(migrations: Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter(m => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return {
        fromVersion,
        toVersion: fromVersion,
        applied: [],
        success: true,
      };
    }

    const applied: number[] = [];

    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getSchemaVersion(),
      applied,
      success: true,
    };
  }

  // --------------------------------------------------------------------------
  // Record Count
  // --------------------------------------------------------------------------

  getRecordCount(): number {
    const table = this.queryOne<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'records'"
    );
    if (!table) {
      return 0;
    }
    const row = this.queryOne<{ count: number }>('SELECT COUNT(*) as count FROM records');
    return row?.count ?? 0;
  }

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  checkIntegrity(): boolean {
    const db = this.ensureOpen();
    const result = db.pragma('integrity_check', { simple: true });
    return result === 'ok';
  }

  optimize(): void {
    const db = this.ensureOpen();
    db.exec('ANALYZE');
    if (this.depth === 0) {
      db.exec('VACUUM');
    }
  }

  getStats(): StorageStats {
    const db = this.ensureOpen();

    let fileSize = 0;
    if (this._path !== ':memory:') {
      try {
        fileSize = statSync(this._path).size;
      } catch (error) {
        throw mapStorageError(error, { operation: 'getStats' });
      }
    }

    const tableCount = this.queryOne<{ count: number }>(
      "SELECT COUNT(*) as count FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    )?.count ?? 0;

    const indexCount = this.queryOne<{ count: number }>(
      "SELECT COUNT(*) as count FROM sqlite_master WHERE type='index' AND name NOT LIKE 'sqlite_%'"
    )?.count ?? 0;

    const journalMode = db.pragma('journal_mode', { simple: true });

    return {
      fileSize,
      tableCount,
      indexCount,
      schemaVersion: this.getSchemaVersion(),
      recordCount: this.getRecordCount(),
      walMode: journalMode === 'wal',
    };
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new Node.js storage backend
 */
export const createNodeStorage: StorageFactory = (config: StorageConfig) => {
  return new NodeStorageBackend(config);
};
