/**
 * Integration Tests for Node.js SQLite Backend
 *
 * These tests validate the better-sqlite3 backend implementation against
 * in-memory and file-based databases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ErrorCode, NotFoundError } from '@trellis/core';
import { NodeStorageBackend, createNodeStorage } from './node-backend.js';
import type { StorageBackend } from './backend.js';
import type { Migration } from './types.js';

describe('NodeStorageBackend', () => {
  describe('In-Memory Database', () => {
    let backend: StorageBackend;

    beforeEach(() => {
      backend = new NodeStorageBackend({ path: ':memory:' });
    });

    afterEach(() => {
      if (backend.isOpen) {
        backend.close();
      }
    });

    describe('Connection Management', () => {
      it('should open in-memory database', () => {
        expect(backend.isOpen).toBe(true);
        expect(backend.path).toBe(':memory:');
      });

      it('should throw after close', () => {
        backend.close();
        expect(backend.isOpen).toBe(false);
        expect(() => backend.exec('SELECT 1')).toThrow('Database is closed');
      });

      it('should report transaction status', () => {
        expect(backend.inTransaction).toBe(false);
      });
    });

    describe('SQL Execution', () => {
      beforeEach(() => {
        backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, name TEXT, flag INTEGER)');
      });

      it('should query empty results', () => {
        expect(backend.query('SELECT * FROM test')).toEqual([]);
      });

      it('should query with parameters', () => {
        backend.run('INSERT INTO test (name) VALUES (?)', ['alice']);
        backend.run('INSERT INTO test (name) VALUES (?)', ['bob']);
        const rows = backend.query<{ name: string }>('SELECT name FROM test WHERE name = ?', ['bob']);
        expect(rows).toEqual([{ name: 'bob' }]);
      });

      it('should queryOne with and without a result', () => {
        backend.run('INSERT INTO test (name) VALUES (?)', ['alice']);
        expect(backend.queryOne<{ name: string }>('SELECT name FROM test')).toEqual({ name: 'alice' });
        expect(backend.queryOne('SELECT name FROM test WHERE name = ?', ['zed'])).toBeUndefined();
      });

      it('should run mutations and report changes', () => {
        const inserted = backend.run('INSERT INTO test (name) VALUES (?)', ['alice']);
        expect(inserted.changes).toBe(1);
        expect(inserted.lastInsertRowid).toBe(1);
        const updated = backend.run('UPDATE test SET name = ?', ['carol']);
        expect(updated.changes).toBe(1);
      });

      it('should bind undefined as NULL and booleans as integers', () => {
        backend.run('INSERT INTO test (name, flag) VALUES (?, ?)', [undefined, true]);
        expect(backend.queryOne('SELECT name, flag FROM test')).toEqual({ name: null, flag: 1 });
      });

      it('should lower-case non-ASCII text with unicode_lower', () => {
        expect(backend.queryOne('SELECT unicode_lower(?) AS folded', ['ÉTÉ Plans'])).toEqual({ folded: 'été plans' });
        expect(backend.queryOne('SELECT unicode_lower(NULL) AS value')).toEqual({ value: null });
      });

      it('should map SQL errors to StorageError', () => {
        expect(() => backend.query('SELEC nope')).toThrow(
          expect.objectContaining({ code: ErrorCode.DATABASE_ERROR })
        );
      });
    });

    describe('Transactions', () => {
      beforeEach(() => {
        backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, name TEXT)');
      });

      function names(): string[] {
        return backend.query<{ name: string }>('SELECT name FROM test ORDER BY id').map((r) => r.name);
      }

      it('should commit and return the callback value', () => {
        const result = backend.transaction((tx) => {
          tx.run('INSERT INTO test (name) VALUES (?)', ['alice']);
          expect(backend.inTransaction).toBe(true);
          expect(tx.depth).toBe(1);
          return 42;
        });
        expect(result).toBe(42);
        expect(names()).toEqual(['alice']);
        expect(backend.inTransaction).toBe(false);
      });

      it('should roll back every write when the callback throws', () => {
        expect(() =>
          backend.transaction(() => {
            backend.run('INSERT INTO test (name) VALUES (?)', ['alice']);
            throw new NotFoundError('Capture not found: cap-abc');
          })
        ).toThrow('Capture not found: cap-abc');
        expect(names()).toEqual([]);
        expect(backend.inTransaction).toBe(false);
      });

      it('should rethrow domain errors unchanged', () => {
        const original = new NotFoundError('Sprint not found: spr-abc');
        let caught: unknown;
        try {
          backend.transaction(() => {
            throw original;
          });
        } catch (error) {
          caught = error;
        }
        expect(caught).toBe(original);
      });

      it('should nest through savepoints', () => {
        backend.transaction(() => {
          backend.run('INSERT INTO test (name) VALUES (?)', ['outer']);
          backend.transaction((inner) => {
            expect(inner.depth).toBe(2);
            backend.run('INSERT INTO test (name) VALUES (?)', ['inner']);
          });
        });
        expect(names()).toEqual(['outer', 'inner']);
      });

      it('should roll back only the nested part when a nested call fails and is handled', () => {
        backend.transaction(() => {
          backend.run('INSERT INTO test (name) VALUES (?)', ['outer']);
          expect(() =>
            backend.transaction(() => {
              backend.run('INSERT INTO test (name) VALUES (?)', ['inner']);
              throw new Error('inner failure');
            })
          ).toThrow('inner failure');
          expect(backend.inTransaction).toBe(true);
        });
        expect(names()).toEqual(['outer']);
      });

      it('should roll back nested writes when the outer transaction fails', () => {
        expect(() =>
          backend.transaction(() => {
            backend.transaction(() => {
              backend.run('INSERT INTO test (name) VALUES (?)', ['inner']);
            });
            throw new Error('outer failure');
          })
        ).toThrow('outer failure');
        expect(names()).toEqual([]);
      });

      it('should support explicit savepoints', () => {
        backend.transaction((tx) => {
          tx.run('INSERT INTO test (name) VALUES (?)', ['kept']);
          tx.savepoint('sp_manual');
          tx.run('INSERT INTO test (name) VALUES (?)', ['dropped']);
          tx.rollbackTo('sp_manual');
          tx.release('sp_manual');
        });
        expect(names()).toEqual(['kept']);
      });

      it('should honour immediate isolation', () => {
        backend.transaction((tx) => {
          tx.run('INSERT INTO test (name) VALUES (?)', ['alice']);
        }, { isolation: 'immediate' });
        expect(names()).toEqual(['alice']);
      });
    });

    describe('Schema Management', () => {
      const migrations: Migration[] = [
        { version: 1, description: 'a', up: 'CREATE TABLE a (id TEXT)' },
        { version: 2, description: 'b', up: 'CREATE TABLE b (id TEXT)' },
      ];

      it('should get and set the schema version', () => {
        expect(backend.getSchemaVersion()).toBe(0);
        backend.setSchemaVersion(7);
        expect(backend.getSchemaVersion()).toBe(7);
      });

      it('should run migrations in version order', () => {
        const result = backend.migrate([...migrations].reverse());
        expect(result).toEqual({ fromVersion: 0, toVersion: 2, applied: [1, 2], success: true });
      });

      it('should skip applied migrations', () => {
        backend.migrate(migrations);
        const result = backend.migrate(migrations);
        expect(result).toEqual({ fromVersion: 2, toVersion: 2, applied: [], success: true });
      });
    });

    describe('Utilities', () => {
      it('should report zero records before the records table exists', () => {
        expect(backend.getRecordCount()).toBe(0);
      });

      it('should check integrity', () => {
        expect(backend.checkIntegrity()).toBe(true);
      });

      it('should optimize database', () => {
        expect(() => backend.optimize()).not.toThrow();
      });

      it('should get stats', () => {
        backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY)');
        backend.exec('CREATE INDEX idx_test ON test(id)');
        const stats = backend.getStats();
        expect(stats.fileSize).toBe(0);
        expect(stats.tableCount).toBe(1);
        expect(stats.indexCount).toBe(1);
        expect(stats.schemaVersion).toBe(0);
        expect(stats.recordCount).toBe(0);
        expect(stats.walMode).toBe(false);
      });
    });
  });

  describe('File-Based Database', () => {
    let dir: string;
    let backend: StorageBackend;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'trellis-storage-'));
      backend = new NodeStorageBackend({ path: join(dir, 'test.db') });
    });

    afterEach(() => {
      if (backend.isOpen) {
        backend.close();
      }
      rmSync(dir, { recursive: true, force: true });
    });

    it('should use WAL mode and report file size', () => {
      backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, data TEXT)');
      backend.run('INSERT INTO test (data) VALUES (?)', ['x'.repeat(1000)]);
      const stats = backend.getStats();
      expect(stats.walMode).toBe(true);
      expect(stats.fileSize).toBeGreaterThan(0);
    });

    it('should persist across connections', () => {
      backend.exec('CREATE TABLE test (name TEXT)');
      backend.run('INSERT INTO test (name) VALUES (?)', ['alice']);
      backend.close();

      const reopened = new NodeStorageBackend({ path: join(dir, 'test.db') });
      try {
        expect(reopened.query('SELECT name FROM test')).toEqual([{ name: 'alice' }]);
      } finally {
        reopened.close();
      }
    });

    it('should fail to open an unreachable path', () => {
      expect(() => new NodeStorageBackend({ path: join(dir, 'missing', 'nested', 'x.db') })).toThrow(
        'Failed to open database at'
      );
    });
  });

  describe('Factory Function', () => {
    it('should create backend via factory', () => {
      const backend = createNodeStorage({ path: ':memory:' });
      expect(backend).toBeInstanceOf(NodeStorageBackend);
      backend.close();
    });
  });
});
