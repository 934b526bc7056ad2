/**
 * Tests for Schema Management
 *
 * Tests schema initialization, migrations, validation, and introspection.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode } from '@trellis/core';
import { createStorage, openStorage } from './create-backend.js';
import type { StorageBackend } from './backend.js';
import {
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

const NOW = '2025-01-01T00:00:00.000Z';

function insertRecord(backend: StorageBackend, id: string, kind: string): void {
  backend.run(
    'INSERT INTO records (id, kind, owner, data, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)',
    [id, kind, 'alice', '{}', NOW, NOW]
  );
}

describe('Schema Management', () => {
  let backend: StorageBackend;

  beforeEach(() => {
    backend = createStorage({ path: ':memory:' });
  });

  afterEach(() => {
    if (backend.isOpen) {
      backend.close();
    }
  });

  describe('Schema Constants', () => {
    it('should have migrations in ascending version order starting at 1', () => {
      expect(MIGRATIONS[0]?.version).toBe(1);
      for (let i = 1; i < MIGRATIONS.length; i++) {
        expect(MIGRATIONS[i]?.version).toBe((MIGRATIONS[i - 1]?.version ?? 0) + 1);
      }
    });

    it('should end at CURRENT_SCHEMA_VERSION', () => {
      expect(MIGRATIONS[MIGRATIONS.length - 1]?.version).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should list the expected tables', () => {
      expect([...EXPECTED_TABLES]).toEqual(['records', 'sprint_captures', 'settings']);
    });
  });

  describe('initializeSchema', () => {
    it('should apply every migration on a fresh database', () => {
      const result = initializeSchema(backend);
      expect(result.fromVersion).toBe(0);
      expect(result.toVersion).toBe(CURRENT_SCHEMA_VERSION);
      expect(result.applied).toEqual([1, 2]);
      expect(result.success).toBe(true);
    });

    it('should be idempotent', () => {
      initializeSchema(backend);
      const second = initializeSchema(backend);
      expect(second.applied).toEqual([]);
      expect(second.fromVersion).toBe(CURRENT_SCHEMA_VERSION);
      expect(second.toVersion).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should apply only pending migrations', () => {
      backend.migrate([...MIGRATIONS].slice(0, 1));
      expect(getSchemaVersion(backend)).toBe(1);
      expect(getPendingMigrations(backend).map((m) => m.version)).toEqual([2]);

      const result = initializeSchema(backend);
      expect(result.applied).toEqual([2]);
    });

    it('should report a failing migration with MIGRATION_FAILED and keep earlier versions', () => {
      expect(() =>
        backend.migrate([
          { version: 1, description: 'ok', up: 'CREATE TABLE a (x TEXT);' },
          { version: 2, description: 'broken', up: 'CREATE TABLE a (x TEXT);' },
        ])
      ).toThrow(expect.objectContaining({ code: ErrorCode.MIGRATION_FAILED }));
      expect(backend.getSchemaVersion()).toBe(1);
    });
  });

  describe('version helpers', () => {
    it('should report an uninitialized database', () => {
      expect(getSchemaVersion(backend)).toBe(0);
      expect(isSchemaUpToDate(backend)).toBe(false);
      expect(getPendingMigrations(backend)).toHaveLength(MIGRATIONS.length);
    });

    it('should report an initialized database', () => {
      initializeSchema(backend);
      expect(getSchemaVersion(backend)).toBe(CURRENT_SCHEMA_VERSION);
      expect(isSchemaUpToDate(backend)).toBe(true);
      expect(getPendingMigrations(backend)).toEqual([]);
    });
  });

  describe('validateSchema', () => {
    it('should report missing tables for an uninitialized database', () => {
      const result = validateSchema(backend);
      expect(result.valid).toBe(false);
      expect(result.missingTables).toEqual(['records', 'sprint_captures', 'settings']);
    });

    it('should report valid for an initialized database', () => {
      initializeSchema(backend);
      const result = validateSchema(backend);
      expect(result.valid).toBe(true);
      expect(result.missingTables).toEqual([]);
      expect(result.extraTables).toEqual([]);
    });

    it('should list unexpected tables', () => {
      initializeSchema(backend);
      backend.exec('CREATE TABLE scratch (x TEXT)');
      expect(validateSchema(backend).extraTables).toEqual(['scratch']);
    });
  });

  describe('resetSchema', () => {
    it('should drop every table and reset the version', () => {
      initializeSchema(backend);
      resetSchema(backend);
      expect(getSchemaVersion(backend)).toBe(0);
      expect(validateSchema(backend).missingTables).toHaveLength(EXPECTED_TABLES.length);
    });
  });

  describe('records table', () => {
    beforeEach(() => {
      initializeSchema(backend);
    });

    it('should have the expected columns', () => {
      const columns = getTableColumns(backend, 'records');
      expect(columns.map((c) => c.name)).toEqual([
        'id',
        'kind',
        'owner',
        'data',
        'created_at',
        'updated_at',
      ]);
      expect(columns.find((c) => c.name === 'id')?.pk).toBe(true);
      expect(columns.filter((c) => c.name !== 'id').every((c) => c.notnull)).toBe(true);
    });

    it('should have listing and relationship indexes', () => {
      expect(getTableIndexes(backend, 'records').sort()).toEqual([
        'idx_records_kind',
        'idx_records_owner_kind',
        'idx_records_parent',
        'idx_records_workspace',
      ]);
    });

    it('should reject unknown kinds', () => {
      expect(() => insertRecord(backend, 'x-1', 'element')).toThrow(
        expect.objectContaining({ code: ErrorCode.DANGLING_REFERENCE })
      );
    });

    it('should accept every record kind', () => {
      insertRecord(backend, 'cap-1', 'capture');
      insertRecord(backend, 'spr-1', 'sprint');
      insertRecord(backend, 'wsp-1', 'workspace');
      insertRecord(backend, 'doc-1', 'document');
      insertRecord(backend, 'tpl-1', 'template');
      expect(backend.getRecordCount()).toBe(5);
    });

    it('should reject duplicate ids with ALREADY_EXISTS', () => {
      insertRecord(backend, 'cap-1', 'capture');
      expect(() => insertRecord(backend, 'cap-1', 'capture')).toThrow(
        expect.objectContaining({ code: ErrorCode.ALREADY_EXISTS })
      );
    });
  });

  describe('sprint_captures table', () => {
    beforeEach(() => {
      initializeSchema(backend);
      insertRecord(backend, 'spr-1', 'sprint');
      insertRecord(backend, 'cap-1', 'capture');
    });

    function assign(sprintId: string, captureId: string): void {
      backend.run(
        'INSERT INTO sprint_captures (sprint_id, capture_id, position, added_at) VALUES (?, ?, ?, ?)',
        [sprintId, captureId, 0, NOW]
      );
    }

    it('should have a composite primary key', () => {
      const pk = getTableColumns(backend, 'sprint_captures').filter((c) => c.pk).map((c) => c.name);
      expect(pk).toEqual(['sprint_id', 'capture_id']);
    });

    it('should reject a capture assigned twice', () => {
      assign('spr-1', 'cap-1');
      expect(() => assign('spr-1', 'cap-1')).toThrow(
        expect.objectContaining({ code: ErrorCode.ALREADY_EXISTS })
      );
    });

    it('should reject unknown records', () => {
      expect(() => assign('spr-1', 'cap-missing')).toThrow(
        expect.objectContaining({ code: ErrorCode.DANGLING_REFERENCE })
      );
    });

    it('should cascade when the capture is deleted', () => {
      assign('spr-1', 'cap-1');
      backend.run('DELETE FROM records WHERE id = ?', ['cap-1']);
      expect(backend.query('SELECT * FROM sprint_captures')).toEqual([]);
    });

    it('should cascade when the sprint is deleted', () => {
      assign('spr-1', 'cap-1');
      backend.run('DELETE FROM records WHERE id = ?', ['spr-1']);
      expect(backend.query('SELECT * FROM sprint_captures')).toEqual([]);
    });
  });

  describe('openStorage', () => {
    it('should return a migrated backend', () => {
      const opened = openStorage({ path: ':memory:' });
      try {
        expect(isSchemaUpToDate(opened)).toBe(true);
      } finally {
        opened.close();
      }
    });
  });
});
