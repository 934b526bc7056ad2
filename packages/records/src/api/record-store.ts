/**
 * Record Store - wires the stores over one storage backend
 */

import { RecordKind, createClock, type Clock } from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import { IntegrityAuditor, type AuditReport, type RepairResult } from '../audit/integrity.js';
import { getDefaultConfig } from '../config/defaults.js';
import { QueryEngine } from '../query/query-engine.js';
import { CaptureStore } from '../services/capture-store.js';
import type { StoreContext } from '../services/context.js';
import { DocumentStore } from '../services/document-store.js';
import { RecordTable } from '../services/record-table.js';
import { createSettingsService, type SettingsService } from '../services/settings.js';
import { SprintStore } from '../services/sprint-store.js';
import { TemplateStore } from '../services/template-store.js';
import { WorkspaceStore } from '../services/workspace-store.js';
import { SnapshotService } from '../sync/snapshot.js';
import type { ExportResult, ImportResult } from '../sync/types.js';
import type { HealthStatus, RecordStore, RecordStoreOptions, StoreStats } from './types.js';

interface CountRow {
  [key: string]: unknown;
  count: number;
}

interface LatestRow {
  [key: string]: unknown;
  latest: string | null;
}

export class RecordStoreImpl implements RecordStore {
  readonly captures: CaptureStore;
  readonly sprints: SprintStore;
  readonly workspaces: WorkspaceStore;
  readonly documents: DocumentStore;
  readonly templates: TemplateStore;
  readonly settings: SettingsService;

  private readonly backend: StorageBackend;
  private readonly clock: Clock;
  private readonly table: RecordTable;
  private readonly auditor: IntegrityAuditor;
  private readonly snapshots: SnapshotService;

  constructor(options: RecordStoreOptions) {
    const config = options.config ?? getDefaultConfig();
    this.backend = options.backend;
    this.clock = options.clock ?? createClock();
    this.table = new RecordTable(this.backend, this.clock);

    // A reopened database may hold timestamps ahead of the wall clock
    const stored = this.backend.queryOne<LatestRow>('SELECT MAX(updated_at) AS latest FROM records');
    if (stored?.latest) {
      this.clock.advanceTo(stored.latest);
    }

    const ctx: StoreContext = {
      backend: this.backend,
      table: this.table,
      query: new QueryEngine(this.backend, this.table, config.query),
      maxDepth: config.hierarchy.maxDepth,
    };
    this.captures = new CaptureStore(ctx);
    this.sprints = new SprintStore(ctx);
    this.workspaces = new WorkspaceStore(ctx);
    this.documents = new DocumentStore(ctx);
    this.templates = new TemplateStore(ctx);
    this.settings = createSettingsService(this.backend, {
      controllers: config.identity.controllers,
      ...(config.identity.authService !== undefined && { authService: config.identity.authService }),
    });

    this.auditor = new IntegrityAuditor(this.backend, this.table, config.hierarchy.maxDepth);
    this.snapshots = new SnapshotService({
      backend: this.backend,
      table: this.table,
      settings: this.settings,
      auditor: this.auditor,
      clock: this.clock,
    });
  }

  health(): HealthStatus {
    this.backend.queryOne('SELECT 1 AS ok');
    return 'ok';
  }

  stats(): StoreStats {
    const users = this.backend.queryOne<CountRow>('SELECT COUNT(DISTINCT owner) AS count FROM records');
    return {
      totalCaptures: this.table.count(RecordKind.CAPTURE),
      totalSprints: this.table.count(RecordKind.SPRINT),
      totalWorkspaces: this.table.count(RecordKind.WORKSPACE),
      totalDocuments: this.table.count(RecordKind.DOCUMENT),
      totalTemplates: this.table.count(RecordKind.TEMPLATE),
      totalUsers: users?.count ?? 0,
      databaseSize: this.backend.getStats().fileSize,
      computedAt: new Date().toISOString(),
    };
  }

  audit(): AuditReport {
    return this.auditor.audit();
  }

  repair(): RepairResult {
    return this.auditor.repair();
  }

  exportSnapshot(): ExportResult {
    return this.snapshots.export();
  }

  importSnapshot(content: string): ImportResult {
    return this.snapshots.import(content);
  }

  close(): void {
    this.backend.close();
  }
}

/**
 * Create a record store over an open, migrated backend
 *
 * @example
 * ```typescript
 * import { openStorage } from '@trellis/storage';
 * import { createRecordStore } from '@trellis/records';
 *
 * const store = createRecordStore({ backend: openStorage({ path: ':memory:' }) });
 * const idea = store.captures.create('alice', { captureType: 'Idea', title: 'Offline mode' });
 * ```
 */
export function createRecordStore(options: RecordStoreOptions): RecordStore {
  return new RecordStoreImpl(options);
}
