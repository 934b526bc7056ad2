/**
 * Record Store API Type Definitions
 *
 * The record store is the programmatic surface of Trellis: one object per
 * store, each exposing the operations of its record kind, plus
 * administration (health, stats, audit, snapshots).
 */

import type { Clock, Timestamp } from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import type { AuditReport, RepairResult } from '../audit/integrity.js';
import type { Configuration } from '../config/types.js';
import type { CaptureStore } from '../services/capture-store.js';
import type { DocumentStore } from '../services/document-store.js';
import type { SettingsService } from '../services/settings.js';
import type { SprintStore } from '../services/sprint-store.js';
import type { TemplateStore } from '../services/template-store.js';
import type { WorkspaceStore } from '../services/workspace-store.js';
import type { ExportResult, ImportResult } from '../sync/types.js';

/**
 * Dependencies for createRecordStore
 */
export interface RecordStoreOptions {
  backend: StorageBackend;
  /** Default: a monotonic clock over Date.now */
  clock?: Clock;
  /** Default: built-in defaults */
  config?: Configuration;
}

/**
 * Record counts across all principals
 */
export interface StoreStats {
  totalCaptures: number;
  totalSprints: number;
  totalWorkspaces: number;
  totalDocuments: number;
  totalTemplates: number;
  /** Distinct principals owning at least one record */
  totalUsers: number;
  /** Database file size in bytes (0 in memory) */
  databaseSize: number;
  computedAt: Timestamp;
}

export type HealthStatus = 'ok';

export interface RecordStore {
  readonly captures: CaptureStore;
  readonly sprints: SprintStore;
  readonly workspaces: WorkspaceStore;
  readonly documents: DocumentStore;
  readonly templates: TemplateStore;
  readonly settings: SettingsService;

  /** Liveness probe; throws when the database cannot be queried */
  health(): HealthStatus;

  stats(): StoreStats;

  /** Integrity findings across all principals */
  audit(): AuditReport;

  repair(): RepairResult;

  exportSnapshot(): ExportResult;

  /** Replaces the whole store with a snapshot */
  importSnapshot(content: string): ImportResult;

  close(): void;
}
