/**
 * Snapshot Types - JSONL export/restore format
 *
 * A snapshot is one header line followed by one line per setting and one
 * line per record. Records are written parents-first: workspaces, templates,
 * captures, sprints, documents.
 */

import type { RecordKind, Timestamp } from '@trellis/core';
import type { AnyRecord } from '../services/record-table.js';
import type { Setting } from '../services/settings.js';

export const SNAPSHOT_FORMAT = 'trellis-snapshot';

export const SNAPSHOT_VERSION = 1;

export interface SnapshotHeader {
  type: 'header';
  format: typeof SNAPSHOT_FORMAT;
  version: number;
  exportedAt: Timestamp;
  /** Record lines that follow */
  records: number;
}

export interface SettingLine {
  type: 'setting';
  setting: Setting;
}

export interface RecordLine {
  type: 'record';
  /** Sprints carry their ordered captureIds */
  record: AnyRecord;
}

export type SnapshotLine = SnapshotHeader | SettingLine | RecordLine;

/**
 * Export ordering: lower first, so references point backwards
 */
export const RECORD_KIND_PRIORITY: Record<RecordKind, number> = {
  workspace: 0,
  template: 1,
  capture: 2,
  sprint: 3,
  document: 4,
};

export interface ExportResult {
  content: string;
  records: number;
  settings: number;
  exportedAt: Timestamp;
}

export interface ImportResult {
  records: number;
  settings: number;
  /** Records per kind */
  byKind: Record<RecordKind, number>;
}
