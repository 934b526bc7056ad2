/**
 * Snapshot Service - whole-store JSONL export and restore
 *
 * Restore replaces the entire store in one transaction. Every line is
 * re-validated, the integrity audit must come back clean, and the store
 * clock is advanced past the newest restored timestamp.
 */

import { RecordKind, importFailed, isTrellisError, type Clock, type Timestamp } from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import type { IntegrityAuditor } from '../audit/integrity.js';
import type { AnyRecord, RecordTable } from '../services/record-table.js';
import type { Setting, SettingsService } from '../services/settings.js';
import { createLogger } from '../utils/logger.js';
import { parseSnapshotLine, serializeHeader, serializeRecord, serializeSetting } from './serialization.js';
import { RECORD_KIND_PRIORITY, type ExportResult, type ImportResult, type SnapshotLine } from './types.js';

const logger = createLogger('snapshot');

export interface SnapshotServiceDeps {
  backend: StorageBackend;
  table: RecordTable;
  settings: SettingsService;
  auditor: IntegrityAuditor;
  clock: Clock;
}

function compareRecords(a: AnyRecord, b: AnyRecord): number {
  const byKind = RECORD_KIND_PRIORITY[a.kind] - RECORD_KIND_PRIORITY[b.kind];
  if (byKind !== 0) return byKind;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class SnapshotService {
  constructor(private readonly deps: SnapshotServiceDeps) {}

  /**
   * Serializes every record and setting
   */
  export(): ExportResult {
    const { table, settings } = this.deps;
    const records: AnyRecord[] = [
      ...table.all(RecordKind.WORKSPACE),
      ...table.all(RecordKind.TEMPLATE),
      ...table.all(RecordKind.CAPTURE),
      ...table.all(RecordKind.SPRINT),
      ...table.all(RecordKind.DOCUMENT),
    ].sort(compareRecords);
    const stored = settings.listSettings();
    const exportedAt = new Date().toISOString();

    const lines = [
      serializeHeader({ exportedAt, records: records.length }),
      ...stored.map(serializeSetting),
      ...records.map(serializeRecord),
    ];
    logger.info(`Exported ${records.length} record(s) and ${stored.length} setting(s)`);
    return { content: `${lines.join('\n')}\n`, records: records.length, settings: stored.length, exportedAt };
  }

  /**
   * Replaces the store with the snapshot's contents
   *
   * @throws StorageError IMPORT_FAILED for a malformed line, a duplicate id,
   *   a dangling sprint member or any integrity finding; nothing is changed
   */
  import(content: string): ImportResult {
    const { backend, table, auditor, clock } = this.deps;
    const parsed = parseSnapshot(content);

    const result = backend.transaction(() => {
      backend.run('DELETE FROM sprint_captures');
      backend.run('DELETE FROM records');
      backend.run('DELETE FROM settings');

      for (const setting of parsed.settings) {
        backend.run('INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)', [
          setting.key,
          JSON.stringify(setting.value),
          setting.updatedAt,
        ]);
      }
      for (const record of parsed.records) {
        table.insert(record);
      }
      for (const record of parsed.records) {
        if (record.kind !== RecordKind.SPRINT) continue;
        for (const captureId of record.captureIds) {
          if (!parsed.captureIds.has(captureId)) {
            throw importFailed(`sprint ${record.id} lists unknown capture ${captureId}`, undefined, {
              recordId: record.id,
              captureId,
            });
          }
          table.addSprintMember(record.id, captureId, record.updatedAt);
        }
      }

      const report = auditor.audit();
      if (!report.valid) {
        throw importFailed(`${report.findings.length} integrity finding(s)`, undefined, {
          findings: report.findings.map((finding) => `${finding.kind}: ${finding.message}`),
        });
      }

      const byKind: Record<RecordKind, number> = { capture: 0, sprint: 0, workspace: 0, document: 0, template: 0 };
      for (const record of parsed.records) {
        byKind[record.kind]++;
      }
      return { records: parsed.records.length, settings: parsed.settings.length, byKind };
    });

    if (parsed.latest !== undefined) {
      clock.advanceTo(parsed.latest);
    }
    logger.info(`Restored ${result.records} record(s) and ${result.settings} setting(s)`);
    return result;
  }
}

export interface ParsedSnapshot {
  records: AnyRecord[];
  settings: Setting[];
  captureIds: Set<string>;
  latest?: Timestamp;
}

/**
 * Parses and checks a whole snapshot before anything is written
 */
export function parseSnapshot(content: string): ParsedSnapshot {
  const records: AnyRecord[] = [];
  const settings: Setting[] = [];
  const ids = new Set<string>();
  const captureIds = new Set<string>();
  const settingKeys = new Set<string>();
  let latest: Timestamp | undefined;
  let expectedRecords: number | undefined;

  const lines = content.split('\n');
  for (let index = 0; index < lines.length; index++) {
    const raw = lines[index]?.trim() ?? '';
    if (raw.length === 0) continue;
    const lineNumber = index + 1;

    let line: SnapshotLine;
    try {
      line = parseSnapshotLine(raw);
    } catch (error) {
      if (!isTrellisError(error)) throw error;
      throw importFailed(`line ${lineNumber}: ${error.message}`, error, { line: lineNumber, code: error.code });
    }

    if (expectedRecords === undefined) {
      if (line.type !== 'header') {
        throw importFailed(`line ${lineNumber}: snapshot must start with a header`, undefined, { line: lineNumber });
      }
      expectedRecords = line.records;
      continue;
    }

    switch (line.type) {
      case 'header':
        throw importFailed(`line ${lineNumber}: unexpected second header`, undefined, { line: lineNumber });
      case 'setting':
        if (settingKeys.has(line.setting.key)) {
          throw importFailed(`line ${lineNumber}: duplicate setting ${line.setting.key}`, undefined, {
            line: lineNumber,
          });
        }
        settingKeys.add(line.setting.key);
        settings.push(line.setting);
        break;
      case 'record': {
        const { record } = line;
        if (ids.has(record.id)) {
          throw importFailed(`line ${lineNumber}: duplicate record id ${record.id}`, undefined, {
            line: lineNumber,
            recordId: record.id,
          });
        }
        ids.add(record.id);
        if (record.kind === RecordKind.CAPTURE) {
          captureIds.add(record.id);
        }
        if (latest === undefined || record.updatedAt > latest) {
          latest = record.updatedAt;
        }
        records.push(record);
        break;
      }
    }
  }

  if (expectedRecords === undefined) {
    throw importFailed('snapshot is empty');
  }
  if (records.length !== expectedRecords) {
    throw importFailed(`header announces ${expectedRecords} record(s), found ${records.length}`, undefined, {
      expected: expectedRecords,
      actual: records.length,
    });
  }
  return { records, settings, captureIds, ...(latest !== undefined && { latest }) };
}
