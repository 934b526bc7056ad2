/**
 * Record Table - row mapping over the shared `records` table
 *
 * The kind, owner and timestamps live in columns; every other property is a
 * JSON document in `data`. Sprint membership is read from `sprint_captures`
 * and never stored in the sprint document.
 */

import {
  RecordKind,
  asPrincipalId,
  asRecordId,
  databaseError,
  generateId,
  getEstimate,
  type BaseRecord,
  type Capture,
  type Clock,
  type Document,
  type NewRecordContext,
  type PrincipalId,
  type RecordId,
  type Sprint,
  type Template,
  type Timestamp,
  type Workspace,
} from '@trellis/core';
import type { Row, StorageBackend } from '@trellis/storage';

// ============================================================================
// Types
// ============================================================================

export type AnyRecord = Capture | Sprint | Workspace | Document | Template;

/**
 * Record type per kind discriminator
 */
export interface RecordByKind {
  capture: Capture;
  sprint: Sprint;
  workspace: Workspace;
  document: Document;
  template: Template;
}

export interface RecordRow extends Row {
  id: string;
  kind: string;
  owner: string;
  data: string;
  created_at: string;
  updated_at: string;
}

interface MembershipRow extends Row {
  capture_id: string;
}

/** Properties kept in columns or side tables rather than in `data` */
const NON_DATA_KEYS = new Set(['id', 'kind', 'owner', 'createdAt', 'updatedAt', 'captureIds']);

// ============================================================================
// Serialization
// ============================================================================

export function serializeRecordData(record: BaseRecord): string {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!NON_DATA_KEYS.has(key) && value !== undefined) {
      data[key] = value;
    }
  }
  return JSON.stringify(data);
}

function deserializeRecord<T extends BaseRecord>(row: RecordRow): T {
  let data: Record<string, unknown>;
  try {
    data = JSON.parse(row.data);
  } catch (error) {
    throw databaseError(
      `Corrupt data for record ${row.id}`,
      error instanceof Error ? error : undefined,
      { recordId: row.id }
    );
  }

  return {
    ...data,
    id: asRecordId(row.id),
    kind: row.kind,
    owner: asPrincipalId(row.owner),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  } as T;
}

// ============================================================================
// Record Table
// ============================================================================

export class RecordTable {
  constructor(
    private readonly backend: StorageBackend,
    private readonly clock: Clock
  ) {}

  /** Next store timestamp */
  now(): Timestamp {
    return this.clock.now();
  }

  /**
   * Allocates an id and timestamp for a new record of the given owner
   */
  newRecordContext(kind: RecordKind, identifier: string, owner: PrincipalId): NewRecordContext {
    const now = this.clock.now();
    const id = generateId(
      { kind, identifier, owner, timestamp: new Date(now) },
      {
        recordCount: this.backend.getRecordCount(),
        checkCollision: (candidate) => this.exists(candidate),
      }
    );
    return { id, owner, now };
  }

  exists(id: string): boolean {
    return this.backend.queryOne('SELECT 1 AS found FROM records WHERE id = ?', [id]) !== undefined;
  }

  /**
   * Loads a record of the given kind; undefined for a missing id or another kind
   */
  get<K extends RecordKind>(kind: K, id: string): RecordByKind[K] | undefined {
    const row = this.backend.queryOne<RecordRow>('SELECT * FROM records WHERE id = ? AND kind = ?', [id, kind]);
    return row ? this.hydrate<K>(row) : undefined;
  }

  /**
   * Maps a row to its record, attaching sprint membership
   */
  hydrate<K extends RecordKind>(row: RecordRow): RecordByKind[K] {
    const record = deserializeRecord<RecordByKind[K]>(row);
    if (row.kind === RecordKind.SPRINT) {
      return { ...record, captureIds: this.getSprintCaptureIds(row.id) };
    }
    return record;
  }

  /**
   * Runs a query over `records` and hydrates each row
   */
  select<K extends RecordKind>(kind: K, sql: string, params: unknown[]): RecordByKind[K][] {
    return this.backend.query<RecordRow>(sql, params).map((row) => {
      if (row.kind !== kind) {
        throw databaseError(`Expected ${kind} record, found ${row.kind}`, undefined, { recordId: row.id });
      }
      return this.hydrate<K>(row);
    });
  }

  /**
   * Every record of a kind in listing order
   */
  all<K extends RecordKind>(kind: K): RecordByKind[K][] {
    return this.select(kind, 'SELECT * FROM records WHERE kind = ? ORDER BY created_at ASC, id ASC', [kind]);
  }

  insert(record: AnyRecord): void {
    this.backend.run(
      'INSERT INTO records (id, kind, owner, data, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)',
      [record.id, record.kind, record.owner, serializeRecordData(record), record.createdAt, record.updatedAt]
    );
  }

  /**
   * Rewrites the data and modification time of an existing record
   */
  update(record: AnyRecord): void {
    const result = this.backend.run('UPDATE records SET data = ?, updated_at = ? WHERE id = ? AND kind = ?', [
      serializeRecordData(record),
      record.updatedAt,
      record.id,
      record.kind,
    ]);
    if (result.changes === 0) {
      throw databaseError(`Record ${record.id} vanished during update`, undefined, { recordId: record.id });
    }
  }

  /**
   * Sets only the modification time of a record
   */
  touch(id: string, updatedAt: Timestamp): void {
    this.backend.run('UPDATE records SET updated_at = ? WHERE id = ?', [updatedAt, id]);
  }

  delete(id: string): boolean {
    return this.backend.run('DELETE FROM records WHERE id = ?', [id]).changes > 0;
  }

  count(kind: RecordKind, owner?: PrincipalId): number {
    const row = owner === undefined
      ? this.backend.queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM records WHERE kind = ?', [kind])
      : this.backend.queryOne<{ count: number }>(
          'SELECT COUNT(*) AS count FROM records WHERE kind = ? AND owner = ?',
          [kind, owner]
        );
    return row?.count ?? 0;
  }

  // --------------------------------------------------------------------------
  // Sprint Membership
  // --------------------------------------------------------------------------

  getSprintCaptureIds(sprintId: string): RecordId[] {
    return this.backend
      .query<MembershipRow>(
        'SELECT capture_id FROM sprint_captures WHERE sprint_id = ? ORDER BY position ASC',
        [sprintId]
      )
      .map((row) => asRecordId(row.capture_id));
  }

  /**
   * Sprints that list the capture as a member
   */
  getSprintsContaining(captureId: string): Sprint[] {
    return this.select(
      RecordKind.SPRINT,
      `SELECT r.* FROM records r
       JOIN sprint_captures sc ON sc.sprint_id = r.id
       WHERE sc.capture_id = ? AND r.kind = 'sprint'
       ORDER BY r.created_at ASC, r.id ASC`,
      [captureId]
    );
  }

  isSprintMember(sprintId: string, captureId: string): boolean {
    return (
      this.backend.queryOne('SELECT 1 AS found FROM sprint_captures WHERE sprint_id = ? AND capture_id = ?', [
        sprintId,
        captureId,
      ]) !== undefined
    );
  }

  addSprintMember(sprintId: string, captureId: string, addedAt: Timestamp): void {
    const row = this.backend.queryOne<{ next: number }>(
      'SELECT COALESCE(MAX(position), -1) + 1 AS next FROM sprint_captures WHERE sprint_id = ?',
      [sprintId]
    );
    this.backend.run(
      'INSERT INTO sprint_captures (sprint_id, capture_id, position, added_at) VALUES (?, ?, ?, ?)',
      [sprintId, captureId, row?.next ?? 0, addedAt]
    );
  }

  /**
   * Sum of member estimates; a missing estimate counts as 0
   */
  getSprintLoad(sprintId: string): number {
    return this.select(
      RecordKind.CAPTURE,
      `SELECT r.* FROM records r
       JOIN sprint_captures sc ON sc.capture_id = r.id
       WHERE sc.sprint_id = ? AND r.kind = 'capture'`,
      [sprintId]
    ).reduce((load, capture) => load + getEstimate(capture.fields), 0);
  }

  removeSprintMember(sprintId: string, captureId: string): boolean {
    return (
      this.backend.run('DELETE FROM sprint_captures WHERE sprint_id = ? AND capture_id = ?', [sprintId, captureId])
        .changes > 0
    );
  }
}
