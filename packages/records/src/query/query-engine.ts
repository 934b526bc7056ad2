/**
 * Query Engine - filtered "list mine" queries
 *
 * The owner predicate is always the first condition and cannot be removed
 * by any filter; every other criterion is conjunctive. Results are ordered by
 * createdAt, then id, and paged by offset/limit.
 */

import {
  ErrorCode,
  RecordKind,
  ValidationError,
  dateValueToMillis,
  validateCaptureStatus,
  validateCaptureType,
  validateDateValue,
  validatePriority,
  validateRecordId,
  type Capture,
  type CaptureStatus,
  type CaptureType,
  type PrincipalId,
  type Priority,
  type RecordId,
} from '@trellis/core';
import { UNICODE_LOWER_FUNCTION, type StorageBackend } from '@trellis/storage';
import type { RecordByKind, RecordTable } from '../services/record-table.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('query-engine');

// ============================================================================
// Types
// ============================================================================

export interface PageOptions {
  offset?: number;
  limit?: number;
}

/**
 * One page of results
 */
export interface Page<T> {
  items: T[];
  /** Matches across all pages */
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

export interface QueryLimits {
  defaultLimit: number;
  maxLimit: number;
}

/**
 * Capture filter. Set-valued criteria accept one value or a list.
 */
export interface CaptureFilter extends PageOptions {
  captureType?: CaptureType | CaptureType[];
  status?: CaptureStatus | CaptureStatus[];
  priority?: Priority | Priority[];
  /** null selects root captures */
  parentId?: RecordId | null;
  sprintId?: RecordId;
  workspaceId?: RecordId;
  /** Every listed label must be present */
  labels?: string[];
  /** Strictly after; date or timestamp */
  createdAfter?: string;
  /** Strictly before; date or timestamp */
  createdBefore?: string;
  /** dueDate strictly after; captures without a dueDate never match */
  dueAfter?: string;
  /** dueDate strictly before */
  dueBefore?: string;
  /** Case-insensitive substring of the title */
  titleContains?: string;
}

/**
 * SQL fragment with its bound parameters
 */
export interface WhereClause {
  conditions: string[];
  params: unknown[];
}

// ============================================================================
// Pagination
// ============================================================================

/**
 * Resolves offset and limit; a limit above the maximum is clamped
 *
 * @throws ValidationError for negative or fractional values
 */
export function normalizePage(options: PageOptions, limits: QueryLimits): { offset: number; limit: number } {
  const offset = options.offset ?? 0;
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset must be a non-negative integer', ErrorCode.INVALID_INPUT, {
      field: 'offset',
      value: offset,
      expected: '>= 0',
    });
  }
  const limit = options.limit ?? limits.defaultLimit;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer', ErrorCode.INVALID_INPUT, {
      field: 'limit',
      value: limit,
      expected: `1..${limits.maxLimit}`,
    });
  }
  return { offset, limit: Math.min(limit, limits.maxLimit) };
}

// ============================================================================
// Filter Compilation
// ============================================================================

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

function addSetCondition(clause: WhereClause, expression: string, values: readonly string[]): void {
  if (values.length === 0) {
    // An empty allowed set admits nothing
    clause.conditions.push('0 = 1');
    return;
  }
  clause.conditions.push(`${expression} IN (${values.map(() => '?').join(', ')})`);
  clause.params.push(...values);
}

/**
 * Normalizes a date bound to a full ISO 8601 timestamp
 */
function toTimestampBound(value: unknown, field: string): string {
  return new Date(dateValueToMillis(validateDateValue(value, field))).toISOString();
}

/**
 * Compiles a capture filter into conditions after the owner predicate
 */
export function compileCaptureFilter(filter: CaptureFilter): WhereClause {
  const clause: WhereClause = { conditions: [], params: [] };

  if (filter.captureType !== undefined) {
    addSetCondition(clause, "json_extract(r.data, '$.captureType')", toList(filter.captureType).map(validateCaptureType));
  }
  if (filter.status !== undefined) {
    addSetCondition(clause, "json_extract(r.data, '$.status')", toList(filter.status).map(validateCaptureStatus));
  }
  if (filter.priority !== undefined) {
    addSetCondition(clause, "json_extract(r.data, '$.priority')", toList(filter.priority).map(validatePriority));
  }

  if (filter.parentId === null) {
    clause.conditions.push("json_extract(r.data, '$.parentId') IS NULL");
  } else if (filter.parentId !== undefined) {
    clause.conditions.push("json_extract(r.data, '$.parentId') = ?");
    clause.params.push(validateRecordId(filter.parentId, 'parentId', RecordKind.CAPTURE));
  }

  if (filter.sprintId !== undefined) {
    clause.conditions.push(
      'EXISTS (SELECT 1 FROM sprint_captures sc WHERE sc.sprint_id = ? AND sc.capture_id = r.id)'
    );
    clause.params.push(validateRecordId(filter.sprintId, 'sprintId', RecordKind.SPRINT));
  }

  if (filter.workspaceId !== undefined) {
    clause.conditions.push("json_extract(r.data, '$.workspaceId') = ?");
    clause.params.push(validateRecordId(filter.workspaceId, 'workspaceId', RecordKind.WORKSPACE));
  }

  for (const label of filter.labels ?? []) {
    clause.conditions.push(
      "EXISTS (SELECT 1 FROM json_each(r.data, '$.fields.labels.value') l WHERE l.value = ?)"
    );
    clause.params.push(label);
  }

  if (filter.createdAfter !== undefined) {
    clause.conditions.push('r.created_at > ?');
    clause.params.push(toTimestampBound(filter.createdAfter, 'createdAfter'));
  }
  if (filter.createdBefore !== undefined) {
    clause.conditions.push('r.created_at < ?');
    clause.params.push(toTimestampBound(filter.createdBefore, 'createdBefore'));
  }

  const dueDate = "julianday(json_extract(r.data, '$.fields.dueDate.value'))";
  if (filter.dueAfter !== undefined) {
    clause.conditions.push(`${dueDate} > julianday(?)`);
    clause.params.push(toTimestampBound(filter.dueAfter, 'dueAfter'));
  }
  if (filter.dueBefore !== undefined) {
    clause.conditions.push(`${dueDate} < julianday(?)`);
    clause.params.push(toTimestampBound(filter.dueBefore, 'dueBefore'));
  }

  if (filter.titleContains !== undefined && filter.titleContains.length > 0) {
    clause.conditions.push(
      `instr(${UNICODE_LOWER_FUNCTION}(json_extract(r.data, '$.title')), ${UNICODE_LOWER_FUNCTION}(?)) > 0`
    );
    clause.params.push(filter.titleContains);
  }

  return clause;
}

// ============================================================================
// Query Engine
// ============================================================================

export class QueryEngine {
  constructor(
    private readonly backend: StorageBackend,
    private readonly table: RecordTable,
    private readonly limits: QueryLimits
  ) {}

  /**
   * Lists records of one kind owned by the caller, narrowed by extra conditions
   */
  listOwned<K extends RecordKind>(
    kind: K,
    owner: PrincipalId,
    options: PageOptions = {},
    extra: WhereClause = { conditions: [], params: [] }
  ): Page<RecordByKind[K]> {
    return this.run(kind, ['r.kind = ?', 'r.owner = ?', ...extra.conditions], [kind, owner, ...extra.params], options);
  }

  /**
   * Lists records of one kind regardless of owner; callers supply the
   * visibility predicate in `extra`
   */
  listVisible<K extends RecordKind>(kind: K, extra: WhereClause, options: PageOptions = {}): Page<RecordByKind[K]> {
    return this.run(kind, ['r.kind = ?', ...extra.conditions], [kind, ...extra.params], options);
  }

  listCaptures(owner: PrincipalId, filter: CaptureFilter = {}): Page<Capture> {
    return this.listOwned(RecordKind.CAPTURE, owner, filter, compileCaptureFilter(filter));
  }

  private run<K extends RecordKind>(
    kind: K,
    conditions: string[],
    params: unknown[],
    options: PageOptions
  ): Page<RecordByKind[K]> {
    const { offset, limit } = normalizePage(options, this.limits);
    const where = conditions.join(' AND ');

    const countRow = this.backend.queryOne<{ total: number }>(
      `SELECT COUNT(*) AS total FROM records r WHERE ${where}`,
      params
    );
    const total = countRow?.total ?? 0;
    const items = this.table.select(
      kind,
      `SELECT r.* FROM records r WHERE ${where} ORDER BY r.created_at ASC, r.id ASC LIMIT ? OFFSET ?`,
      [...params, limit, offset]
    );
    logger.debug(`${kind} query matched ${total} record(s)`);

    return { items, total, offset, limit, hasMore: offset + items.length < total };
  }
}
