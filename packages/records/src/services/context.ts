/**
 * Shared dependencies of the record stores
 */

import {
  danglingReference,
  validateRecordId,
  type PrincipalId,
  type RecordId,
  type RecordKind,
} from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import type { QueryEngine } from '../query/query-engine.js';
import type { RecordByKind, RecordTable } from './record-table.js';

export interface StoreContext {
  backend: StorageBackend;
  table: RecordTable;
  query: QueryEngine;
  /** Longest capture ancestor chain */
  maxDepth: number;
}

/**
 * Resolves a reference to a record the caller owns
 *
 * @throws ValidationError INVALID_ID for a malformed id or one of another kind
 * @throws ConstraintError DANGLING_REFERENCE when the record is missing or foreign
 */
export function resolveOwnedReference<K extends RecordKind>(
  table: RecordTable,
  field: string,
  kind: K,
  id: unknown,
  owner: PrincipalId
): RecordByKind[K] {
  const recordId: RecordId = validateRecordId(id, field, kind);
  const record = table.get(kind, recordId);
  if (!record || record.owner !== owner) {
    throw danglingReference(field, kind, recordId);
  }
  return record;
}
