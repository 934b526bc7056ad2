/**
 * Snapshot Serialization - JSONL lines to and from records
 *
 * Parsing rebuilds every record through the core factories, so a restored
 * record passes the same validation as a newly created one.
 */

import {
  ErrorCode,
  RecordKind,
  ValidationError,
  createCapture,
  createDocument,
  createSprint,
  createTemplate,
  createWorkspace,
  validateCaptureStatus,
  validateCaptureType,
  validateCapacity,
  validateDocumentContent,
  validateEnumValue,
  validateFolderTree,
  validateIsArchived,
  validatePriority,
  validatePrincipalId,
  validateRecordId,
  validateSprintStatus,
  validateTemplateKind,
  validateTimestamp,
  validateVisibility,
  type NewRecordContext,
  type RecordId,
} from '@trellis/core';
import type { AnyRecord } from '../services/record-table.js';
import type { Setting } from '../services/settings.js';
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
  type SnapshotHeader,
  type SnapshotLine,
} from './types.js';

// ============================================================================
// Serialization
// ============================================================================

export function serializeHeader(header: Omit<SnapshotHeader, 'type' | 'format' | 'version'>): string {
  const line: SnapshotHeader = { type: 'header', format: SNAPSHOT_FORMAT, version: SNAPSHOT_VERSION, ...header };
  return JSON.stringify(line);
}

export function serializeSetting(setting: Setting): string {
  return JSON.stringify({ type: 'setting', setting });
}

export function serializeRecord(record: AnyRecord): string {
  return JSON.stringify({ type: 'record', record });
}

// ============================================================================
// Parsing
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, what: string): Record<string, unknown> {
  if (!isObject(value)) {
    throw new ValidationError(`${what} must be an object`, ErrorCode.INVALID_INPUT, { value });
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, ErrorCode.INVALID_INPUT, { field, value });
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, ErrorCode.MISSING_REQUIRED_FIELD, { field, value });
  }
  return value;
}

function optionalId(value: unknown, field: string, kind: RecordKind): RecordId | undefined {
  return value === undefined || value === null ? undefined : validateRecordId(value, field, kind);
}

function optionalFields(value: unknown, field: string): Record<string, unknown> | undefined {
  return value === undefined || value === null ? undefined : requireObject(value, field);
}

/**
 * Parses one non-empty JSONL line
 *
 * @throws ValidationError for malformed JSON, an unknown line type or an invalid record
 */
export function parseSnapshotLine(line: string): SnapshotLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new ValidationError(
      `Invalid JSON in snapshot line: ${err instanceof Error ? err.message : 'unknown error'}`,
      ErrorCode.INVALID_INPUT,
      { line: line.substring(0, 100) }
    );
  }

  const obj = requireObject(parsed, 'Snapshot line');
  switch (obj.type) {
    case 'header': {
      if (obj.format !== SNAPSHOT_FORMAT) {
        throw new ValidationError('Not a snapshot header', ErrorCode.INVALID_INPUT, { format: obj.format });
      }
      if (obj.version !== SNAPSHOT_VERSION) {
        throw new ValidationError(`Unsupported snapshot version ${String(obj.version)}`, ErrorCode.INVALID_INPUT, {
          expected: SNAPSHOT_VERSION,
          actual: obj.version,
        });
      }
      const records = obj.records;
      if (typeof records !== 'number' || !Number.isInteger(records) || records < 0) {
        throw new ValidationError('Snapshot header record count is invalid', ErrorCode.INVALID_INPUT, {
          value: records,
        });
      }
      return {
        type: 'header',
        format: SNAPSHOT_FORMAT,
        version: SNAPSHOT_VERSION,
        exportedAt: validateTimestamp(obj.exportedAt, 'exportedAt'),
        records,
      };
    }
    case 'setting':
      return { type: 'setting', setting: parseSetting(obj.setting) };
    case 'record':
      return { type: 'record', record: parseRecord(obj.record) };
    default:
      throw new ValidationError(`Unknown snapshot line type ${String(obj.type)}`, ErrorCode.INVALID_INPUT, {
        value: obj.type,
      });
  }
}

export function parseSetting(value: unknown): Setting {
  const obj = requireObject(value, 'Setting');
  if (typeof obj.key !== 'string' || obj.key.length === 0) {
    throw new ValidationError('Setting key must be a non-empty string', ErrorCode.INVALID_INPUT, { value: obj.key });
  }
  return { key: obj.key, value: obj.value, updatedAt: validateTimestamp(obj.updatedAt, 'updatedAt') };
}

/**
 * Rebuilds a record from its serialized form
 */
export function parseRecord(value: unknown): AnyRecord {
  const obj = requireObject(value, 'Record');
  const kind = validateEnumValue(obj.kind, Object.values(RecordKind), 'kind');
  const context: NewRecordContext = {
    id: validateRecordId(obj.id, 'id', kind),
    owner: validatePrincipalId(obj.owner, 'owner'),
    now: validateTimestamp(obj.createdAt, 'createdAt'),
  };
  const updatedAt = validateTimestamp(obj.updatedAt, 'updatedAt');
  if (updatedAt < context.now) {
    throw new ValidationError('updatedAt precedes createdAt', ErrorCode.INVALID_TIMESTAMP, {
      recordId: context.id,
      createdAt: context.now,
      updatedAt,
    });
  }

  switch (kind) {
    case RecordKind.CAPTURE: {
      const description = optionalString(obj.description, 'description');
      const content = optionalString(obj.content, 'content');
      const parentId = optionalId(obj.parentId, 'parentId', RecordKind.CAPTURE);
      const workspaceId = optionalId(obj.workspaceId, 'workspaceId', RecordKind.WORKSPACE);
      const templateId = optionalId(obj.templateId, 'templateId', RecordKind.TEMPLATE);
      const fields = optionalFields(obj.fields, 'fields');
      const capture = createCapture(
        {
          captureType: validateCaptureType(obj.captureType),
          title: requireString(obj.title, 'title'),
          status: validateCaptureStatus(obj.status),
          priority: validatePriority(obj.priority),
          ...(description !== undefined && { description }),
          ...(content !== undefined && { content }),
          ...(parentId !== undefined && { parentId }),
          ...(workspaceId !== undefined && { workspaceId }),
          ...(templateId !== undefined && { templateId }),
          ...(fields !== undefined && { fields }),
        },
        context
      );
      if (capture.parentId === capture.id) {
        throw new ValidationError('A capture cannot be its own parent', ErrorCode.INVALID_INPUT, {
          recordId: capture.id,
        });
      }
      return { ...capture, updatedAt };
    }

    case RecordKind.SPRINT: {
      const goal = optionalString(obj.goal, 'goal');
      const startDate = optionalString(obj.startDate, 'startDate');
      const endDate = optionalString(obj.endDate, 'endDate');
      const capacity = obj.capacity === undefined || obj.capacity === null ? undefined : validateCapacity(obj.capacity);
      const sprint = createSprint(
        {
          name: requireString(obj.name, 'name'),
          status: validateSprintStatus(obj.status),
          ...(goal !== undefined && { goal }),
          ...(startDate !== undefined && { startDate }),
          ...(endDate !== undefined && { endDate }),
          ...(capacity !== undefined && { capacity }),
        },
        context
      );
      return { ...sprint, updatedAt, captureIds: parseCaptureIds(obj.captureIds, sprint.id) };
    }

    case RecordKind.WORKSPACE: {
      const description = optionalString(obj.description, 'description');
      const icon = optionalString(obj.icon, 'icon');
      const workspace = createWorkspace(
        {
          name: requireString(obj.name, 'name'),
          folderTree: validateFolderTree(obj.folderTree),
          ...(description !== undefined && { description }),
          ...(icon !== undefined && { icon }),
        },
        context
      );
      return { ...workspace, updatedAt, isArchived: validateIsArchived(obj.isArchived ?? false) };
    }

    case RecordKind.DOCUMENT: {
      const folderNodeId = optionalString(obj.folderNodeId, 'folderNodeId');
      const templateId = optionalId(obj.templateId, 'templateId', RecordKind.TEMPLATE);
      const document = createDocument(
        {
          workspaceId: validateRecordId(obj.workspaceId, 'workspaceId', RecordKind.WORKSPACE),
          title: requireString(obj.title, 'title'),
          content: validateDocumentContent(obj.content),
          ...(folderNodeId !== undefined && { folderNodeId }),
          ...(templateId !== undefined && { templateId }),
        },
        context
      );
      return { ...document, updatedAt };
    }

    case RecordKind.TEMPLATE: {
      const description = optionalString(obj.description, 'description');
      const defaultTitle = optionalString(obj.defaultTitle, 'defaultTitle');
      const defaultContent = optionalString(obj.defaultContent, 'defaultContent');
      const defaultFields = optionalFields(obj.defaultFields, 'defaultFields');
      const template = createTemplate(
        {
          templateKind: validateTemplateKind(obj.templateKind),
          name: requireString(obj.name, 'name'),
          visibility: validateVisibility(obj.visibility),
          ...(obj.captureType !== undefined && obj.captureType !== null && { captureType: validateCaptureType(obj.captureType) }),
          ...(description !== undefined && { description }),
          ...(defaultTitle !== undefined && { defaultTitle }),
          ...(defaultContent !== undefined && { defaultContent }),
          ...(defaultFields !== undefined && { defaultFields }),
        },
        context
      );
      return { ...template, updatedAt };
    }
  }
}

function parseCaptureIds(value: unknown, sprintId: RecordId): RecordId[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('captureIds must be a list', ErrorCode.INVALID_INPUT, { recordId: sprintId, value });
  }
  const items: unknown[] = value;
  const ids: RecordId[] = [];
  for (const item of items) {
    const id = validateRecordId(item, 'captureIds', RecordKind.CAPTURE);
    if (ids.includes(id)) {
      throw new ValidationError(`Sprint ${sprintId} lists capture ${id} twice`, ErrorCode.INVALID_INPUT, {
        recordId: sprintId,
        value: id,
      });
    }
    ids.push(id);
  }
  return ids;
}
