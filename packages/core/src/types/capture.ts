/**
 * Capture Type - user-authored items (ideas, tasks, projects, reflections, outlines, calendar entries)
 *
 * Captures form parent/child trees within one owner and carry a dynamic
 * field mapping validated against the Field Schema for their type.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { CaptureType, isValidCaptureType } from './capture-type.js';
import { cloneFields, validateFields, type CaptureFields } from './field-schema.js';
import {
  MAX_CONTENT_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  validateEnumValue,
  validateOptionalText,
  validateTitle,
  type BaseRecord,
  type PrincipalId,
  type RecordId,
  type Timestamp,
} from './record.js';

// ============================================================================
// Capture Status
// ============================================================================

export const CaptureStatus = {
  DRAFT: 'Draft',
  ACTIVE: 'Active',
  IN_PROGRESS: 'InProgress',
  BLOCKED: 'Blocked',
  COMPLETED: 'Completed',
  ARCHIVED: 'Archived',
  CANCELLED: 'Cancelled',
} as const;

export type CaptureStatus = (typeof CaptureStatus)[keyof typeof CaptureStatus];

export const DEFAULT_CAPTURE_STATUS: CaptureStatus = CaptureStatus.DRAFT;

// ============================================================================
// Priority
// ============================================================================

export const Priority = {
  LOW: 'Low',
  MEDIUM: 'Medium',
  HIGH: 'High',
  CRITICAL: 'Critical',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const DEFAULT_PRIORITY: Priority = Priority.MEDIUM;

// ============================================================================
// Capture Interface
// ============================================================================

export interface Capture extends BaseRecord {
  readonly kind: typeof RecordKind.CAPTURE;
  captureType: CaptureType;
  /** 1-500 characters, trimmed */
  title: string;
  description?: string;
  /** Markdown body */
  content?: string;
  status: CaptureStatus;
  priority: Priority;
  /** Parent capture of the same owner; absent for roots */
  parentId?: RecordId;
  /** Workspace of the same owner */
  workspaceId?: RecordId;
  /** Template this capture was instantiated from (provenance only) */
  templateId?: RecordId;
  fields: CaptureFields;
}

// ============================================================================
// Validation Functions
// ============================================================================

export function validateCaptureType(value: unknown): CaptureType {
  if (!isValidCaptureType(value)) {
    throw new ValidationError(
      `Invalid capture type: ${String(value)}. Must be one of: ${Object.values(CaptureType).join(', ')}`,
      ErrorCode.INVALID_INPUT,
      { field: 'captureType', value, expected: Object.values(CaptureType) }
    );
  }
  return value;
}

export function isValidCaptureStatus(value: unknown): value is CaptureStatus {
  return Object.values(CaptureStatus).some((status) => status === value);
}

export function validateCaptureStatus(value: unknown): CaptureStatus {
  return validateEnumValue(value, Object.values(CaptureStatus), 'status', ErrorCode.INVALID_STATUS);
}

export function isValidPriority(value: unknown): value is Priority {
  return Object.values(Priority).some((priority) => priority === value);
}

export function validatePriority(value: unknown): Priority {
  return validateEnumValue(value, Object.values(Priority), 'priority');
}

/**
 * Type guard for Capture records
 */
export function isCapture(value: unknown): value is Capture {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    obj.kind === RecordKind.CAPTURE &&
    typeof obj.id === 'string' &&
    typeof obj.owner === 'string' &&
    isValidCaptureType(obj.captureType) &&
    typeof obj.title === 'string' &&
    isValidCaptureStatus(obj.status) &&
    isValidPriority(obj.priority) &&
    typeof obj.fields === 'object' &&
    obj.fields !== null
  );
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Store-assigned values for a new record
 */
export interface NewRecordContext {
  id: RecordId;
  owner: PrincipalId;
  now: Timestamp;
}

/**
 * Input for creating a new capture
 */
export interface CreateCaptureInput {
  captureType: CaptureType;
  /** 1-500 characters */
  title: string;
  description?: string;
  content?: string;
  /** Default: Draft */
  status?: CaptureStatus;
  /** Default: Medium */
  priority?: Priority;
  parentId?: RecordId;
  workspaceId?: RecordId;
  templateId?: RecordId;
  /** Tagged field values keyed by field name */
  fields?: Record<string, unknown>;
}

/**
 * Creates a Capture with validated scalar inputs and fields.
 * Relationship checks (parent, workspace, related captures) belong to the store.
 */
export function createCapture(input: CreateCaptureInput, context: NewRecordContext): Capture {
  const captureType = validateCaptureType(input.captureType);
  const title = validateTitle(input.title);
  const description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
  const content = validateOptionalText(input.content, 'content', MAX_CONTENT_LENGTH);
  const status = input.status !== undefined ? validateCaptureStatus(input.status) : DEFAULT_CAPTURE_STATUS;
  const priority = input.priority !== undefined ? validatePriority(input.priority) : DEFAULT_PRIORITY;
  const fields = validateFields(captureType, input.fields);

  return {
    id: context.id,
    kind: RecordKind.CAPTURE,
    owner: context.owner,
    createdAt: context.now,
    updatedAt: context.now,
    captureType,
    title,
    status,
    priority,
    fields,
    ...(description !== undefined && { description }),
    ...(content !== undefined && { content }),
    ...(input.parentId !== undefined && { parentId: input.parentId }),
    ...(input.workspaceId !== undefined && { workspaceId: input.workspaceId }),
    ...(input.templateId !== undefined && { templateId: input.templateId }),
  };
}

// ============================================================================
// Update Functions
// ============================================================================

/**
 * Partial capture update. `null` clears an optional reference or text.
 */
export interface UpdateCaptureInput {
  captureType?: CaptureType;
  title?: string;
  description?: string | null;
  content?: string | null;
  status?: CaptureStatus;
  priority?: Priority;
  parentId?: RecordId | null;
  workspaceId?: RecordId | null;
  /** Per-key merge; a key set to null removes the field */
  fields?: Record<string, unknown>;
}

/**
 * Deep-copies a capture
 */
export function cloneCapture(capture: Capture): Capture {
  return { ...capture, fields: cloneFields(capture.fields) };
}
