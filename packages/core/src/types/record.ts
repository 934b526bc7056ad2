/**
 * Record Base Type - Foundation for all Trellis records
 *
 * Every record carries:
 * - A store-generated, kind-prefixed identifier
 * - Exactly one owning principal, fixed for the record's lifetime
 * - Store-assigned creation and modification timestamps
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Branded type for record IDs
 * Format: {prefix}-{hash}, e.g. cap-4f2a or spr-9k1
 */
declare const RecordIdBrand: unique symbol;
export type RecordId = string & { readonly [RecordIdBrand]: typeof RecordIdBrand };

/**
 * Branded type for principals (authenticated identities that own records)
 */
declare const PrincipalIdBrand: unique symbol;
export type PrincipalId = string & { readonly [PrincipalIdBrand]: typeof PrincipalIdBrand };

/**
 * Timestamp type - ISO 8601 formatted string
 * Format: YYYY-MM-DDTHH:mm:ss.sssZ
 */
export type Timestamp = string;

// ============================================================================
// Branded Type Cast Utilities
// ============================================================================

/** Cast a string to PrincipalId (use at trust boundaries only) */
export function asPrincipalId(id: string): PrincipalId {
  return id as unknown as PrincipalId;
}

/** Cast a string to RecordId (use at trust boundaries only) */
export function asRecordId(id: string): RecordId {
  return id as unknown as RecordId;
}

// ============================================================================
// Record Kinds
// ============================================================================

/**
 * All record kinds held by the store
 */
export const RecordKind = {
  CAPTURE: 'capture',
  SPRINT: 'sprint',
  WORKSPACE: 'workspace',
  DOCUMENT: 'document',
  TEMPLATE: 'template',
} as const;

export type RecordKind = (typeof RecordKind)[keyof typeof RecordKind];

/** ID prefix per record kind */
export const RECORD_ID_PREFIXES: Record<RecordKind, string> = {
  [RecordKind.CAPTURE]: 'cap',
  [RecordKind.SPRINT]: 'spr',
  [RecordKind.WORKSPACE]: 'wsp',
  [RecordKind.DOCUMENT]: 'doc',
  [RecordKind.TEMPLATE]: 'tpl',
};

/**
 * Principal used by unauthenticated callers. Never allowed to own records.
 */
export const ANONYMOUS_PRINCIPAL = 'anonymous';

// ============================================================================
// Record Interface
// ============================================================================

/**
 * Base record interface - all record kinds extend this
 */
export interface BaseRecord {
  /** Kind-prefixed identifier */
  readonly id: RecordId;
  /** Discriminator for the record kind */
  readonly kind: RecordKind;
  /** The principal that owns this record */
  readonly owner: PrincipalId;
  /** ISO 8601 datetime when the record was created */
  readonly createdAt: Timestamp;
  /** ISO 8601 datetime of last modification */
  updatedAt: Timestamp;
}

// ============================================================================
// Validation Constants
// ============================================================================

/** Minimum title length after trimming */
export const MIN_TITLE_LENGTH = 1;

/** Maximum title length after trimming */
export const MAX_TITLE_LENGTH = 500;

/** Maximum length of sprint, workspace, and template names */
export const MAX_NAME_LENGTH = 200;

/** Maximum length of description-style text */
export const MAX_DESCRIPTION_LENGTH = 10_000;

/** Maximum length of markdown content */
export const MAX_CONTENT_LENGTH = 1_000_000;

/** Maximum principal length */
export const MAX_PRINCIPAL_LENGTH = 128;

const PRINCIPAL_PATTERN = /^[A-Za-z0-9._:@-]+$/;

/** ISO 8601 timestamp pattern */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

/** Calendar date pattern */
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validates a timestamp string is in ISO 8601 format
 */
export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string') {
    return false;
  }
  if (!TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  // Rolled-over dates such as Feb 30 do not round-trip
  const normalizedInput = value.includes('.') ? value : value.replace('Z', '.000Z');
  return date.toISOString() === normalizedInput;
}

/**
 * Validates a timestamp and returns it with milliseconds, so stored
 * timestamps compare correctly as text
 */
export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw new ValidationError(
      `Invalid timestamp format for ${field}. Expected ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)`,
      ErrorCode.INVALID_TIMESTAMP,
      { field, value, expected: 'YYYY-MM-DDTHH:mm:ss.sssZ' }
    );
  }
  return new Date(value).toISOString();
}

/**
 * Checks for a calendar date (YYYY-MM-DD) or a full ISO 8601 timestamp
 */
export function isValidDateValue(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  if (DATE_PATTERN.test(value)) {
    return isValidTimestamp(`${value}T00:00:00.000Z`);
  }
  return isValidTimestamp(value);
}

/**
 * Validates a date value and throws if invalid
 */
export function validateDateValue(value: unknown, field: string): string {
  if (!isValidDateValue(value)) {
    throw new ValidationError(
      `Invalid date for ${field}. Expected YYYY-MM-DD or ISO 8601 timestamp`,
      ErrorCode.INVALID_TIMESTAMP,
      { field, value, expected: 'YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss.sssZ' }
    );
  }
  return value;
}

/**
 * Converts a date value to epoch milliseconds for ordering comparisons
 */
export function dateValueToMillis(value: string): number {
  return DATE_PATTERN.test(value)
    ? new Date(`${value}T00:00:00.000Z`).getTime()
    : new Date(value).getTime();
}

/**
 * Validates a principal identifier
 */
export function isValidPrincipalId(value: unknown): value is PrincipalId {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length <= MAX_PRINCIPAL_LENGTH &&
    PRINCIPAL_PATTERN.test(value)
  );
}

/**
 * Validates a principal identifier and throws if invalid
 */
export function validatePrincipalId(value: unknown, field = 'principal'): PrincipalId {
  if (!isValidPrincipalId(value)) {
    throw new ValidationError(
      `Invalid principal for ${field}`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: `1-${MAX_PRINCIPAL_LENGTH} chars of [A-Za-z0-9._:@-]` }
    );
  }
  return value;
}

/**
 * Validates a record title (1-500 characters after trimming)
 */
export function isValidTitle(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const trimmed = value.trim();
  return trimmed.length >= MIN_TITLE_LENGTH && trimmed.length <= MAX_TITLE_LENGTH;
}

/**
 * Validates a title and returns it trimmed
 */
export function validateTitle(value: unknown, field = 'title'): string {
  if (typeof value !== 'string') {
    throw new ValidationError(
      `${field} must be a string`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: 'string' }
    );
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(
      `${field} cannot be empty`,
      ErrorCode.MISSING_REQUIRED_FIELD,
      { field, value }
    );
  }

  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(
      `${field} exceeds maximum length of ${MAX_TITLE_LENGTH} characters`,
      ErrorCode.TITLE_TOO_LONG,
      { field, expected: `<= ${MAX_TITLE_LENGTH} characters`, actual: trimmed.length }
    );
  }

  return trimmed;
}

/**
 * Validates a required name and returns it trimmed
 */
export function validateName(value: unknown, field = 'name', maxLength = MAX_NAME_LENGTH): string {
  if (typeof value !== 'string') {
    throw new ValidationError(
      `${field} must be a string`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: 'string' }
    );
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(
      `${field} cannot be empty`,
      ErrorCode.MISSING_REQUIRED_FIELD,
      { field, value }
    );
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(
      `${field} exceeds maximum length of ${maxLength} characters`,
      ErrorCode.INVALID_INPUT,
      { field, expected: `<= ${maxLength} characters`, actual: trimmed.length }
    );
  }
  return trimmed;
}

/**
 * Validates optional text fields with max length
 */
export function validateOptionalText(
  value: unknown,
  field: string,
  maxLength: number
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ValidationError(
      `${field} must be a string`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: 'string' }
    );
  }

  if (value.length > maxLength) {
    throw new ValidationError(
      `${field} exceeds maximum length of ${maxLength} characters`,
      ErrorCode.INVALID_INPUT,
      { field, expected: `<= ${maxLength} characters`, actual: value.length }
    );
  }

  return value;
}

/**
 * Validates a value against a const-object enum and throws INVALID_STATUS-style errors
 */
export function validateEnumValue<T extends string>(
  value: unknown,
  allowed: readonly T[],
  field: string,
  code: typeof ErrorCode.INVALID_STATUS | typeof ErrorCode.INVALID_INPUT = ErrorCode.INVALID_INPUT
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(
      `Invalid ${field}: ${String(value)}. Must be one of: ${allowed.join(', ')}`,
      code,
      { field, value, expected: allowed }
    );
  }
  return match;
}

/**
 * Checks that an id carries the prefix for the given record kind
 */
export function hasKindPrefix(id: string, kind: RecordKind): boolean {
  return id.startsWith(`${RECORD_ID_PREFIXES[kind]}-`);
}

/**
 * Returns the record kind encoded in an id prefix, if any
 */
export function kindFromId(id: string): RecordKind | undefined {
  const prefix = id.slice(0, id.indexOf('-'));
  const entry = Object.entries(RECORD_ID_PREFIXES).find(([, p]) => p === prefix);
  if (!entry) {
    return undefined;
  }
  return Object.values(RecordKind).find((kind) => kind === entry[0]);
}
