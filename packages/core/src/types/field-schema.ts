/**
 * Field Schema - per-capture-type dynamic attributes
 *
 * Field values are a tagged variant keyed by field name. Validation is a
 * lookup in FIELD_SCHEMAS: an unknown name or a kind mismatch is INVALID_FIELD.
 */

import { invalidField } from '../errors/factories.js';
import { isValidRecordId } from '../id/generator.js';
import { CaptureType, SUBTYPES_BY_CAPTURE_TYPE } from './capture-type.js';
import {
  RecordKind,
  dateValueToMillis,
  hasKindPrefix,
  isValidDateValue,
  isValidPrincipalId,
  type PrincipalId,
  type RecordId,
} from './record.js';

// ============================================================================
// Field Values
// ============================================================================

export const FieldKind = {
  TEXT: 'text',
  NUMBER: 'number',
  DATE: 'date',
  PRINCIPALS: 'principals',
  LABELS: 'labels',
  CAPTURES: 'captures',
} as const;

export type FieldKind = (typeof FieldKind)[keyof typeof FieldKind];

export interface TextFieldValue {
  kind: typeof FieldKind.TEXT;
  value: string;
}

export interface NumberFieldValue {
  kind: typeof FieldKind.NUMBER;
  value: number;
}

export interface DateFieldValue {
  kind: typeof FieldKind.DATE;
  /** YYYY-MM-DD or ISO 8601 timestamp */
  value: string;
}

export interface PrincipalsFieldValue {
  kind: typeof FieldKind.PRINCIPALS;
  value: PrincipalId[];
}

export interface LabelsFieldValue {
  kind: typeof FieldKind.LABELS;
  value: string[];
}

export interface CapturesFieldValue {
  kind: typeof FieldKind.CAPTURES;
  value: RecordId[];
}

export type FieldValue =
  | TextFieldValue
  | NumberFieldValue
  | DateFieldValue
  | PrincipalsFieldValue
  | LabelsFieldValue
  | CapturesFieldValue;

/** Validated field mapping stored on a capture */
export type CaptureFields = Record<string, FieldValue>;

/** Partial field update; `null` removes the key */
export type FieldPatch = Record<string, FieldValue | null>;

// ============================================================================
// Field Definitions
// ============================================================================

export interface TextFieldDefinition {
  kind: typeof FieldKind.TEXT;
  maxLength: number;
  allowed?: readonly string[];
}

export interface NumberFieldDefinition {
  kind: typeof FieldKind.NUMBER;
  integer: boolean;
  min?: number;
  max?: number;
}

export interface DateFieldDefinition {
  kind: typeof FieldKind.DATE;
}

export interface ListFieldDefinition {
  kind: typeof FieldKind.PRINCIPALS | typeof FieldKind.LABELS | typeof FieldKind.CAPTURES;
  maxItems: number;
}

export type FieldDefinition =
  | TextFieldDefinition
  | NumberFieldDefinition
  | DateFieldDefinition
  | ListFieldDefinition;

/** Well-known field names */
export const FieldName = {
  ESTIMATE: 'estimate',
  DUE_DATE: 'dueDate',
  START_DATE: 'startDate',
  END_DATE: 'endDate',
  LOCATION: 'location',
  MOOD: 'mood',
  SUBTYPE: 'subtype',
  ASSIGNEES: 'assignees',
  LABELS: 'labels',
  RELATED_CAPTURES: 'relatedCaptures',
} as const;

export type FieldName = (typeof FieldName)[keyof typeof FieldName];

/** Maximum characters per label */
export const MAX_LABEL_LENGTH = 100;

const LABEL_PATTERN = /^[a-zA-Z0-9_:-]+$/;

/** Prefix for user-defined text fields */
export const CUSTOM_FIELD_PREFIX = 'custom:';

const CUSTOM_FIELD_PATTERN = /^custom:[A-Za-z0-9_-]{1,64}$/;

export const CUSTOM_FIELD_DEFINITION: TextFieldDefinition = { kind: FieldKind.TEXT, maxLength: 1000 };

const ESTIMATE: NumberFieldDefinition = { kind: FieldKind.NUMBER, integer: true, min: 0, max: 1000 };
const DATE: DateFieldDefinition = { kind: FieldKind.DATE };
const ASSIGNEES: ListFieldDefinition = { kind: FieldKind.PRINCIPALS, maxItems: 20 };
const LABELS: ListFieldDefinition = { kind: FieldKind.LABELS, maxItems: 50 };
const RELATED_CAPTURES: ListFieldDefinition = { kind: FieldKind.CAPTURES, maxItems: 100 };

function subtypeField(type: CaptureType): TextFieldDefinition {
  return { kind: FieldKind.TEXT, maxLength: 50, allowed: SUBTYPES_BY_CAPTURE_TYPE[type] ?? [] };
}

/**
 * Per-type schema table
 */
export const FIELD_SCHEMAS: Record<CaptureType, Readonly<Record<string, FieldDefinition>>> = {
  [CaptureType.IDEA]: {
    [FieldName.ESTIMATE]: ESTIMATE,
    [FieldName.SUBTYPE]: subtypeField(CaptureType.IDEA),
    [FieldName.ASSIGNEES]: ASSIGNEES,
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
  [CaptureType.TASK]: {
    [FieldName.ESTIMATE]: ESTIMATE,
    [FieldName.DUE_DATE]: DATE,
    [FieldName.START_DATE]: DATE,
    [FieldName.SUBTYPE]: subtypeField(CaptureType.TASK),
    [FieldName.ASSIGNEES]: ASSIGNEES,
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
  [CaptureType.PROJECT]: {
    [FieldName.ESTIMATE]: ESTIMATE,
    [FieldName.DUE_DATE]: DATE,
    [FieldName.START_DATE]: DATE,
    [FieldName.SUBTYPE]: subtypeField(CaptureType.PROJECT),
    [FieldName.ASSIGNEES]: ASSIGNEES,
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
  [CaptureType.REFLECTION]: {
    [FieldName.MOOD]: { kind: FieldKind.TEXT, maxLength: 100 },
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
  [CaptureType.OUTLINE]: {
    [FieldName.ASSIGNEES]: ASSIGNEES,
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
  [CaptureType.CALENDAR]: {
    [FieldName.DUE_DATE]: DATE,
    [FieldName.START_DATE]: DATE,
    [FieldName.END_DATE]: DATE,
    [FieldName.LOCATION]: { kind: FieldKind.TEXT, maxLength: 500 },
    [FieldName.ASSIGNEES]: ASSIGNEES,
    [FieldName.LABELS]: LABELS,
    [FieldName.RELATED_CAPTURES]: RELATED_CAPTURES,
  },
};

/**
 * Looks up the definition of a field for a capture type
 */
export function getFieldDefinition(type: CaptureType, name: string): FieldDefinition | undefined {
  const schema = FIELD_SCHEMAS[type];
  if (Object.prototype.hasOwnProperty.call(schema, name)) {
    return schema[name];
  }
  if (CUSTOM_FIELD_PATTERN.test(name)) {
    return CUSTOM_FIELD_DEFINITION;
  }
  return undefined;
}

/**
 * Whether a capture type recognizes a field name
 */
export function isFieldRecognized(type: CaptureType, name: string): boolean {
  return getFieldDefinition(type, name) !== undefined;
}

// ============================================================================
// Validation
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLabel(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length <= MAX_LABEL_LENGTH &&
    LABEL_PATTERN.test(value)
  );
}

function isCaptureId(value: unknown): value is RecordId {
  return isValidRecordId(value) && hasKindPrefix(value, RecordKind.CAPTURE);
}

function validateList<T extends string>(
  name: string,
  value: unknown,
  maxItems: number,
  guard: (item: unknown) => item is T,
  itemDescription: string
): T[] {
  if (!Array.isArray(value)) {
    throw invalidField(name, 'expected a list', { value, expected: `list of ${itemDescription}` });
  }
  const items: unknown[] = value;
  if (items.length > maxItems) {
    throw invalidField(name, `at most ${maxItems} items allowed`, {
      actual: items.length,
      expected: `<= ${maxItems}`,
    });
  }
  const result: T[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    if (!guard(item)) {
      throw invalidField(name, `invalid item ${JSON.stringify(item)}`, {
        value: item,
        expected: itemDescription,
      });
    }
    if (seen.has(item)) {
      throw invalidField(name, `duplicate item ${item}`, { value: item });
    }
    seen.add(item);
    result.push(item);
  }
  return result;
}

/**
 * Validates one tagged field value against the schema for a capture type
 */
export function validateFieldValue(type: CaptureType, name: string, raw: unknown): FieldValue {
  const definition = getFieldDefinition(type, name);
  if (!definition) {
    throw invalidField(name, `not recognized for ${type}`, { captureType: type });
  }
  if (!isPlainObject(raw)) {
    throw invalidField(name, 'expected a tagged value { kind, value }', { value: raw });
  }
  if (raw.kind !== definition.kind) {
    throw invalidField(name, `expected kind ${definition.kind}`, {
      expected: definition.kind,
      actual: raw.kind,
    });
  }

  const value = raw.value;
  switch (definition.kind) {
    case FieldKind.TEXT: {
      if (typeof value !== 'string') {
        throw invalidField(name, 'expected a string', { value });
      }
      if (value.length > definition.maxLength) {
        throw invalidField(name, `exceeds ${definition.maxLength} characters`, {
          actual: value.length,
          expected: `<= ${definition.maxLength}`,
        });
      }
      if (definition.allowed && !definition.allowed.includes(value)) {
        throw invalidField(name, `${value} is not allowed for ${type}`, {
          value,
          expected: definition.allowed,
        });
      }
      return { kind: FieldKind.TEXT, value };
    }
    case FieldKind.NUMBER: {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw invalidField(name, 'expected a finite number', { value });
      }
      if (definition.integer && !Number.isInteger(value)) {
        throw invalidField(name, 'expected an integer', { value });
      }
      if (
        (definition.min !== undefined && value < definition.min) ||
        (definition.max !== undefined && value > definition.max)
      ) {
        throw invalidField(name, 'out of range', {
          value,
          expected: `${definition.min ?? '-inf'}..${definition.max ?? 'inf'}`,
        });
      }
      return { kind: FieldKind.NUMBER, value };
    }
    case FieldKind.DATE: {
      if (!isValidDateValue(value)) {
        throw invalidField(name, 'expected YYYY-MM-DD or an ISO 8601 timestamp', { value });
      }
      return { kind: FieldKind.DATE, value };
    }
    case FieldKind.PRINCIPALS:
      return {
        kind: FieldKind.PRINCIPALS,
        value: validateList(name, value, definition.maxItems, isValidPrincipalId, 'principal ids'),
      };
    case FieldKind.LABELS:
      return {
        kind: FieldKind.LABELS,
        value: validateList(name, value, definition.maxItems, isLabel, 'labels matching [a-zA-Z0-9_:-]'),
      };
    case FieldKind.CAPTURES:
      return {
        kind: FieldKind.CAPTURES,
        value: validateList(name, value, definition.maxItems, isCaptureId, 'capture ids'),
      };
  }
}

/**
 * Checks that startDate is not after dueDate or endDate
 */
export function validateDateOrder(fields: CaptureFields): void {
  const start = getDateField(fields, FieldName.START_DATE);
  if (start === undefined) {
    return;
  }
  for (const other of [FieldName.DUE_DATE, FieldName.END_DATE]) {
    const end = getDateField(fields, other);
    if (end !== undefined && dateValueToMillis(start) > dateValueToMillis(end)) {
      throw invalidField(FieldName.START_DATE, `must not be after ${other}`, {
        value: start,
        [other]: end,
      });
    }
  }
}

/**
 * Validates a whole field mapping for a capture type
 */
export function validateFields(type: CaptureType, raw: unknown): CaptureFields {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw invalidField('fields', 'expected a mapping of field name to tagged value', { value: raw });
  }
  const fields: CaptureFields = {};
  for (const [name, value] of Object.entries(raw)) {
    fields[name] = validateFieldValue(type, name, value);
  }
  validateDateOrder(fields);
  return fields;
}

/**
 * Merges a field patch over current fields. A `null` value removes the key.
 * The result is unvalidated; pass it to validateFields for the target type.
 */
export function mergeFieldPatch(current: CaptureFields, patch: unknown): Record<string, unknown> {
  if (!isPlainObject(patch)) {
    throw invalidField('fields', 'expected a mapping of field name to tagged value or null', {
      value: patch,
    });
  }
  const merged: Record<string, unknown> = { ...current };
  for (const [name, value] of Object.entries(patch)) {
    if (value === null) {
      delete merged[name];
    } else {
      merged[name] = value;
    }
  }
  return merged;
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Estimate used for sprint load; a missing estimate counts as 0
 */
export function getEstimate(fields: CaptureFields): number {
  const field = fields[FieldName.ESTIMATE];
  return field?.kind === FieldKind.NUMBER ? field.value : 0;
}

export function getDateField(fields: CaptureFields, name: string): string | undefined {
  const field = fields[name];
  return field?.kind === FieldKind.DATE ? field.value : undefined;
}

export function getLabels(fields: CaptureFields): string[] {
  const field = fields[FieldName.LABELS];
  return field?.kind === FieldKind.LABELS ? field.value : [];
}

export function getRelatedCaptureIds(fields: CaptureFields): RecordId[] {
  const field = fields[FieldName.RELATED_CAPTURES];
  return field?.kind === FieldKind.CAPTURES ? field.value : [];
}

function cloneFieldValue(value: FieldValue): FieldValue {
  switch (value.kind) {
    case FieldKind.PRINCIPALS:
      return { kind: value.kind, value: [...value.value] };
    case FieldKind.LABELS:
      return { kind: value.kind, value: [...value.value] };
    case FieldKind.CAPTURES:
      return { kind: value.kind, value: [...value.value] };
    default:
      return { ...value };
  }
}

/**
 * Deep-copies a field mapping
 */
export function cloneFields(fields: CaptureFields): CaptureFields {
  const copy: CaptureFields = {};
  for (const [name, value] of Object.entries(fields)) {
    copy[name] = cloneFieldValue(value);
  }
  return copy;
}
