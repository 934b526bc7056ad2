import { describe, expect, test } from 'vitest';
import { CaptureType } from './capture-type.js';
import {
  FieldKind,
  FIELD_SCHEMAS,
  getFieldDefinition,
  isFieldRecognized,
  validateFieldValue,
  validateFields,
  mergeFieldPatch,
  getEstimate,
  getLabels,
  cloneFields,
  type CaptureFields,
} from './field-schema.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

function expectInvalidField(fn: () => unknown, field: string): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(ValidationError);
    expect((err as ValidationError).code).toBe(ErrorCode.INVALID_FIELD);
    expect((err as ValidationError).details.field).toBe(field);
    return;
  }
  throw new Error('expected INVALID_FIELD');
}

describe('schema table', () => {
  test('recognizes fields per type', () => {
    expect(isFieldRecognized(CaptureType.TASK, 'estimate')).toBe(true);
    expect(isFieldRecognized(CaptureType.REFLECTION, 'estimate')).toBe(false);
    expect(isFieldRecognized(CaptureType.REFLECTION, 'mood')).toBe(true);
    expect(isFieldRecognized(CaptureType.CALENDAR, 'endDate')).toBe(true);
    expect(isFieldRecognized(CaptureType.TASK, 'endDate')).toBe(false);
    expect(isFieldRecognized(CaptureType.OUTLINE, 'custom:color')).toBe(true);
    expect(isFieldRecognized(CaptureType.OUTLINE, 'custom:')).toBe(false);
    expect(isFieldRecognized(CaptureType.IDEA, 'constructor')).toBe(false);
  });

  test('every type accepts labels and related captures', () => {
    for (const type of Object.values(CaptureType)) {
      expect(FIELD_SCHEMAS[type].labels?.kind).toBe(FieldKind.LABELS);
      expect(FIELD_SCHEMAS[type].relatedCaptures?.kind).toBe(FieldKind.CAPTURES);
    }
  });

  test('subtypes are restricted per type', () => {
    const definition = getFieldDefinition(CaptureType.TASK, 'subtype');
    expect(definition).toEqual({
      kind: FieldKind.TEXT,
      maxLength: 50,
      allowed: [
        'Development',
        'Design',
        'Documentation',
        'Review',
        'Testing',
        'Deployment',
        'Maintenance',
        'BugFix',
        'Refactor',
      ],
    });
  });
});

describe('validateFieldValue', () => {
  test('accepts well-formed values', () => {
    expect(validateFieldValue(CaptureType.TASK, 'estimate', { kind: 'number', value: 5 })).toEqual({
      kind: 'number',
      value: 5,
    });
    expect(
      validateFieldValue(CaptureType.IDEA, 'subtype', { kind: 'text', value: 'Research' })
    ).toEqual({ kind: 'text', value: 'Research' });
    expect(
      validateFieldValue(CaptureType.CALENDAR, 'dueDate', { kind: 'date', value: '2026-05-01' })
    ).toEqual({ kind: 'date', value: '2026-05-01' });
  });

  test('rejects unknown fields and kind mismatches', () => {
    expectInvalidField(
      () => validateFieldValue(CaptureType.REFLECTION, 'estimate', { kind: 'number', value: 1 }),
      'estimate'
    );
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'estimate', { kind: 'text', value: '3' }),
      'estimate'
    );
    expectInvalidField(() => validateFieldValue(CaptureType.TASK, 'estimate', 3), 'estimate');
  });

  test('enforces number bounds and integers', () => {
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'estimate', { kind: 'number', value: -1 }),
      'estimate'
    );
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'estimate', { kind: 'number', value: 2.5 }),
      'estimate'
    );
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'estimate', { kind: 'number', value: 1001 }),
      'estimate'
    );
  });

  test('rejects subtypes of other types', () => {
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'subtype', { kind: 'text', value: 'Epic' }),
      'subtype'
    );
  });

  test('validates list items', () => {
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'labels', { kind: 'labels', value: ['ok', 'ok'] }),
      'labels'
    );
    expectInvalidField(
      () => validateFieldValue(CaptureType.TASK, 'labels', { kind: 'labels', value: ['has space'] }),
      'labels'
    );
    expectInvalidField(
      () =>
        validateFieldValue(CaptureType.TASK, 'relatedCaptures', {
          kind: 'captures',
          value: ['spr-abc1'],
        }),
      'relatedCaptures'
    );
    expectInvalidField(
      () =>
        validateFieldValue(CaptureType.TASK, 'assignees', {
          kind: 'principals',
          value: Array.from({ length: 21 }, (_, i) => `user-${i}`),
        }),
      'assignees'
    );
  });
});

describe('validateFields', () => {
  test('treats missing fields as empty', () => {
    expect(validateFields(CaptureType.IDEA, undefined)).toEqual({});
  });

  test('enforces startDate <= dueDate and endDate', () => {
    expectInvalidField(
      () =>
        validateFields(CaptureType.TASK, {
          startDate: { kind: 'date', value: '2026-05-02' },
          dueDate: { kind: 'date', value: '2026-05-01' },
        }),
      'startDate'
    );
    expectInvalidField(
      () =>
        validateFields(CaptureType.CALENDAR, {
          startDate: { kind: 'date', value: '2026-05-01T12:00:00.000Z' },
          endDate: { kind: 'date', value: '2026-05-01' },
        }),
      'startDate'
    );
    expect(
      validateFields(CaptureType.CALENDAR, {
        startDate: { kind: 'date', value: '2026-05-01' },
        endDate: { kind: 'date', value: '2026-05-01T09:00:00.000Z' },
      })
    ).toEqual({
      startDate: { kind: 'date', value: '2026-05-01' },
      endDate: { kind: 'date', value: '2026-05-01T09:00:00.000Z' },
    });
  });
});

describe('mergeFieldPatch', () => {
  const current: CaptureFields = {
    estimate: { kind: 'number', value: 3 },
    labels: { kind: 'labels', value: ['home'] },
  };

  test('merges per key and removes null keys', () => {
    const merged = mergeFieldPatch(current, {
      estimate: null,
      dueDate: { kind: 'date', value: '2026-07-01' },
    });
    expect(merged).toEqual({
      labels: { kind: 'labels', value: ['home'] },
      dueDate: { kind: 'date', value: '2026-07-01' },
    });
    expect(current.estimate).toEqual({ kind: 'number', value: 3 });
  });

  test('rejects type-changing merges with leftover fields', () => {
    const merged = mergeFieldPatch(current, {});
    expectInvalidField(() => validateFields(CaptureType.REFLECTION, merged), 'estimate');
    const cleared = mergeFieldPatch(current, { estimate: null });
    expect(validateFields(CaptureType.REFLECTION, cleared)).toEqual({
      labels: { kind: 'labels', value: ['home'] },
    });
  });
});

describe('accessors', () => {
  test('estimate defaults to zero', () => {
    expect(getEstimate({})).toBe(0);
    expect(getEstimate({ estimate: { kind: 'number', value: 8 } })).toBe(8);
    expect(getLabels({})).toEqual([]);
  });

  test('cloneFields copies lists', () => {
    const fields: CaptureFields = { labels: { kind: 'labels', value: ['a'] } };
    const copy = cloneFields(fields);
    const labels = copy.labels;
    if (labels?.kind === 'labels') {
      labels.value.push('b');
    }
    expect(fields.labels).toEqual({ kind: 'labels', value: ['a'] });
  });
});
