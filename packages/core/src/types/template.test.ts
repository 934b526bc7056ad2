import { describe, expect, test } from 'vitest';
import {
  createTemplate,
  resolveInstanceTitle,
  TemplateKind,
  Visibility,
} from './template.js';
import { CaptureType } from './capture-type.js';
import { asPrincipalId, asRecordId } from './record.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

const context = {
  id: asRecordId('tpl-abc'),
  owner: asPrincipalId('alice'),
  now: '2026-04-01T08:00:00.000Z',
};

describe('createTemplate', () => {
  test('defaults to private and validates default fields', () => {
    const template = createTemplate(
      {
        templateKind: TemplateKind.CAPTURE,
        name: 'Bug report',
        captureType: CaptureType.TASK,
        defaultFields: { subtype: { kind: 'text', value: 'BugFix' } },
      },
      context
    );
    expect(template.visibility).toBe(Visibility.PRIVATE);
    expect(template.defaultFields).toEqual({ subtype: { kind: 'text', value: 'BugFix' } });
    expect(template.defaultContent).toBe('');
  });

  test('capture templates need a capture type', () => {
    try {
      createTemplate({ templateKind: TemplateKind.CAPTURE, name: 'x' }, context);
      throw new Error('expected failure');
    } catch (err) {
      expect((err as ValidationError).code).toBe(ErrorCode.MISSING_REQUIRED_FIELD);
    }
  });

  test('document templates carry no fields', () => {
    expect(() =>
      createTemplate(
        {
          templateKind: TemplateKind.DOCUMENT,
          name: 'x',
          defaultFields: { labels: { kind: 'labels', value: ['a'] } },
        },
        context
      )
    ).toThrow(ValidationError);
  });

  test('rejects default fields outside the capture type schema', () => {
    try {
      createTemplate(
        {
          templateKind: TemplateKind.CAPTURE,
          name: 'x',
          captureType: CaptureType.REFLECTION,
          defaultFields: { estimate: { kind: 'number', value: 1 } },
        },
        context
      );
      throw new Error('expected failure');
    } catch (err) {
      expect((err as ValidationError).code).toBe(ErrorCode.INVALID_FIELD);
    }
  });
});

describe('resolveInstanceTitle', () => {
  const template = createTemplate(
    { templateKind: TemplateKind.DOCUMENT, name: 'Meeting notes', defaultTitle: 'Weekly sync' },
    context
  );

  test('prefers the explicit title', () => {
    expect(resolveInstanceTitle(template, ' Retro ')).toBe('Retro');
  });

  test('falls back to the default title, then the name', () => {
    expect(resolveInstanceTitle(template, undefined)).toBe('Weekly sync');
    const untitled = createTemplate({ templateKind: TemplateKind.DOCUMENT, name: 'Scratch' }, context);
    expect(resolveInstanceTitle(untitled, undefined)).toBe('Scratch');
  });
});
