import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  CaptureStatus,
  CaptureType,
  ErrorCode,
  FieldKind,
  Priority,
  TemplateKind,
  Visibility,
  createClock,
  isTrellisError,
  type RecordId,
  type TrellisError,
} from '@trellis/core';
import { openStorage } from '@trellis/storage';
import { createRecordStore } from '../api/record-store.js';
import type { RecordStore } from '../api/types.js';
import { getDefaultConfig } from '../config/defaults.js';

function catchError(fn: () => unknown): TrellisError {
  try {
    fn();
  } catch (error) {
    if (isTrellisError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an error');
}

describe('CaptureStore', () => {
  let store: RecordStore;

  beforeEach(() => {
    store = createRecordStore({
      backend: openStorage({ path: ':memory:' }),
      clock: createClock(() => Date.UTC(2026, 0, 1)),
    });
  });

  afterEach(() => {
    store.close();
  });

  describe('create', () => {
    test('applies defaults and the caller as owner', () => {
      const capture = store.captures.create('alice', { captureType: CaptureType.IDEA, title: '  Offline mode  ' });

      expect(capture.id.startsWith('cap-')).toBe(true);
      expect(capture.owner).toBe('alice');
      expect(capture.title).toBe('Offline mode');
      expect(capture.status).toBe(CaptureStatus.DRAFT);
      expect(capture.priority).toBe(Priority.MEDIUM);
      expect(capture.fields).toEqual({});
      expect(capture.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(capture.updatedAt).toBe(capture.createdAt);
      expect(store.captures.get('alice', capture.id)).toEqual(capture);
    });

    test('requires an authenticated caller', () => {
      expect(catchError(() => store.captures.create('', { captureType: CaptureType.IDEA, title: 'x' })).code).toBe(
        ErrorCode.AUTHENTICATION_REQUIRED
      );
      expect(
        catchError(() => store.captures.create('anonymous', { captureType: CaptureType.IDEA, title: 'x' })).code
      ).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
    });

    test('validates fields against the capture type', () => {
      const error = catchError(() =>
        store.captures.create('alice', {
          captureType: CaptureType.REFLECTION,
          title: 'Week 3',
          fields: { estimate: { kind: FieldKind.NUMBER, value: 3 } },
        })
      );
      expect(error.code).toBe(ErrorCode.INVALID_FIELD);
      expect(store.captures.list('alice').total).toBe(0);
    });

    test('rejects a parent owned by someone else', () => {
      const foreign = store.captures.create('bob', { captureType: CaptureType.PROJECT, title: 'Bob project' });
      const error = catchError(() =>
        store.captures.create('alice', { captureType: CaptureType.TASK, title: 'Sub', parentId: foreign.id })
      );
      expect(error.code).toBe(ErrorCode.DANGLING_REFERENCE);
    });

    test('rejects related captures that do not resolve', () => {
      const foreign = store.captures.create('bob', { captureType: CaptureType.IDEA, title: 'Bob idea' });
      const error = catchError(() =>
        store.captures.create('alice', {
          captureType: CaptureType.IDEA,
          title: 'Mine',
          fields: { relatedCaptures: { kind: FieldKind.CAPTURES, value: [foreign.id] } },
        })
      );
      expect(error.code).toBe(ErrorCode.DANGLING_REFERENCE);
    });

    test('rejects chains longer than the configured depth', () => {
      const shallow = createRecordStore({
        backend: openStorage({ path: ':memory:' }),
        config: { ...getDefaultConfig(), hierarchy: { maxDepth: 2 } },
      });
      const c1 = shallow.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'c1' });
      const c2 = shallow.captures.create('alice', { captureType: CaptureType.TASK, title: 'c2', parentId: c1.id });
      const c3 = shallow.captures.create('alice', { captureType: CaptureType.TASK, title: 'c3', parentId: c2.id });

      const error = catchError(() =>
        shallow.captures.create('alice', { captureType: CaptureType.TASK, title: 'c4', parentId: c3.id })
      );
      expect(error.code).toBe(ErrorCode.MAX_DEPTH_EXCEEDED);
      shallow.close();
    });

    test('counts the moved subtree against the configured depth', () => {
      const shallow = createRecordStore({
        backend: openStorage({ path: ':memory:' }),
        config: { ...getDefaultConfig(), hierarchy: { maxDepth: 3 } },
      });
      const chain = (prefix: string): [RecordId, RecordId, RecordId] => {
        const first = shallow.captures.create('alice', { captureType: CaptureType.TASK, title: `${prefix}0` });
        const second = shallow.captures.create('alice', {
          captureType: CaptureType.TASK,
          title: `${prefix}1`,
          parentId: first.id,
        });
        const third = shallow.captures.create('alice', {
          captureType: CaptureType.TASK,
          title: `${prefix}2`,
          parentId: second.id,
        });
        return [first.id, second.id, third.id];
      };
      const [l0, , l2] = chain('l');
      const [r0, r1, r2] = chain('r');

      const error = catchError(() => shallow.captures.update('alice', r0, { parentId: l2 }));
      expect(error.code).toBe(ErrorCode.MAX_DEPTH_EXCEEDED);
      expect(shallow.captures.get('alice', r0).parentId).toBeUndefined();

      shallow.captures.update('alice', r1, { parentId: l0 });
      expect(shallow.captures.getAncestors('alice', r2).map((c) => c.id)).toEqual([r1, l0]);
      shallow.close();
    });
  });

  describe('tenant isolation', () => {
    test('captures of another principal are not found', () => {
      const capture = store.captures.create('alice', { captureType: CaptureType.IDEA, title: 'Private' });

      expect(catchError(() => store.captures.get('bob', capture.id)).code).toBe(ErrorCode.NOT_FOUND);
      expect(catchError(() => store.captures.update('bob', capture.id, { title: 'Mine now' })).code).toBe(
        ErrorCode.NOT_FOUND
      );
      expect(catchError(() => store.captures.delete('bob', capture.id)).code).toBe(ErrorCode.NOT_FOUND);
      expect(store.captures.list('bob').total).toBe(0);
      expect(store.captures.get('alice', capture.id).title).toBe('Private');
    });
  });

  describe('hierarchy', () => {
    test('rejects a parent change that closes a cycle', () => {
      const a = store.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'a' });
      const b = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'b', parentId: a.id });
      const c = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'c', parentId: b.id });

      expect(catchError(() => store.captures.update('alice', a.id, { parentId: c.id })).code).toBe(
        ErrorCode.CYCLE_DETECTED
      );
      expect(catchError(() => store.captures.update('alice', a.id, { parentId: a.id })).code).toBe(
        ErrorCode.CYCLE_DETECTED
      );
      expect(store.captures.get('alice', a.id).parentId).toBeUndefined();
    });

    test('lists children and ancestors nearest first', () => {
      const root = store.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'root' });
      const mid = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'mid', parentId: root.id });
      const leaf = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'leaf', parentId: mid.id });
      const sibling = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'sib', parentId: root.id });

      expect(store.captures.getChildren('alice', root.id).map((c) => c.id)).toEqual([mid.id, sibling.id]);
      expect(store.captures.getAncestors('alice', leaf.id).map((c) => c.id)).toEqual([mid.id, root.id]);
      expect(store.captures.getAncestors('alice', root.id)).toEqual([]);
    });

    test('null parentId detaches a capture', () => {
      const root = store.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'root' });
      const child = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'child', parentId: root.id });

      const updated = store.captures.update('alice', child.id, { parentId: null });
      expect(updated.parentId).toBeUndefined();
      expect(store.captures.list('alice', { parentId: null }).total).toBe(2);
    });
  });

  describe('update', () => {
    test('merges the field patch and removes null keys', () => {
      const task = store.captures.create('alice', {
        captureType: CaptureType.TASK,
        title: 'Ship it',
        fields: {
          estimate: { kind: FieldKind.NUMBER, value: 3 },
          labels: { kind: FieldKind.LABELS, value: ['release'] },
        },
      });

      const updated = store.captures.update('alice', task.id, {
        status: CaptureStatus.IN_PROGRESS,
        fields: { estimate: null, dueDate: { kind: FieldKind.DATE, value: '2026-02-01' } },
      });

      expect(updated.status).toBe(CaptureStatus.IN_PROGRESS);
      expect(updated.fields).toEqual({
        labels: { kind: FieldKind.LABELS, value: ['release'] },
        dueDate: { kind: FieldKind.DATE, value: '2026-02-01' },
      });
      expect(updated.updatedAt > task.updatedAt).toBe(true);
    });

    test('a type change rejects fields the new type does not know', () => {
      const task = store.captures.create('alice', {
        captureType: CaptureType.TASK,
        title: 'Think',
        fields: { estimate: { kind: FieldKind.NUMBER, value: 2 } },
      });

      expect(catchError(() => store.captures.update('alice', task.id, { captureType: CaptureType.REFLECTION })).code).toBe(
        ErrorCode.INVALID_FIELD
      );

      const changed = store.captures.update('alice', task.id, {
        captureType: CaptureType.REFLECTION,
        fields: { estimate: null },
      });
      expect(changed.captureType).toBe(CaptureType.REFLECTION);
      expect(changed.fields).toEqual({});
    });

    test('raising an estimate past a sprint capacity is rejected', () => {
      const sprint = store.sprints.create('alice', { name: 'S1', capacity: 5 });
      const task = store.captures.create('alice', {
        captureType: CaptureType.TASK,
        title: 'Work',
        fields: { estimate: { kind: FieldKind.NUMBER, value: 3 } },
      });
      store.sprints.addCapture('alice', sprint.id, task.id);

      const error = catchError(() =>
        store.captures.update('alice', task.id, { fields: { estimate: { kind: FieldKind.NUMBER, value: 6 } } })
      );
      expect(error.code).toBe(ErrorCode.CAPACITY_EXCEEDED);
      expect(error.details).toMatchObject({ capacity: 5, currentLoad: 3, estimate: 6, projectedLoad: 6 });

      store.captures.update('alice', task.id, { fields: { estimate: { kind: FieldKind.NUMBER, value: 5 } } });
      expect(store.sprints.getLoad('alice', sprint.id).load).toBe(5);
    });
  });

  describe('delete', () => {
    test('re-parents children to the deleted capture parent', () => {
      const root = store.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'root' });
      const mid = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'mid', parentId: root.id });
      const leaf = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'leaf', parentId: mid.id });

      const result = store.captures.delete('alice', mid.id);

      expect(result.reparented).toEqual([leaf.id]);
      expect(store.captures.get('alice', leaf.id).parentId).toBe(root.id);
      expect(catchError(() => store.captures.get('alice', mid.id)).code).toBe(ErrorCode.NOT_FOUND);
    });

    test('children of a deleted root become roots', () => {
      const root = store.captures.create('alice', { captureType: CaptureType.PROJECT, title: 'root' });
      const child = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'child', parentId: root.id });

      store.captures.delete('alice', root.id);
      expect(store.captures.get('alice', child.id).parentId).toBeUndefined();
    });

    test('removes sprint membership and related-capture links', () => {
      const target = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'target' });
      const referrer = store.captures.create('alice', {
        captureType: CaptureType.IDEA,
        title: 'referrer',
        fields: { relatedCaptures: { kind: FieldKind.CAPTURES, value: [target.id] } },
      });
      const sprint = store.sprints.create('alice', { name: 'S1' });
      store.sprints.addCapture('alice', sprint.id, target.id);

      const result = store.captures.delete('alice', target.id);

      expect(result.removedFromSprints).toEqual([sprint.id]);
      expect(result.unlinkedFrom).toEqual([referrer.id]);
      expect(store.sprints.get('alice', sprint.id).captureIds).toEqual([]);
      expect(store.captures.get('alice', referrer.id).fields.relatedCaptures).toBeUndefined();
    });
  });

  describe('createFromTemplate', () => {
    test('copies defaults and ignores later template edits', () => {
      const template = store.templates.create('alice', {
        templateKind: TemplateKind.CAPTURE,
        name: 'Bug',
        captureType: CaptureType.TASK,
        defaultTitle: 'Bug report',
        defaultFields: {
          estimate: { kind: FieldKind.NUMBER, value: 2 },
          labels: { kind: FieldKind.LABELS, value: ['bug'] },
        },
        defaultContent: 'Steps to reproduce',
      });

      const capture = store.captures.createFromTemplate('alice', template.id, {
        fields: { estimate: { kind: FieldKind.NUMBER, value: 1 } },
      });
      store.templates.update('alice', template.id, {
        defaultFields: { labels: { kind: FieldKind.LABELS, value: ['changed'] } },
      });

      const stored = store.captures.get('alice', capture.id);
      expect(stored.title).toBe('Bug report');
      expect(stored.captureType).toBe(CaptureType.TASK);
      expect(stored.content).toBe('Steps to reproduce');
      expect(stored.templateId).toBe(template.id);
      expect(stored.fields).toEqual({
        estimate: { kind: FieldKind.NUMBER, value: 1 },
        labels: { kind: FieldKind.LABELS, value: ['bug'] },
      });
    });

    test('public templates of other principals can be instantiated', () => {
      const shared = store.templates.create('bob', {
        templateKind: TemplateKind.CAPTURE,
        name: 'Retro',
        captureType: CaptureType.REFLECTION,
        visibility: Visibility.PUBLIC,
      });
      const hidden = store.templates.create('bob', {
        templateKind: TemplateKind.CAPTURE,
        name: 'Secret',
        captureType: CaptureType.IDEA,
      });

      const capture = store.captures.createFromTemplate('alice', shared.id);
      expect(capture.owner).toBe('alice');
      expect(capture.title).toBe('Retro');
      expect(catchError(() => store.captures.createFromTemplate('alice', hidden.id)).code).toBe(ErrorCode.NOT_FOUND);
    });

    test('document templates cannot create captures', () => {
      const template = store.templates.create('alice', { templateKind: TemplateKind.DOCUMENT, name: 'Notes' });
      expect(catchError(() => store.captures.createFromTemplate('alice', template.id)).code).toBe(
        ErrorCode.TYPE_MISMATCH
      );
    });
  });

  describe('list', () => {
    test('composes a status set with tenant isolation', () => {
      const a1 = store.captures.create('alice', { captureType: CaptureType.TASK, title: 'a1', status: CaptureStatus.ACTIVE });
      store.captures.create('alice', { captureType: CaptureType.TASK, title: 'a2', status: CaptureStatus.COMPLETED });
      const a3 = store.captures.create('alice', { captureType: CaptureType.IDEA, title: 'a3', status: CaptureStatus.BLOCKED });
      store.captures.create('bob', { captureType: CaptureType.TASK, title: 'b1', status: CaptureStatus.ACTIVE });

      const page = store.captures.list('alice', { status: [CaptureStatus.ACTIVE, CaptureStatus.BLOCKED] });

      expect(page.items.map((c) => c.id)).toEqual([a1.id, a3.id]);
      expect(page.total).toBe(2);
      expect(page.hasMore).toBe(false);
    });
  });
});
