import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  CaptureType,
  ErrorCode,
  FieldKind,
  SprintStatus,
  isTrellisError,
  type Capture,
  type TrellisError,
} from '@trellis/core';
import { openStorage } from '@trellis/storage';
import { createRecordStore } from '../api/record-store.js';
import type { RecordStore } from '../api/types.js';

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

describe('SprintStore', () => {
  let store: RecordStore;

  function task(owner: string, title: string, estimate?: number): Capture {
    return store.captures.create(owner, {
      captureType: CaptureType.TASK,
      title,
      ...(estimate !== undefined && { fields: { estimate: { kind: FieldKind.NUMBER, value: estimate } } }),
    });
  }

  beforeEach(() => {
    store = createRecordStore({ backend: openStorage({ path: ':memory:' }) });
  });

  afterEach(() => {
    store.close();
  });

  test('create applies defaults and validates dates', () => {
    const sprint = store.sprints.create('alice', { name: 'Sprint 1', capacity: 10 });
    expect(sprint.id.startsWith('spr-')).toBe(true);
    expect(sprint.status).toBe(SprintStatus.PLANNING);
    expect(sprint.captureIds).toEqual([]);
    expect(sprint.capacity).toBe(10);

    expect(
      catchError(() => store.sprints.create('alice', { name: 'Bad', startDate: '2026-03-10', endDate: '2026-03-01' }))
        .code
    ).toBe(ErrorCode.INVALID_TIMESTAMP);
    expect(catchError(() => store.sprints.create('alice', { name: 'Bad', capacity: -1 })).code).toBe(
      ErrorCode.INVALID_INPUT
    );
  });

  describe('addCapture', () => {
    test('keeps assignment order and reports the load', () => {
      const sprint = store.sprints.create('alice', { name: 'S', capacity: 8 });
      const first = task('alice', 'first', 3);
      const second = task('alice', 'second');

      store.sprints.addCapture('alice', sprint.id, first.id);
      const load = store.sprints.addCapture('alice', sprint.id, second.id);

      expect(load.load).toBe(3);
      expect(load.capacity).toBe(8);
      expect(load.remaining).toBe(5);
      expect(load.sprint.captureIds).toEqual([first.id, second.id]);
      expect(store.sprints.get('alice', sprint.id).captureIds).toEqual([first.id, second.id]);
    });

    test('a duplicate add is rejected and leaves one membership', () => {
      const sprint = store.sprints.create('alice', { name: 'S' });
      const capture = task('alice', 'only', 2);
      store.sprints.addCapture('alice', sprint.id, capture.id);

      const error = catchError(() => store.sprints.addCapture('alice', sprint.id, capture.id));

      expect(error.code).toBe(ErrorCode.ALREADY_ASSIGNED);
      expect(store.sprints.get('alice', sprint.id).captureIds).toEqual([capture.id]);
      expect(store.sprints.getLoad('alice', sprint.id).load).toBe(2);
    });

    test('an addition over capacity is rejected with the figures', () => {
      const sprint = store.sprints.create('alice', { name: 'S', capacity: 5 });
      const a = task('alice', 'a', 4);
      const b = task('alice', 'b', 2);
      store.sprints.addCapture('alice', sprint.id, a.id);

      const error = catchError(() => store.sprints.addCapture('alice', sprint.id, b.id));

      expect(error.code).toBe(ErrorCode.CAPACITY_EXCEEDED);
      expect(error.details).toMatchObject({ capacity: 5, currentLoad: 4, estimate: 2, projectedLoad: 6 });
      expect(store.sprints.get('alice', sprint.id).captureIds).toEqual([a.id]);
    });

    test('a capture of another principal is a dangling reference', () => {
      const sprint = store.sprints.create('alice', { name: 'S' });
      const foreign = task('bob', 'foreign');

      expect(catchError(() => store.sprints.addCapture('alice', sprint.id, foreign.id)).code).toBe(
        ErrorCode.DANGLING_REFERENCE
      );
      expect(catchError(() => store.sprints.addCapture('bob', sprint.id, foreign.id)).code).toBe(ErrorCode.NOT_FOUND);
    });
  });

  describe('removeCapture', () => {
    test('removing a non-member fails and changes nothing', () => {
      const sprint = store.sprints.create('alice', { name: 'S' });
      const member = task('alice', 'member', 1);
      store.sprints.addCapture('alice', sprint.id, member.id);
      const before = store.sprints.get('alice', sprint.id);

      store.sprints.removeCapture('alice', sprint.id, member.id);
      const error = catchError(() => store.sprints.removeCapture('alice', sprint.id, member.id));

      expect(error.code).toBe(ErrorCode.NOT_ASSIGNED);
      const after = store.sprints.get('alice', sprint.id);
      expect(after.captureIds).toEqual([]);
      expect(after.updatedAt > before.updatedAt).toBe(true);
      expect(store.sprints.get('alice', sprint.id)).toEqual(after);
    });
  });

  describe('update', () => {
    test('lowering capacity below the load is rejected', () => {
      const sprint = store.sprints.create('alice', { name: 'S', capacity: 10 });
      store.sprints.addCapture('alice', sprint.id, task('alice', 'big', 6).id);

      expect(catchError(() => store.sprints.update('alice', sprint.id, { capacity: 5 })).code).toBe(
        ErrorCode.CAPACITY_EXCEEDED
      );
      expect(store.sprints.update('alice', sprint.id, { capacity: 6 }).capacity).toBe(6);
      expect(store.sprints.update('alice', sprint.id, { capacity: null }).capacity).toBeUndefined();
      expect(store.sprints.getLoad('alice', sprint.id)).toMatchObject({ load: 6, capacity: null, remaining: null });
    });

    test('changes status and goal', () => {
      const sprint = store.sprints.create('alice', { name: 'S', goal: 'Ship' });
      const updated = store.sprints.update('alice', sprint.id, { status: SprintStatus.ACTIVE, goal: null });
      expect(updated.status).toBe(SprintStatus.ACTIVE);
      expect(updated.goal).toBeUndefined();
    });
  });

  test('delete discards membership and keeps the captures', () => {
    const sprint = store.sprints.create('alice', { name: 'S' });
    const member = task('alice', 'member', 1);
    store.sprints.addCapture('alice', sprint.id, member.id);

    const result = store.sprints.delete('alice', sprint.id);

    expect(result).toEqual({ id: sprint.id, releasedCaptures: [member.id] });
    expect(catchError(() => store.sprints.get('alice', sprint.id)).code).toBe(ErrorCode.NOT_FOUND);
    expect(store.captures.get('alice', member.id).id).toBe(member.id);
    expect(store.audit().valid).toBe(true);
  });

  test('list returns only the caller sprints', () => {
    store.sprints.create('alice', { name: 'A1' });
    store.sprints.create('bob', { name: 'B1' });
    store.sprints.create('alice', { name: 'A2' });

    expect(store.sprints.list('alice').items.map((s) => s.name)).toEqual(['A1', 'A2']);
  });
});
