import { describe, expect, test } from 'vitest';
import { createSprint, describeLoad, validateCapacity, SprintStatus } from './sprint.js';
import { asPrincipalId, asRecordId } from './record.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

const context = {
  id: asRecordId('spr-abc123'),
  owner: asPrincipalId('alice'),
  now: '2026-04-01T08:00:00.000Z',
};

describe('createSprint', () => {
  test('defaults to Planning with no members', () => {
    const sprint = createSprint({ name: 'Sprint 1', capacity: 10 }, context);
    expect(sprint.status).toBe(SprintStatus.PLANNING);
    expect(sprint.captureIds).toEqual([]);
    expect(sprint.capacity).toBe(10);
  });

  test('rejects a start after the end', () => {
    try {
      createSprint({ name: 'S', startDate: '2026-05-10', endDate: '2026-05-01' }, context);
      throw new Error('expected failure');
    } catch (err) {
      expect((err as ValidationError).code).toBe(ErrorCode.INVALID_TIMESTAMP);
    }
  });

  test('rejects negative or fractional capacity', () => {
    expect(() => validateCapacity(-1)).toThrow(ValidationError);
    expect(() => validateCapacity(1.5)).toThrow(ValidationError);
    expect(validateCapacity(0)).toBe(0);
  });
});

describe('describeLoad', () => {
  test('computes remaining capacity', () => {
    const sprint = createSprint({ name: 'S', capacity: 10 }, context);
    expect(describeLoad(sprint, 7)).toEqual({ sprint, load: 7, capacity: 10, remaining: 3 });
  });

  test('reports null without a capacity', () => {
    const sprint = createSprint({ name: 'S' }, context);
    expect(describeLoad(sprint, 7)).toEqual({ sprint, load: 7, capacity: null, remaining: null });
  });
});
