/**
 * Sprint Type - time-boxed groupings of captures with capacity accounting
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import type { NewRecordContext } from './capture.js';
import {
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  dateValueToMillis,
  validateDateValue,
  validateEnumValue,
  validateName,
  validateOptionalText,
  type BaseRecord,
  type RecordId,
} from './record.js';

// ============================================================================
// Sprint Status
// ============================================================================

export const SprintStatus = {
  PLANNING: 'Planning',
  ACTIVE: 'Active',
  REVIEW: 'Review',
  COMPLETED: 'Completed',
  CANCELLED: 'Cancelled',
} as const;

export type SprintStatus = (typeof SprintStatus)[keyof typeof SprintStatus];

export const DEFAULT_SPRINT_STATUS: SprintStatus = SprintStatus.PLANNING;

/** Upper bound on sprint capacity */
export const MAX_SPRINT_CAPACITY = 1_000_000;

// ============================================================================
// Sprint Interface
// ============================================================================

export interface Sprint extends BaseRecord {
  readonly kind: typeof RecordKind.SPRINT;
  name: string;
  goal?: string;
  status: SprintStatus;
  startDate?: string;
  endDate?: string;
  /** Maximum total estimate of member captures */
  capacity?: number;
  /** Member captures in assignment order */
  captureIds: RecordId[];
}

/**
 * Capacity accounting returned when membership changes
 */
export interface SprintLoad {
  sprint: Sprint;
  /** Sum of member estimates (missing estimate = 0) */
  load: number;
  capacity: number | null;
  /** capacity - load, or null when the sprint has no capacity */
  remaining: number | null;
}

// ============================================================================
// Validation Functions
// ============================================================================

export function validateSprintStatus(value: unknown): SprintStatus {
  return validateEnumValue(value, Object.values(SprintStatus), 'status', ErrorCode.INVALID_STATUS);
}

export function isValidCapacity(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_SPRINT_CAPACITY
  );
}

export function validateCapacity(value: unknown): number {
  if (!isValidCapacity(value)) {
    throw new ValidationError(
      `Invalid capacity: ${String(value)}. Must be a non-negative integer`,
      ErrorCode.INVALID_INPUT,
      { field: 'capacity', value, expected: `0..${MAX_SPRINT_CAPACITY}` }
    );
  }
  return value;
}

/**
 * Checks that the start date is not after the end date
 */
export function validateSprintDates(startDate: string | undefined, endDate: string | undefined): void {
  if (startDate !== undefined && endDate !== undefined && dateValueToMillis(startDate) > dateValueToMillis(endDate)) {
    throw new ValidationError(
      'Sprint startDate must not be after endDate',
      ErrorCode.INVALID_TIMESTAMP,
      { field: 'startDate', value: startDate, expected: `<= ${endDate}` }
    );
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateSprintInput {
  name: string;
  goal?: string;
  /** Default: Planning */
  status?: SprintStatus;
  startDate?: string;
  endDate?: string;
  capacity?: number;
}

export function createSprint(input: CreateSprintInput, context: NewRecordContext): Sprint {
  const name = validateName(input.name);
  const goal = validateOptionalText(input.goal, 'goal', MAX_DESCRIPTION_LENGTH);
  const status = input.status !== undefined ? validateSprintStatus(input.status) : DEFAULT_SPRINT_STATUS;
  const startDate = input.startDate !== undefined ? validateDateValue(input.startDate, 'startDate') : undefined;
  const endDate = input.endDate !== undefined ? validateDateValue(input.endDate, 'endDate') : undefined;
  validateSprintDates(startDate, endDate);
  const capacity = input.capacity !== undefined ? validateCapacity(input.capacity) : undefined;

  return {
    id: context.id,
    kind: RecordKind.SPRINT,
    owner: context.owner,
    createdAt: context.now,
    updatedAt: context.now,
    name,
    status,
    captureIds: [],
    ...(goal !== undefined && { goal }),
    ...(startDate !== undefined && { startDate }),
    ...(endDate !== undefined && { endDate }),
    ...(capacity !== undefined && { capacity }),
  };
}

/**
 * Partial sprint update. `null` clears an optional value.
 */
export interface UpdateSprintInput {
  name?: string;
  goal?: string | null;
  status?: SprintStatus;
  startDate?: string | null;
  endDate?: string | null;
  capacity?: number | null;
}

/**
 * Builds the capacity view of a sprint for a known load
 */
export function describeLoad(sprint: Sprint, load: number): SprintLoad {
  const capacity = sprint.capacity ?? null;
  return {
    sprint,
    load,
    capacity,
    remaining: capacity === null ? null : capacity - load,
  };
}
