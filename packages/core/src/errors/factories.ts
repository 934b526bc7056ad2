import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  IdentityError,
  ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for a record that doesn't resolve for the caller
 */
export function notFound(
  kind: string,
  id: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`${capitalize(kind)} not found: ${id}`, ErrorCode.NOT_FOUND, {
    recordId: id,
    recordKind: kind,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a folder node missing from a workspace tree
 */
export function folderNotFound(
  workspaceId: string,
  folderId: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(
    `Folder ${folderId} not found in workspace ${workspaceId}`,
    ErrorCode.FOLDER_NOT_FOUND,
    { recordId: workspaceId, folderId, ...details }
  );
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  const valueStr = truncateValue(value);
  return new ValidationError(
    `Invalid ${field}: ${valueStr}`,
    ErrorCode.INVALID_INPUT,
    {
      field,
      value,
      expected,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for a dynamic field rejected by the field schema
 */
export function invalidField(
  field: string,
  reason: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid field "${field}": ${reason}`,
    ErrorCode.INVALID_FIELD,
    { field, ...details }
  );
}

/**
 * Creates a ValidationError for an unknown status value
 */
export function invalidStatus(
  value: unknown,
  validStatuses: readonly string[],
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid status: ${truncateValue(value)}`,
    ErrorCode.INVALID_STATUS,
    {
      field: 'status',
      value,
      expected: validStatuses,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for title that's too long
 */
export function titleTooLong(length: number, maxLength = 500): ValidationError {
  return new ValidationError(
    `Title too long: ${length} characters (max ${maxLength})`,
    ErrorCode.TITLE_TOO_LONG,
    {
      field: 'title',
      actual: length,
      expected: `<= ${maxLength}`,
    }
  );
}

/**
 * Creates a ValidationError for missing required field
 */
export function missingRequiredField(field: string): ValidationError {
  return new ValidationError(
    `Missing required field: ${field}`,
    ErrorCode.MISSING_REQUIRED_FIELD,
    { field }
  );
}

/**
 * Creates a ValidationError for invalid timestamp or date format
 */
export function invalidTimestamp(
  field: string,
  value: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_TIMESTAMP,
    {
      field,
      value,
      expected: 'YYYY-MM-DD or ISO 8601 timestamp',
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for a malformed workspace folder tree
 */
export function invalidFolderTree(reason: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid folder tree: ${reason}`,
    ErrorCode.INVALID_FOLDER_TREE,
    { field: 'folderTree', ...details }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for duplicate record
 */
export function alreadyExists(
  kind: string,
  id: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `${capitalize(kind)} already exists: ${id}`,
    ErrorCode.ALREADY_EXISTS,
    { recordId: id, recordKind: kind, ...details }
  );
}

/**
 * Creates a ConflictError for a link that would close a cycle
 */
export function cycleDetected(
  childId: string,
  parentId: string,
  cyclePath: string[] = [],
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Linking ${childId} under ${parentId} would create a cycle`,
    ErrorCode.CYCLE_DETECTED,
    {
      recordId: childId,
      parentId,
      cyclePath,
      ...details,
    }
  );
}

/**
 * Creates a ConflictError for a capture already in a sprint
 */
export function alreadyAssigned(
  sprintId: string,
  captureId: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Capture ${captureId} is already assigned to sprint ${sprintId}`,
    ErrorCode.ALREADY_ASSIGNED,
    { recordId: sprintId, captureId, ...details }
  );
}

/**
 * Creates a ConflictError for removing a capture that is not in the sprint
 */
export function notAssigned(
  sprintId: string,
  captureId: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Capture ${captureId} is not assigned to sprint ${sprintId}`,
    ErrorCode.NOT_ASSIGNED,
    { recordId: sprintId, captureId, ...details }
  );
}

// =============================================================================
// Constraint Factories
// =============================================================================

/**
 * Creates a ConstraintError for a reference that does not resolve to an owned record
 */
export function danglingReference(
  field: string,
  kind: string,
  id: string,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `${field} references unknown ${kind}: ${id}`,
    ErrorCode.DANGLING_REFERENCE,
    { field, recordKind: kind, value: id, ...details }
  );
}

/**
 * Capacity figures attached to a CAPACITY_EXCEEDED error
 */
export interface CapacityDetails {
  capacity: number;
  currentLoad: number;
  estimate: number;
  projectedLoad: number;
}

/**
 * Creates a ConstraintError for a sprint load that would exceed capacity
 */
export function capacityExceeded(
  sprintId: string,
  figures: CapacityDetails,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Sprint ${sprintId} capacity exceeded: ${figures.projectedLoad} > ${figures.capacity}`,
    ErrorCode.CAPACITY_EXCEEDED,
    { recordId: sprintId, ...figures, ...details }
  );
}

/**
 * Creates a ConstraintError for a node with dependents
 */
export function hasDependents(
  id: string,
  dependentCount: number,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Cannot remove ${id}: ${dependentCount} dependent(s) still reference it`,
    ErrorCode.HAS_DEPENDENTS,
    { recordId: id, actual: dependentCount, ...details }
  );
}

/**
 * Creates a ConstraintError for max depth exceeded
 */
export function maxDepthExceeded(
  depth: number,
  maxDepth = 100,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Maximum hierarchy depth exceeded: ${depth} (max ${maxDepth})`,
    ErrorCode.MAX_DEPTH_EXCEEDED,
    { actual: depth, expected: `<= ${maxDepth}`, ...details }
  );
}

/**
 * Creates a ConstraintError for a template used for the wrong record kind
 */
export function typeMismatch(
  templateId: string,
  expected: string,
  actual: string,
  details: ErrorDetails = {}
): ConstraintError {
  return new ConstraintError(
    `Template ${templateId} is a ${actual} template, expected ${expected}`,
    ErrorCode.TYPE_MISMATCH,
    { recordId: templateId, expected, actual, ...details }
  );
}

// =============================================================================
// Identity Factories
// =============================================================================

/**
 * Creates an IdentityError for a mutation on a record owned by someone else
 */
export function notOwner(
  kind: string,
  id: string,
  details: ErrorDetails = {}
): IdentityError {
  return new IdentityError(
    `${capitalize(kind)} ${id} is not owned by the caller`,
    ErrorCode.NOT_OWNER,
    { recordId: id, recordKind: kind, ...details }
  );
}

/**
 * Creates an IdentityError for a missing or anonymous caller
 */
export function authenticationRequired(details: ErrorDetails = {}): IdentityError {
  return new IdentityError(
    'Authentication required',
    ErrorCode.AUTHENTICATION_REQUIRED,
    details
  );
}

/**
 * Creates an IdentityError for an operation restricted to controllers
 */
export function notController(principal: string, details: ErrorDetails = {}): IdentityError {
  return new IdentityError(
    `Principal ${principal} is not a controller`,
    ErrorCode.NOT_CONTROLLER,
    { value: principal, ...details }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for database operations
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Database error: ${message}`,
    ErrorCode.DATABASE_ERROR,
    details,
    cause
  );
}

/**
 * Creates a StorageError for export failures
 */
export function exportFailed(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Export failed: ${message}`,
    ErrorCode.EXPORT_FAILED,
    details,
    cause
  );
}

/**
 * Creates a StorageError for import failures
 */
export function importFailed(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Import failed: ${message}`,
    ErrorCode.IMPORT_FAILED,
    details,
    cause
  );
}

/**
 * Creates a StorageError for migration failures
 */
export function migrationFailed(
  version: number,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Migration to version ${version} failed: ${message}`,
    ErrorCode.MIGRATION_FAILED,
    { ...details, version },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
