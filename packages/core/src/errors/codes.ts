/**
 * Error codes for the Trellis record store.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** ID format invalid */
  INVALID_ID: 'INVALID_ID',
  /** Unknown status value */
  INVALID_STATUS: 'INVALID_STATUS',
  /** Title exceeds 500 characters */
  TITLE_TOO_LONG: 'TITLE_TOO_LONG',
  /** Required field missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Timestamp or date format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  /** Dynamic field fails the capture type's field schema */
  INVALID_FIELD: 'INVALID_FIELD',
  /** Folder tree shape invalid (duplicate ids, unknown parents) */
  INVALID_FOLDER_TREE: 'INVALID_FOLDER_TREE',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found
 */
export const NotFoundErrorCode = {
  /** Record does not resolve for the caller */
  NOT_FOUND: 'NOT_FOUND',
  /** Folder node missing from a workspace tree */
  FOLDER_NOT_FOUND: 'FOLDER_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes - State conflicts
 */
export const ConflictErrorCode = {
  /** Record with ID already exists */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  /** Linking would create a cycle */
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  /** Capture is already a member of the sprint */
  ALREADY_ASSIGNED: 'ALREADY_ASSIGNED',
  /** Capture is not a member of the sprint */
  NOT_ASSIGNED: 'NOT_ASSIGNED',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Constraint error codes - Business rule violations
 */
export const ConstraintErrorCode = {
  /** Referenced record missing or owned by another principal */
  DANGLING_REFERENCE: 'DANGLING_REFERENCE',
  /** Sprint load would exceed capacity */
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  /** Cannot remove a node that other records still reference */
  HAS_DEPENDENTS: 'HAS_DEPENDENTS',
  /** Hierarchy too deep */
  MAX_DEPTH_EXCEEDED: 'MAX_DEPTH_EXCEEDED',
  /** Record kind mismatch (e.g. document template used for a capture) */
  TYPE_MISMATCH: 'TYPE_MISMATCH',
} as const;

export type ConstraintErrorCode = typeof ConstraintErrorCode[keyof typeof ConstraintErrorCode];

/**
 * Storage error codes - Database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Snapshot export failed */
  EXPORT_FAILED: 'EXPORT_FAILED',
  /** Snapshot import failed */
  IMPORT_FAILED: 'IMPORT_FAILED',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * Identity error codes - Authentication and authorization errors
 */
export const IdentityErrorCode = {
  /** No principal could be resolved, or the anonymous principal was used */
  AUTHENTICATION_REQUIRED: 'AUTHENTICATION_REQUIRED',
  /** Access token rejected by the auth service */
  INVALID_ACCESS_TOKEN: 'INVALID_ACCESS_TOKEN',
  /** Auth service reference not configured or unreachable */
  AUTH_SERVICE_UNAVAILABLE: 'AUTH_SERVICE_UNAVAILABLE',
  /** Record is visible to the caller but owned by another principal */
  NOT_OWNER: 'NOT_OWNER',
  /** Operation restricted to controller principals */
  NOT_CONTROLLER: 'NOT_CONTROLLER',
} as const;

export type IdentityErrorCode = typeof IdentityErrorCode[keyof typeof IdentityErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...ConstraintErrorCode,
  ...StorageErrorCode,
  ...IdentityErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Maps error codes to HTTP status codes for API responses
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ID]: 400,
  [ErrorCode.INVALID_STATUS]: 400,
  [ErrorCode.TITLE_TOO_LONG]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_TIMESTAMP]: 400,
  [ErrorCode.INVALID_FIELD]: 400,
  [ErrorCode.INVALID_FOLDER_TREE]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.FOLDER_NOT_FOUND]: 404,

  // Conflict errors -> 409
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.CYCLE_DETECTED]: 409,
  [ErrorCode.ALREADY_ASSIGNED]: 409,
  [ErrorCode.NOT_ASSIGNED]: 409,

  // Constraint errors -> 400/409/422
  [ErrorCode.DANGLING_REFERENCE]: 422,
  [ErrorCode.CAPACITY_EXCEEDED]: 409,
  [ErrorCode.HAS_DEPENDENTS]: 409,
  [ErrorCode.MAX_DEPTH_EXCEEDED]: 400,
  [ErrorCode.TYPE_MISMATCH]: 400,

  // Storage errors -> 500/503
  [ErrorCode.DATABASE_ERROR]: 500,
  [ErrorCode.DATABASE_BUSY]: 503,
  [ErrorCode.EXPORT_FAILED]: 500,
  [ErrorCode.IMPORT_FAILED]: 422,
  [ErrorCode.MIGRATION_FAILED]: 500,

  // Identity errors -> 401/403/503
  [ErrorCode.AUTHENTICATION_REQUIRED]: 401,
  [ErrorCode.INVALID_ACCESS_TOKEN]: 401,
  [ErrorCode.AUTH_SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.NOT_OWNER]: 403,
  [ErrorCode.NOT_CONTROLLER]: 403,
};

/**
 * Returns the error category a code belongs to
 */
export function getErrorCategory(
  code: ErrorCode
): 'validation' | 'not_found' | 'conflict' | 'constraint' | 'storage' | 'identity' {
  if (code in ValidationErrorCode) return 'validation';
  if (code in NotFoundErrorCode) return 'not_found';
  if (code in ConflictErrorCode) return 'conflict';
  if (code in ConstraintErrorCode) return 'constraint';
  if (code in StorageErrorCode) return 'storage';
  return 'identity';
}
