/**
 * Error handling module for Trellis
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the stores, HTTP routes, and storage layer.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  StorageErrorCode,
  IdentityErrorCode,
  ErrorHttpStatus,
  getErrorCategory,
} from './codes.js';

// Error classes
export {
  TrellisError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  StorageError,
  IdentityError,
  isTrellisError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isConstraintError,
  isStorageError,
  isIdentityError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  notFound,
  folderNotFound,
  // Validation
  invalidInput,
  invalidField,
  invalidStatus,
  titleTooLong,
  missingRequiredField,
  invalidTimestamp,
  invalidFolderTree,
  // Conflict
  alreadyExists,
  cycleDetected,
  alreadyAssigned,
  notAssigned,
  // Constraint
  danglingReference,
  capacityExceeded,
  hasDependents,
  maxDepthExceeded,
  typeMismatch,
  type CapacityDetails,
  // Identity
  notOwner,
  authenticationRequired,
  notController,
  // Storage
  databaseError,
  exportFailed,
  importFailed,
  migrationFailed,
} from './factories.js';
