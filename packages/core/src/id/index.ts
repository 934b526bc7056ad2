/**
 * ID Generation System
 *
 * Provides unique, kind-prefixed identifiers for all records.
 */

export {
  // Types
  type IdComponents,
  type IdGeneratorInput,
  type IdGeneratorConfig,

  // Constants
  BASE36_CHARS,
  MIN_HASH_LENGTH,
  MAX_HASH_LENGTH,
  MAX_NONCE,
  RECORD_ID_PATTERN,

  // Validation
  isValidRecordId,
  validateRecordId,

  // Hash utilities
  sha256,
  toBase36,
  truncateHash,

  // ID Generation
  generateIdHash,
  generateId,

  // Length calculation
  calculateIdLength,
} from './generator.js';
