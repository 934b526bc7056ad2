/**
 * ID Generation Implementation
 *
 * Generates unique, collision-resistant record identifiers using:
 * - SHA256 for hashing
 * - Base36 encoding for human-readable output
 * - Adaptive length based on store size
 * - A kind prefix so an id names the record kind it belongs to
 */

import { createHash } from 'node:crypto';
import { ValidationError, ConflictError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import {
  RECORD_ID_PREFIXES,
  RecordKind,
  asRecordId,
  kindFromId,
  type PrincipalId,
  type RecordId,
} from '../types/record.js';

// ============================================================================
// Constants
// ============================================================================

/** Base36 character set (0-9, a-z) */
export const BASE36_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';

/** Minimum hash length */
export const MIN_HASH_LENGTH = 3;

/** Maximum hash length */
export const MAX_HASH_LENGTH = 12;

/** Maximum nonce value for collision resolution */
export const MAX_NONCE = 9;

/** Record ID pattern: {prefix}-{3-12 base36 chars} */
export const RECORD_ID_PATTERN = /^(cap|spr|wsp|doc|tpl)-[0-9a-z]{3,12}$/;

// ============================================================================
// Types
// ============================================================================

/**
 * Components used to generate an ID hash
 */
export interface IdComponents {
  /** Primary identifier (title or name) */
  identifier: string;
  /** Principal creating the record */
  owner: PrincipalId;
  /** Nanosecond timestamp */
  timestampNs: bigint;
  /** Nonce for collision resolution (0-9) */
  nonce: number;
}

/**
 * Input for ID generation
 */
export interface IdGeneratorInput {
  /** Kind of record the id is for */
  kind: RecordKind;
  /** Primary identifier (title, name) */
  identifier: string;
  /** Principal creating the record */
  owner: PrincipalId;
  /** Optional timestamp override (for testing) */
  timestamp?: Date;
}

/**
 * Configuration for ID generation
 */
export interface IdGeneratorConfig {
  /** Hash length to use (3-12, default based on count) */
  hashLength?: number;
  /** Returns true when the candidate id is already taken */
  checkCollision?: (id: RecordId) => boolean;
  /** Current record count (for adaptive length) */
  recordCount?: number;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Checks if a string is a valid record ID
 */
export function isValidRecordId(value: unknown): value is RecordId {
  return typeof value === 'string' && RECORD_ID_PATTERN.test(value);
}

/**
 * Validates a record ID, optionally for a specific kind, and throws if invalid
 */
export function validateRecordId(value: unknown, field = 'id', kind?: RecordKind): RecordId {
  if (!isValidRecordId(value) || (kind !== undefined && kindFromId(value) !== kind)) {
    const expected = kind !== undefined
      ? `${RECORD_ID_PREFIXES[kind]}-{3-12 base36 chars}`
      : '{cap|spr|wsp|doc|tpl}-{3-12 base36 chars}';
    throw new ValidationError(
      `Invalid ${field}: ${String(value)}`,
      ErrorCode.INVALID_ID,
      { field, value, expected }
    );
  }
  return value;
}

// ============================================================================
// Hash Utilities
// ============================================================================

/**
 * Computes SHA256 hash of input string
 */
export function sha256(input: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(input, 'utf8').digest());
}

/**
 * Converts a byte array to Base36 string
 */
export function toBase36(bytes: Uint8Array): string {
  let num = BigInt(0);
  for (const byte of bytes) {
    num = (num << BigInt(8)) | BigInt(byte);
  }

  if (num === BigInt(0)) {
    return '0';
  }

  let result = '';
  const base = BigInt(36);
  while (num > BigInt(0)) {
    const remainder = Number(num % base);
    result = BASE36_CHARS[remainder] + result;
    num = num / base;
  }

  return result;
}

/**
 * Truncates a hash string to specified length
 */
export function truncateHash(hash: string, length: number): string {
  const clampedLength = Math.max(MIN_HASH_LENGTH, Math.min(MAX_HASH_LENGTH, length));
  return hash.substring(0, clampedLength);
}

// ============================================================================
// Adaptive Length Calculation
// ============================================================================

/**
 * Birthday paradox thresholds for ~1% collision probability
 */
const LENGTH_THRESHOLDS: [number, number][] = [
  [4, 500],
  [5, 3000],
  [6, 20000],
  [7, 100000],
  [8, 1000000],
  [10, Infinity],
];

/**
 * Calculates the appropriate ID length based on record count
 */
export function calculateIdLength(recordCount: number): number {
  for (const [length, threshold] of LENGTH_THRESHOLDS) {
    if (recordCount < threshold) {
      return length;
    }
  }
  return MAX_HASH_LENGTH;
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generates a hash from ID components
 */
export function generateIdHash(components: IdComponents): string {
  const input = [
    components.identifier,
    components.owner,
    components.timestampNs.toString(),
    components.nonce.toString(),
  ].join('|');

  return toBase36(sha256(input));
}

function getTimestampNs(date?: Date): bigint {
  const ms = date ? date.getTime() : Date.now();
  const hrTime = typeof performance !== 'undefined' ? performance.now() : 0;
  const nanos = BigInt(Math.floor(hrTime * 1000000) % 1000000);
  return BigInt(ms) * BigInt(1000000) + nanos;
}

/**
 * Generates a new record ID
 *
 * Algorithm:
 * 1. Concatenate identifier, owner, timestamp, nonce
 * 2. Compute SHA256 hash and encode as Base36
 * 3. Truncate to adaptive length and add the kind prefix
 * 4. On collision, increment nonce; when nonces run out, lengthen the hash
 */
export function generateId(
  input: IdGeneratorInput,
  config: IdGeneratorConfig = {}
): RecordId {
  const {
    hashLength = config.recordCount !== undefined
      ? calculateIdLength(config.recordCount)
      : MIN_HASH_LENGTH + 3,
    checkCollision,
  } = config;

  const prefix = RECORD_ID_PREFIXES[input.kind];
  const timestampNs = getTimestampNs(input.timestamp);
  let currentLength = hashLength;

  while (currentLength <= MAX_HASH_LENGTH) {
    for (let nonce = 0; nonce <= MAX_NONCE; nonce++) {
      const fullHash = generateIdHash({
        identifier: input.identifier,
        owner: input.owner,
        timestampNs,
        nonce,
      });
      const id = asRecordId(`${prefix}-${truncateHash(fullHash, currentLength)}`);

      if (!checkCollision || !checkCollision(id)) {
        return id;
      }
    }
    currentLength++;
  }

  throw new ConflictError(
    'Unable to generate unique ID after exhausting all collision resolution attempts',
    ErrorCode.ALREADY_EXISTS,
    {
      identifier: input.identifier,
      owner: input.owner,
      recordKind: input.kind,
    }
  );
}
