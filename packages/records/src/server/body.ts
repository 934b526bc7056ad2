/**
 * Typed access to a parsed JSON request body
 *
 * Only the JSON shape is checked here; value rules stay with the stores.
 */

import {
  ErrorCode,
  ValidationError,
  validateRecordId,
  type RecordId,
  type RecordKind,
} from '@trellis/core';

export class BodyReader {
  constructor(private readonly body: Record<string, unknown>) {}

  has(key: string): boolean {
    return this.body[key] !== undefined;
  }

  string(key: string): string {
    const value = this.body[key];
    if (value === undefined || value === null) {
      throw new ValidationError(`${key} is required`, ErrorCode.MISSING_REQUIRED_FIELD, { field: key });
    }
    return this.expectString(key, value);
  }

  optionalString(key: string): string | undefined {
    const value = this.body[key];
    return value === undefined ? undefined : this.expectString(key, value);
  }

  /** null is passed through to clear the value */
  nullableString(key: string): string | null | undefined {
    const value = this.body[key];
    return value === undefined || value === null ? value : this.expectString(key, value);
  }

  optionalNumber(key: string): number | undefined {
    const value = this.body[key];
    return value === undefined ? undefined : this.expectNumber(key, value);
  }

  nullableNumber(key: string): number | null | undefined {
    const value = this.body[key];
    return value === undefined || value === null ? value : this.expectNumber(key, value);
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.body[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw this.typeError(key, value, 'boolean');
    }
    return value;
  }

  optionalObject(key: string): Record<string, unknown> | undefined {
    const value = this.body[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw this.typeError(key, value, 'object');
    }
    return Object.fromEntries(Object.entries(value));
  }

  optionalArray(key: string): unknown[] | undefined {
    const value = this.body[key];
    if (value === undefined) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      throw this.typeError(key, value, 'list');
    }
    const items: unknown[] = value;
    return items;
  }

  optionalStringList(key: string): string[] | undefined {
    return this.optionalArray(key)?.map((item) => this.expectString(key, item));
  }

  /**
   * Reads a value through a core validator, e.g. an enum
   */
  optional<T>(key: string, validate: (value: unknown) => T): T | undefined {
    const value = this.body[key];
    return value === undefined ? undefined : validate(value);
  }

  optionalId(key: string, kind: RecordKind): RecordId | undefined {
    const value = this.body[key];
    return value === undefined ? undefined : validateRecordId(value, key, kind);
  }

  nullableId(key: string, kind: RecordKind): RecordId | null | undefined {
    const value = this.body[key];
    return value === undefined || value === null ? value : validateRecordId(value, key, kind);
  }

  private expectString(key: string, value: unknown): string {
    if (typeof value !== 'string') {
      throw this.typeError(key, value, 'string');
    }
    return value;
  }

  private expectNumber(key: string, value: unknown): number {
    if (typeof value !== 'number') {
      throw this.typeError(key, value, 'number');
    }
    return value;
  }

  private typeError(key: string, value: unknown, expected: string): ValidationError {
    return new ValidationError(`${key} must be a ${expected}`, ErrorCode.INVALID_INPUT, {
      field: key,
      value,
      expected,
    });
  }
}
