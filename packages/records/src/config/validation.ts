/**
 * Configuration Validation
 */

import { ValidationError, ErrorCode, isValidPrincipalId } from '@trellis/core';
import type { Configuration, ConfigValidationResult, PartialConfiguration } from './types.js';
import { MAX_HIERARCHY_DEPTH, MAX_PORT, MAX_QUERY_LIMIT, MIN_PORT } from './defaults.js';

// ============================================================================
// Field Validators
// ============================================================================

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

export function isValidDatabase(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isValidPort(value: unknown): value is number {
  return isIntegerInRange(value, MIN_PORT, MAX_PORT);
}

export function isValidMaxDepth(value: unknown): value is number {
  return isIntegerInRange(value, 1, MAX_HIERARCHY_DEPTH);
}

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Collects every problem in a partial configuration
 */
export function checkPartialConfiguration(config: PartialConfiguration): string[] {
  const errors: string[] = [];

  if (config.database !== undefined && !isValidDatabase(config.database)) {
    errors.push('database must be a non-empty path or ":memory:"');
  }

  if (config.server?.port !== undefined && !isValidPort(config.server.port)) {
    errors.push(`server.port must be an integer between ${MIN_PORT} and ${MAX_PORT}`);
  }
  if (config.server?.host !== undefined && config.server.host.trim().length === 0) {
    errors.push('server.host cannot be empty');
  }

  for (const controller of config.identity?.controllers ?? []) {
    if (!isValidPrincipalId(controller)) {
      errors.push(`identity.controllers contains an invalid principal: '${controller}'`);
    }
  }
  if (config.identity?.authService !== undefined && config.identity.authService.trim().length === 0) {
    errors.push('identity.authService cannot be empty');
  }

  if (config.hierarchy?.maxDepth !== undefined && !isValidMaxDepth(config.hierarchy.maxDepth)) {
    errors.push(`hierarchy.maxDepth must be an integer between 1 and ${MAX_HIERARCHY_DEPTH}`);
  }

  const { defaultLimit, maxLimit } = config.query ?? {};
  if (defaultLimit !== undefined && !isIntegerInRange(defaultLimit, 1, MAX_QUERY_LIMIT)) {
    errors.push(`query.defaultLimit must be an integer between 1 and ${MAX_QUERY_LIMIT}`);
  }
  if (maxLimit !== undefined && !isIntegerInRange(maxLimit, 1, MAX_QUERY_LIMIT)) {
    errors.push(`query.maxLimit must be an integer between 1 and ${MAX_QUERY_LIMIT}`);
  }

  return errors;
}

/**
 * Checks a complete configuration without throwing
 */
export function checkConfiguration(config: Configuration): ConfigValidationResult {
  const errors = checkPartialConfiguration(config);
  if (config.query.defaultLimit > config.query.maxLimit) {
    errors.push('query.defaultLimit cannot exceed query.maxLimit');
  }
  return { valid: errors.length === 0, errors };
}

/**
 * Validates a complete configuration
 *
 * @throws ValidationError listing every problem found
 */
export function validateConfiguration(config: Configuration): Configuration {
  const result = checkConfiguration(config);
  if (!result.valid) {
    throw new ValidationError(
      `Invalid configuration: ${result.errors.join('; ')}`,
      ErrorCode.INVALID_INPUT,
      { errors: result.errors }
    );
  }
  return config;
}

/**
 * Validates a partial configuration (e.g. overrides) before merging
 */
export function validatePartialConfiguration(config: PartialConfiguration): PartialConfiguration {
  const errors = checkPartialConfiguration(config);
  if (errors.length > 0) {
    throw new ValidationError(
      `Invalid configuration: ${errors.join('; ')}`,
      ErrorCode.INVALID_INPUT,
      { errors }
    );
  }
  return config;
}
