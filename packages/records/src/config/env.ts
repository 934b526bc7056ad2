/**
 * Environment Variable Configuration
 */

import { ValidationError, ErrorCode } from '@trellis/core';
import type { EnvVar, PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';

// ============================================================================
// Value Parsing
// ============================================================================

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parses a boolean from an environment variable value
 *
 * @returns Parsed boolean, or undefined if not a recognized boolean value
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) {
    return true;
  }
  if (FALSY_VALUES.has(lower)) {
    return false;
  }
  return undefined;
}

/**
 * Parses a non-negative integer, throwing for anything else
 */
export function parseEnvInteger(name: EnvVar, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(
      `Environment variable ${name} must be a non-negative integer, got '${value}'`,
      ErrorCode.INVALID_INPUT,
      { field: name, value, expected: 'integer' }
    );
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Splits a comma-separated list, dropping empty entries
 */
export function parseEnvList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ============================================================================
// Environment Configuration Loading
// ============================================================================

/**
 * Gets a non-empty environment variable value
 */
export function getEnvVar(name: EnvVar, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Loads configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfiguration {
  const config: PartialConfiguration = {};

  const database = getEnvVar(EnvVars.DATABASE, env);
  if (database !== undefined) {
    config.database = database;
  }

  const port = getEnvVar(EnvVars.PORT, env);
  if (port !== undefined) {
    config.server = { ...config.server, port: parseEnvInteger(EnvVars.PORT, port) };
  }

  const host = getEnvVar(EnvVars.HOST, env);
  if (host !== undefined) {
    config.server = { ...config.server, host };
  }

  const controllers = getEnvVar(EnvVars.CONTROLLERS, env);
  if (controllers !== undefined) {
    config.identity = { ...config.identity, controllers: parseEnvList(controllers) };
  }

  const authService = getEnvVar(EnvVars.AUTH_SERVICE, env);
  if (authService !== undefined) {
    config.identity = { ...config.identity, authService };
  }

  const trust = getEnvVar(EnvVars.TRUST_PRINCIPAL_HEADER, env);
  if (trust !== undefined) {
    const parsed = parseEnvBoolean(trust);
    if (parsed === undefined) {
      throw new ValidationError(
        `Environment variable ${EnvVars.TRUST_PRINCIPAL_HEADER} must be a boolean, got '${trust}'`,
        ErrorCode.INVALID_INPUT,
        { field: EnvVars.TRUST_PRINCIPAL_HEADER, value: trust, expected: 'boolean' }
      );
    }
    config.identity = { ...config.identity, trustPrincipalHeader: parsed };
  }

  const maxDepth = getEnvVar(EnvVars.MAX_DEPTH, env);
  if (maxDepth !== undefined) {
    config.hierarchy = { maxDepth: parseEnvInteger(EnvVars.MAX_DEPTH, maxDepth) };
  }

  return config;
}

/**
 * Gets the config file path override from environment
 */
export function getEnvConfigPath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return getEnvVar(EnvVars.CONFIG, env);
}
