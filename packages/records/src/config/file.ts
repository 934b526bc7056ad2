/**
 * Configuration File Loading
 *
 * YAML configuration discovery and parsing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode } from '@trellis/core';
import type { ConfigFileDiscovery, PartialConfiguration, YamlConfigFile } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name */
export const CONFIG_FILE_NAME = 'config.yaml';

/** Project directory holding the config file */
export const TRELLIS_DIR = '.trellis';

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Finds the nearest .trellis directory by walking up from the given directory.
 */
export function findTrellisDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, TRELLIS_DIR);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

/**
 * Discovers the configuration file location
 *
 * @param overridePath - Explicit path; used as-is when given
 * @param startDir - Directory to start searching from (default: cwd)
 */
export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(overridePath);
    return { path: resolvedPath, exists: fs.existsSync(resolvedPath) };
  }

  const trellisDir = findTrellisDir(startDir);
  if (!trellisDir) {
    return { exists: false };
  }
  const configPath = path.join(trellisDir, CONFIG_FILE_NAME);
  return { path: configPath, exists: fs.existsSync(configPath) };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function invalid(message: string, field: string, value: unknown): ValidationError {
  return new ValidationError(message, ErrorCode.INVALID_INPUT, { field, value });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw invalid(`Configuration section '${key}' must be a mapping`, key, value);
  }
  return value;
}

function readString(source: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`Configuration value '${field}' must be a string`, field, value);
  }
  return value;
}

function readNumber(source: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw invalid(`Configuration value '${field}' must be a number`, field, value);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalid(`Configuration value '${field}' must be a boolean`, field, value);
  }
  return value;
}

function readStringList(source: Record<string, unknown>, key: string, field: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(`Configuration value '${field}' must be a list of strings`, field, value);
  }
  return [...value];
}

/**
 * Parses YAML content into a config file structure, checking every value's type
 *
 * @param filePath - Path to file (for error messages)
 */
export function parseYamlConfig(content: string, filePath?: string): YamlConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${filePath ? ` (${filePath})` : ''}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath }
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(
      `Configuration file must contain a mapping${filePath ? ` (${filePath})` : ''}`,
      ErrorCode.INVALID_INPUT,
      { value: parsed }
    );
  }

  const result: YamlConfigFile = {};
  const database = readString(parsed, 'database', 'database');
  if (database !== undefined) result.database = database;

  const server = readSection(parsed, 'server');
  if (server) {
    result.server = {};
    const port = readNumber(server, 'port', 'server.port');
    if (port !== undefined) result.server.port = port;
    const host = readString(server, 'host', 'server.host');
    if (host !== undefined) result.server.host = host;
    const corsOrigins = readStringList(server, 'cors_origins', 'server.cors_origins');
    if (corsOrigins !== undefined) result.server.cors_origins = corsOrigins;
  }

  const identity = readSection(parsed, 'identity');
  if (identity) {
    result.identity = {};
    const controllers = readStringList(identity, 'controllers', 'identity.controllers');
    if (controllers !== undefined) result.identity.controllers = controllers;
    const authService = readString(identity, 'auth_service', 'identity.auth_service');
    if (authService !== undefined) result.identity.auth_service = authService;
    const trust = readBoolean(identity, 'trust_principal_header', 'identity.trust_principal_header');
    if (trust !== undefined) result.identity.trust_principal_header = trust;
  }

  const hierarchy = readSection(parsed, 'hierarchy');
  if (hierarchy) {
    result.hierarchy = {};
    const maxDepth = readNumber(hierarchy, 'max_depth', 'hierarchy.max_depth');
    if (maxDepth !== undefined) result.hierarchy.max_depth = maxDepth;
  }

  const query = readSection(parsed, 'query');
  if (query) {
    result.query = {};
    const defaultLimit = readNumber(query, 'default_limit', 'query.default_limit');
    if (defaultLimit !== undefined) result.query.default_limit = defaultLimit;
    const maxLimit = readNumber(query, 'max_limit', 'query.max_limit');
    if (maxLimit !== undefined) result.query.max_limit = maxLimit;
  }

  return result;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase)
 */
export function convertYamlToConfig(yamlConfig: YamlConfigFile): PartialConfiguration {
  const result: PartialConfiguration = {};

  if (yamlConfig.database !== undefined) {
    result.database = yamlConfig.database;
  }

  if (yamlConfig.server) {
    result.server = {};
    if (yamlConfig.server.port !== undefined) result.server.port = yamlConfig.server.port;
    if (yamlConfig.server.host !== undefined) result.server.host = yamlConfig.server.host;
    if (yamlConfig.server.cors_origins !== undefined) result.server.corsOrigins = yamlConfig.server.cors_origins;
  }

  if (yamlConfig.identity) {
    result.identity = {};
    if (yamlConfig.identity.controllers !== undefined) {
      result.identity.controllers = yamlConfig.identity.controllers;
    }
    if (yamlConfig.identity.auth_service !== undefined) {
      result.identity.authService = yamlConfig.identity.auth_service;
    }
    if (yamlConfig.identity.trust_principal_header !== undefined) {
      result.identity.trustPrincipalHeader = yamlConfig.identity.trust_principal_header;
    }
  }

  if (yamlConfig.hierarchy?.max_depth !== undefined) {
    result.hierarchy = { maxDepth: yamlConfig.hierarchy.max_depth };
  }

  if (yamlConfig.query) {
    result.query = {};
    if (yamlConfig.query.default_limit !== undefined) result.query.defaultLimit = yamlConfig.query.default_limit;
    if (yamlConfig.query.max_limit !== undefined) result.query.maxLimit = yamlConfig.query.max_limit;
  }

  return result;
}

/**
 * Reads and parses a configuration file; a missing file yields no values
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(
      `Failed to read configuration file '${filePath}': ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath }
    );
  }
  return convertYamlToConfig(parseYamlConfig(content, filePath));
}
