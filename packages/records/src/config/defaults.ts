/**
 * Configuration Defaults
 *
 * Lowest-precedence values, overridden by file, environment and overrides.
 */

import type {
  Configuration,
  HierarchyConfig,
  IdentityConfigSection,
  QueryConfig,
  ServerConfig,
} from './types.js';

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_DATABASE = ':memory:';

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3456,
  host: 'localhost',
  corsOrigins: [],
};

export const DEFAULT_IDENTITY_CONFIG: IdentityConfigSection = {
  controllers: [],
  trustPrincipalHeader: false,
};

export const DEFAULT_HIERARCHY_CONFIG: HierarchyConfig = {
  maxDepth: 100,
};

export const DEFAULT_QUERY_CONFIG: QueryConfig = {
  defaultLimit: 50,
  maxLimit: 500,
};

export const DEFAULT_CONFIG: Configuration = {
  database: DEFAULT_DATABASE,
  server: DEFAULT_SERVER_CONFIG,
  identity: DEFAULT_IDENTITY_CONFIG,
  hierarchy: DEFAULT_HIERARCHY_CONFIG,
  query: DEFAULT_QUERY_CONFIG,
};

// ============================================================================
// Validation Constants
// ============================================================================

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

/** Upper bound for hierarchy.maxDepth */
export const MAX_HIERARCHY_DEPTH = 10_000;

/** Upper bound for query.maxLimit */
export const MAX_QUERY_LIMIT = 10_000;

// ============================================================================
// Deep Clone
// ============================================================================

/**
 * Returns a fresh copy of the defaults; never mutate DEFAULT_CONFIG
 */
export function getDefaultConfig(): Configuration {
  return {
    database: DEFAULT_DATABASE,
    server: { ...DEFAULT_SERVER_CONFIG, corsOrigins: [...DEFAULT_SERVER_CONFIG.corsOrigins] },
    identity: { ...DEFAULT_IDENTITY_CONFIG, controllers: [...DEFAULT_IDENTITY_CONFIG.controllers] },
    hierarchy: { ...DEFAULT_HIERARCHY_CONFIG },
    query: { ...DEFAULT_QUERY_CONFIG },
  };
}
