/**
 * Configuration System Types
 *
 * Configuration comes from built-in defaults, a YAML file, environment
 * variables and explicit overrides, in increasing order of precedence.
 */

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * HTTP server settings
 */
export interface ServerConfig {
  /** Listen port (default: 3456) */
  port: number;
  /** Listen host (default: 'localhost') */
  host: string;
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins: string[];
}

/**
 * Identity settings
 */
export interface IdentityConfigSection {
  /** Principals allowed to change server configuration */
  controllers: string[];
  /** Initial auth service reference, applied when none is stored yet */
  authService?: string;
  /** Accept the caller principal from the X-Principal header (default: false) */
  trustPrincipalHeader: boolean;
}

/**
 * Capture hierarchy settings
 */
export interface HierarchyConfig {
  /** Longest parent chain walked by the cycle check (default: 100) */
  maxDepth: number;
}

/**
 * List query settings
 */
export interface QueryConfig {
  /** Page size when a query names none (default: 50) */
  defaultLimit: number;
  /** Largest accepted page size (default: 500) */
  maxLimit: number;
}

/**
 * Complete configuration
 */
export interface Configuration {
  /** SQLite database path, or ':memory:' (default) */
  database: string;
  server: ServerConfig;
  identity: IdentityConfigSection;
  hierarchy: HierarchyConfig;
  query: QueryConfig;
}

/**
 * Partial configuration for merging
 */
export type PartialConfiguration = {
  database?: string;
  server?: Partial<ServerConfig>;
  identity?: Partial<IdentityConfigSection>;
  hierarchy?: Partial<HierarchyConfig>;
  query?: Partial<QueryConfig>;
};

// ============================================================================
// YAML File Format Types
// ============================================================================

/**
 * YAML configuration file structure (snake_case keys)
 */
export interface YamlConfigFile {
  database?: string;
  server?: {
    port?: number;
    host?: string;
    cors_origins?: string[];
  };
  identity?: {
    controllers?: string[];
    auth_service?: string;
    trust_principal_header?: boolean;
  };
  hierarchy?: {
    max_depth?: number;
  };
  query?: {
    default_limit?: number;
    max_limit?: number;
  };
}

// ============================================================================
// Environment Variable Mapping
// ============================================================================

/**
 * Environment variable names for configuration
 */
export const EnvVars = {
  DATABASE: 'TRELLIS_DATABASE',
  PORT: 'TRELLIS_PORT',
  HOST: 'TRELLIS_HOST',
  /** Comma-separated principal list */
  CONTROLLERS: 'TRELLIS_CONTROLLERS',
  AUTH_SERVICE: 'TRELLIS_AUTH_SERVICE',
  TRUST_PRINCIPAL_HEADER: 'TRELLIS_TRUST_PRINCIPAL_HEADER',
  MAX_DEPTH: 'TRELLIS_MAX_DEPTH',
  /** Config file path override */
  CONFIG: 'TRELLIS_CONFIG',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

// ============================================================================
// Configuration Operations
// ============================================================================

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  startDir?: string;
  /** Skip environment variables */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
  /** Skip config file loading */
  skipFile?: boolean;
  /** Highest-precedence overrides */
  overrides?: PartialConfiguration;
}

/**
 * Result of configuration file discovery
 */
export interface ConfigFileDiscovery {
  /** Path to the config file, if one was named or found */
  path?: string;
  exists: boolean;
}

/**
 * Result of configuration validation
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}
