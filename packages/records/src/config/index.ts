/**
 * Configuration System
 *
 * @example
 * ```typescript
 * import { loadConfig } from './config/index.js';
 *
 * const config = loadConfig({ overrides: { database: './trellis.db' } });
 * config.hierarchy.maxDepth; // 100
 * ```
 */

export type {
  ServerConfig,
  IdentityConfigSection,
  HierarchyConfig,
  QueryConfig,
  Configuration,
  PartialConfiguration,
  YamlConfigFile,
  ConfigFileDiscovery,
  ConfigValidationResult,
  LoadConfigOptions,
  EnvVar,
} from './types.js';

export { EnvVars } from './types.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_DATABASE,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_IDENTITY_CONFIG,
  DEFAULT_HIERARCHY_CONFIG,
  DEFAULT_QUERY_CONFIG,
  MAX_HIERARCHY_DEPTH,
  MAX_QUERY_LIMIT,
  getDefaultConfig,
} from './defaults.js';

export {
  mergeConfiguration,
  mergeConfigurations,
  createConfiguration,
  cloneConfiguration,
} from './merge.js';

export {
  isValidDatabase,
  isValidPort,
  isValidMaxDepth,
  checkConfiguration,
  validateConfiguration,
  validatePartialConfiguration,
} from './validation.js';

export {
  CONFIG_FILE_NAME,
  TRELLIS_DIR,
  findTrellisDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
} from './file.js';

export {
  parseEnvBoolean,
  parseEnvInteger,
  parseEnvList,
  getEnvVar,
  loadEnvConfig,
  getEnvConfigPath,
} from './env.js';

export { loadConfig, getConfig, getConfigPath, clearConfigCache } from './config.js';
