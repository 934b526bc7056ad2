/**
 * Configuration Access API
 *
 * Precedence (highest to lowest): overrides > environment > file > defaults
 */

import type { Configuration, LoadConfigOptions } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { cloneConfiguration, mergeConfiguration } from './merge.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { getEnvConfigPath, loadEnvConfig } from './env.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('config');

// ============================================================================
// Configuration State
// ============================================================================

let cachedConfig: Configuration | null = null;
let activeConfigPath: string | undefined;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Loads configuration with the full precedence chain and caches the result
 *
 * @throws ValidationError when the file, environment or overrides hold invalid values
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  let config = getDefaultConfig();

  const env = options.env ?? process.env;
  const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
  const discovery = options.skipFile
    ? { exists: false, path: undefined }
    : discoverConfigFile(options.configPath ?? envConfigPath, options.startDir);
  activeConfigPath = discovery.exists ? discovery.path : undefined;

  if (discovery.exists && discovery.path) {
    config = mergeConfiguration(config, validatePartialConfiguration(readConfigFile(discovery.path)));
    logger.debug(`Loaded configuration file ${discovery.path}`);
  }

  if (!options.skipEnv) {
    config = mergeConfiguration(config, validatePartialConfiguration(loadEnvConfig(env)));
  }

  if (options.overrides) {
    config = mergeConfiguration(config, validatePartialConfiguration(options.overrides));
  }

  validateConfiguration(config);
  cachedConfig = config;
  return cloneConfiguration(config);
}

/**
 * Gets the current configuration, loading it on first use
 */
export function getConfig(): Configuration {
  if (cachedConfig === null) {
    return loadConfig();
  }
  return cloneConfiguration(cachedConfig);
}

/**
 * Path of the config file the last load read, if any
 */
export function getConfigPath(): string | undefined {
  return activeConfigPath;
}

/**
 * Clears the configuration cache
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  activeConfigPath = undefined;
}
