/**
 * Configuration Merging
 *
 * Combines configuration from several sources; later sources win per key,
 * lists are replaced rather than concatenated.
 */

import type { Configuration, PartialConfiguration } from './types.js';
import { getDefaultConfig } from './defaults.js';

/**
 * Merges partial configuration into a complete configuration
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  const authService = partial.identity?.authService ?? base.identity.authService;
  return {
    database: partial.database ?? base.database,
    server: {
      port: partial.server?.port ?? base.server.port,
      host: partial.server?.host ?? base.server.host,
      corsOrigins: [...(partial.server?.corsOrigins ?? base.server.corsOrigins)],
    },
    identity: {
      controllers: [...(partial.identity?.controllers ?? base.identity.controllers)],
      trustPrincipalHeader: partial.identity?.trustPrincipalHeader ?? base.identity.trustPrincipalHeader,
      ...(authService !== undefined && { authService }),
    },
    hierarchy: {
      maxDepth: partial.hierarchy?.maxDepth ?? base.hierarchy.maxDepth,
    },
    query: {
      defaultLimit: partial.query?.defaultLimit ?? base.query.defaultLimit,
      maxLimit: partial.query?.maxLimit ?? base.query.maxLimit,
    },
  };
}

/**
 * Merges multiple partial configurations in order
 */
export function mergeConfigurations(base: Configuration, ...partials: PartialConfiguration[]): Configuration {
  return partials.reduce(mergeConfiguration, base);
}

/**
 * Creates a configuration by merging defaults with partial config
 */
export function createConfiguration(partial?: PartialConfiguration): Configuration {
  const defaults = getDefaultConfig();
  return partial ? mergeConfiguration(defaults, partial) : defaults;
}

/**
 * Creates a deep clone of a configuration
 */
export function cloneConfiguration(config: Configuration): Configuration {
  return mergeConfiguration(config, {});
}
