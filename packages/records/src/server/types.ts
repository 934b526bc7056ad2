/**
 * Shared Types for Record Store Routes
 */

import type { RecordStore } from '../api/types.js';
import type { Configuration } from '../config/types.js';
import type { AuthServiceResolver, PrincipalContext } from '../systems/identity.js';

/**
 * Hono environment: the principal middleware stores the resolved caller
 */
export interface ServerEnv {
  Variables: {
    principal: PrincipalContext;
  };
}

/**
 * Services every route factory receives
 */
export interface RouteServices {
  store: RecordStore;
  config: Configuration;
  resolveAuthService: AuthServiceResolver;
}
