/**
 * Storage Factory
 *
 * Opens a better-sqlite3 backend and, on request, brings its schema up to date.
 */

import type { StorageBackend } from './backend.js';
import type { StorageConfig } from './types.js';
import { createNodeStorage } from './node-backend.js';
import { initializeSchema } from './schema.js';

/**
 * Create a storage backend.
 *
 * @example
 * ```typescript
 * import { createStorage } from '@trellis/storage';
 *
 * const storage = createStorage({ path: './trellis.db' });
 * ```
 */
export function createStorage(config: StorageConfig): StorageBackend {
  return createNodeStorage(config);
}

/**
 * Create a storage backend and apply every pending migration.
 * The backend is closed again if a migration fails.
 */
export function openStorage(config: StorageConfig): StorageBackend {
  const backend = createStorage(config);
  try {
    initializeSchema(backend);
  } catch (error) {
    backend.close();
    throw error;
  }
  return backend;
}
