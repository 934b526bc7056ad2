/**
 * @trellis/records
 *
 * Per-tenant record store: identity guard, capture, sprint, workspace,
 * document and template stores, the query engine, snapshots, integrity
 * audit, configuration and the HTTP server.
 *
 * Types from @trellis/core and @trellis/storage are not re-exported here.
 * Import them directly:
 *   import { Capture, CaptureType } from '@trellis/core';
 *   import { openStorage } from '@trellis/storage';
 */

// Record store facade
export { RecordStoreImpl, createRecordStore } from './api/record-store.js';
export type { RecordStore, RecordStoreOptions, StoreStats, HealthStatus } from './api/types.js';

// Identity Guard
export * from './systems/index.js';

// Stores
export * from './services/index.js';

// Query Engine
export {
  QueryEngine,
  compileCaptureFilter,
  normalizePage,
  type CaptureFilter,
  type Page,
  type PageOptions,
  type QueryLimits,
  type WhereClause,
} from './query/query-engine.js';

// Snapshots and integrity
export * from './sync/index.js';
export * from './audit/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';

// HTTP server
export * from './server/index.js';
