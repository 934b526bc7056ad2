/**
 * JSONL snapshot export and restore
 */

export * from './types.js';
export { serializeHeader, serializeSetting, serializeRecord, parseSnapshotLine, parseSetting, parseRecord } from './serialization.js';
export { SnapshotService, parseSnapshot, type ParsedSnapshot, type SnapshotServiceDeps } from './snapshot.js';
