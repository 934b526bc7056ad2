/**
 * Record stores and settings
 */

export { RecordTable, serializeRecordData, type AnyRecord, type RecordByKind, type RecordRow } from './record-table.js';
export { resolveOwnedReference, type StoreContext } from './context.js';
export { CaptureStore, type CaptureDeleteResult, type InstantiateCaptureInput } from './capture-store.js';
export { SprintStore, type SprintDeleteResult } from './sprint-store.js';
export {
  WorkspaceStore,
  nextFolderId,
  type AddFolderInput,
  type RemoveFolderResult,
  type WorkspaceDeleteResult,
} from './workspace-store.js';
export { DocumentStore, type DocumentListOptions } from './document-store.js';
export { TemplateStore } from './template-store.js';
export {
  createSettingsService,
  SETTING_KEYS,
  type Setting,
  type SettingsSeed,
  type SettingsService,
} from './settings.js';
