export * from './types.js';
export { VersionStore, ROOT_VERSION } from './version-store.js';
export { createSnapshot, deepFreeze } from './snapshot.js';
export {
  exportModel,
  importModel,
  parseExportedModel,
  saveModel,
  loadModel,
  ExportedModelSchema,
  EXPORT_FORMAT,
  EXPORT_FORMAT_VERSION,
  type ExportedModel,
} from './serialization.js';
