export {
  emptyStore, loadStore, saveStore, nextIdentifier, findTask, findTaskIndex,
} from './store.js';
export { serializeStore, parseStore } from './store-schema.js';
export type { ParseStoreResult } from './store-schema.js';
export {
  resolveDataFilePath, getDefaultPathInputs, getConfigDir, DATA_FILE_ENV,
} from './data-path.js';
export type { DataPathInputs } from './data-path.js';
