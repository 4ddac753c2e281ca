/**
 * Persistent progress and configuration store.
 *
 * @packageDocumentation
 */

export {
  COMPLETION_LOG_FILE,
  CONFIG_FILE,
  PersistentStore,
  PersistentStoreError,
  lookupConfig,
  parseCompletionLog,
  parseConfigEntries,
} from './persistent-store.js';
export type {
  ConfigEntry,
  PersistentStoreErrorType,
  PersistentStoreOptions,
} from './persistent-store.js';
