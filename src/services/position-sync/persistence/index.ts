/**
 * Persistence Module
 *
 * Crash-safe file storage for the sync snapshot.
 */

export {
  StatePersistError,
  StateStore,
  type StateStoreOptions,
  createEmptySnapshot,
} from './state-store.js'
