/**
 * Storage engine module - append-only log and replayed index.
 */

// Main classes
export { LogStore } from './log-store'
export { EntryIndex } from './entry-index'
export { Mutex } from './mutex'

// Errors and validation
export {
  InvalidArgumentError,
  IoFailureError,
  StoreClosedError
} from './errors'
export { validateEntry } from './validation'

// Configuration defaults
export { defaultStorePath, storePathEnvVar } from './constants'

export { normalizeText } from './log-format'
