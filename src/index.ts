export { Store } from './store'
export { createConsoleLogger, silentLogger } from './logger'
export { executeLine, runShell } from './shell'
export type { ShellReply } from './shell'
export {
  InvalidArgumentError,
  IoFailureError,
  StoreClosedError
} from './storage-engine'
export type { Entry, Logger, ReplayStats, StoreOptions } from './types'
