import type { Logger } from './types'

/**
 * Logger that discards everything. Used when no logger is configured.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}

/**
 * Logger that writes to stderr through the console, keeping stdout free
 * for command output. Debug and info lines are only written when verbose.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug: (message) => {
      if (verbose) {
        console.error(`[debug] ${message}`)
      }
    },
    info: (message) => {
      if (verbose) {
        console.error(`[info] ${message}`)
      }
    },
    warn: (message) => console.error(`[warn] ${message}`),
    error: (message) => console.error(`[error] ${message}`)
  }
}
