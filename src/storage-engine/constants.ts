/**
 * Constants for the append-only log store.
 *
 * These define the line-oriented text format of the log file.
 */

// Command keyword that starts every log record (case-sensitive)
export const commandKeyword = 'SET'

// Record terminator
export const recordSeparator = '\n'
export const newlineByte = 0x0a

// Tokens per record: keyword, key, value
export const recordTokenCount = 3

// Bytes read per chunk during replay
export const readChunkSize = 64 * 1024

// Default log file location, relative to the working directory
export const defaultStorePath = './data.db'

// Environment variable consulted by the CLI for the log file location
export const storePathEnvVar = 'APPENDKV_STORE_PATH'
