export interface Entry {
  key: string
  value: string
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface StoreOptions {
  /** Path of the append-only log file. Created on the first write. */
  storePath: string
  /** Receives replay summaries and write traces (default: silent) */
  logger?: Logger
  /** Bytes read per chunk when replaying the log (default: 64 KiB) */
  readChunkSize?: number
}

export interface ReplayStats {
  /** Records that parsed and were yielded */
  records: number
  /** Non-blank lines that did not parse and were skipped */
  skipped: number
}

export interface PackageJson {
  name: string
  version: string
  description: string
}
