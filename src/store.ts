/**
 * Store - ties the append-only log and the in-memory index together.
 *
 * Implements the write path: validate → append → fsync → index
 * The log is replayed exactly once, when the store is opened, and
 * replay finishes before the store is handed to the caller.
 *
 * Writes are serialized through an in-process mutex. There is no
 * locking against other processes: one writer per log file.
 */

import {
  LogStore,
  EntryIndex,
  Mutex,
  StoreClosedError,
  normalizeText,
  validateEntry
} from './storage-engine'
import { silentLogger } from './logger'
import type { Entry, Logger, StoreOptions } from './types'

export class Store {
  private readonly logStore: LogStore
  private readonly index: EntryIndex
  private readonly logger: Logger
  private readonly writeMutex: Mutex
  private closed = false

  private constructor(logStore: LogStore, index: EntryIndex, logger: Logger) {
    this.logStore = logStore
    this.index = index
    this.logger = logger
    this.writeMutex = new Mutex()
  }

  /**
   * Open a store over a log file, replaying it to rebuild the index.
   * A missing log file opens as an empty store.
   */
  static async open(options: StoreOptions | string): Promise<Store> {
    const resolved =
      typeof options === 'string' ? { storePath: options } : options
    const logger = resolved.logger ?? silentLogger

    const logStore = new LogStore(resolved.storePath, resolved.readChunkSize)
    const index = await EntryIndex.buildFromLog(logStore)

    const { records, skipped } = logStore.lastReplayStats()
    logger.info(
      `Replayed ${records} records from ${logStore.getFilePath()}`
    )
    if (skipped > 0) {
      logger.warn(
        `Skipped ${skipped} malformed lines in ${logStore.getFilePath()}`
      )
    }

    return new Store(logStore, index, logger)
  }

  /**
   * Durably record a value for a key.
   * The index is only updated once the log record has been synced.
   * Text that UTF-8 cannot carry (lone surrogates) is stored as U+FFFD.
   */
  async set(key: string, value: string): Promise<void> {
    if (this.closed) {
      throw new StoreClosedError()
    }
    validateEntry(key, value)

    // Memory must hold exactly what the next replay will read
    const entry: Entry = {
      key: normalizeText(key),
      value: normalizeText(value)
    }
    await this.writeMutex.runExclusive(async () => {
      await this.logStore.append(entry)
      this.index.record(entry)
    })
    this.logger.debug(`SET ${key}`)
  }

  /**
   * Current value for a key, or undefined if it was never set.
   * Served from memory only.
   */
  get(key: string): string | undefined {
    return this.index.lookup(key)
  }

  /**
   * Number of records written, including overwritten ones.
   */
  count(): number {
    return this.index.count()
  }

  /**
   * Distinct keys in order of first write.
   */
  keys(): IterableIterator<string> {
    return this.index.keys()
  }

  /**
   * Get the path of the underlying log file.
   */
  getFilePath(): string {
    return this.logStore.getFilePath()
  }

  /**
   * Check if the store has been closed.
   */
  isClosed(): boolean {
    return this.closed
  }

  /**
   * Close the store and release the log file handle.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    // Let in-flight writes finish before releasing the handle
    await this.writeMutex.runExclusive(() => this.logStore.close())
  }
}
