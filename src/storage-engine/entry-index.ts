/**
 * In-memory index of every write in the session, in write order.
 *
 * Lookups scan from the newest entry backward, so the last write for a
 * key wins. Earlier entries are shadowed but kept; nothing is ever
 * removed or rewritten. The index is rebuilt from the log on startup and
 * extended after each write.
 */

import type { LogStore } from './log-store'
import type { Entry } from '../types'

export class EntryIndex {
  private entries: Entry[]

  private constructor() {
    this.entries = []
  }

  /**
   * Create an empty index.
   */
  static create(): EntryIndex {
    return new EntryIndex()
  }

  /**
   * Build the index by replaying every record in the log.
   */
  static async buildFromLog(logStore: LogStore): Promise<EntryIndex> {
    const index = EntryIndex.create()
    await index.rebuildFrom(logStore.replay())
    return index
  }

  /**
   * Replace the current state with the given entries, in iteration order.
   */
  async rebuildFrom(
    entries: Iterable<Entry> | AsyncIterable<Entry>
  ): Promise<void> {
    this.entries = []
    for await (const entry of entries) {
      this.record(entry)
    }
  }

  /**
   * Append an entry. Prior entries for the same key are left in place.
   */
  record(entry: Entry): void {
    this.entries.push({ key: entry.key, value: entry.value })
  }

  /**
   * Value of the most recent entry for a key, or undefined if the key
   * was never written.
   */
  lookup(key: string): string | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i]
      if (entry.key === key) {
        return entry.value
      }
    }
    return undefined
  }

  /**
   * Number of entries, including shadowed ones.
   */
  count(): number {
    return this.entries.length
  }

  /**
   * Distinct keys in order of first write.
   */
  keys(): IterableIterator<string> {
    return new Set(this.entries.map((entry) => entry.key)).values()
  }
}
