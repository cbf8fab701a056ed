/**
 * Append-only log store.
 *
 * Every write is appended to the log file and synced before it is
 * acknowledged. On startup the log is replayed line by line to rebuild
 * the in-memory index.
 */

import { open, mkdir } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import invariant from 'tiny-invariant'
import { newlineByte, readChunkSize as defaultChunkSize } from './constants'
import { IoFailureError } from './errors'
import { serializeLogRecord, decodeLine, parseLogRecord } from './log-format'
import type { Entry, ReplayStats } from '../types'

export class LogStore {
  private readonly filePath: string
  private readonly chunkSize: number
  private fileHandle: FileHandle | null = null
  private stats: ReplayStats = { records: 0, skipped: 0 }

  constructor(filePath: string, chunkSize: number = defaultChunkSize) {
    invariant(Number.isInteger(chunkSize), 'chunkSize must be an integer')
    invariant(chunkSize > 0, 'chunkSize must be a positive integer')

    this.filePath = filePath
    this.chunkSize = chunkSize
  }

  /**
   * Append one record and sync to disk.
   * This is the commit point - once this resolves, the write is durable.
   */
  async append(entry: Entry): Promise<void> {
    const buffer = serializeLogRecord(entry)

    try {
      // Ensure directory exists
      await mkdir(dirname(this.filePath), { recursive: true })

      // Open file for appending if not already open
      this.fileHandle ??= await open(this.filePath, 'a')

      // Write and sync
      await this.fileHandle.write(buffer)
      await this.fileHandle.sync()
    } catch (error) {
      throw new IoFailureError(this.filePath, error)
    }
  }

  /**
   * Replay the log from the beginning.
   * Yields every well-formed record in file order and skips the rest,
   * including a torn final line left by an interrupted append.
   */
  async *replay(): AsyncGenerator<Entry> {
    this.stats = { records: 0, skipped: 0 }

    let fileHandle: FileHandle
    try {
      fileHandle = await open(this.filePath, 'r')
    } catch (error) {
      if (isMissingPath(error)) {
        // No log file = empty store
        return
      }
      throw error
    }

    try {
      const chunk = new Uint8Array(this.chunkSize)
      let pending: Uint8Array = new Uint8Array(0)

      // eslint-disable-next-line no-constant-condition
      while (true) {
        const { bytesRead } = await fileHandle.read(chunk, 0, chunk.length)
        if (bytesRead === 0) {
          break
        }

        const data = concat(pending, chunk.subarray(0, bytesRead))
        let lineStart = 0
        let newline = data.indexOf(newlineByte, lineStart)

        while (newline !== -1) {
          const entry = this.parseLine(data.subarray(lineStart, newline))
          if (entry) {
            yield entry
          }
          lineStart = newline + 1
          newline = data.indexOf(newlineByte, lineStart)
        }

        pending = data.slice(lineStart)
      }

      // Final line without a terminator
      if (pending.length > 0) {
        const entry = this.parseLine(pending)
        if (entry) {
          yield entry
        }
      }
    } finally {
      await fileHandle.close()
    }
  }

  /**
   * Counts from the most recent replay.
   */
  lastReplayStats(): ReplayStats {
    return { ...this.stats }
  }

  /**
   * Close the append handle.
   */
  async close(): Promise<void> {
    if (this.fileHandle) {
      await this.fileHandle.close()
      this.fileHandle = null
    }
  }

  /**
   * Get the file path for this log.
   */
  getFilePath(): string {
    return this.filePath
  }

  private parseLine(bytes: Uint8Array): Entry | null {
    const line = decodeLine(bytes)
    const entry = parseLogRecord(line)

    if (entry) {
      this.stats.records++
    } else if (line.trim().length > 0) {
      this.stats.skipped++
    }

    return entry
  }
}

function concat(head: Uint8Array, tail: Uint8Array): Uint8Array {
  if (head.length === 0) {
    return tail
  }
  const combined = new Uint8Array(head.length + tail.length)
  combined.set(head, 0)
  combined.set(tail, head.length)
  return combined
}

function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}
