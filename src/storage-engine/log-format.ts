/**
 * Log record serialization and parsing.
 *
 * Text format, one record per line:
 * SET <key> <value>\n
 */

import {
  commandKeyword,
  recordSeparator,
  recordTokenCount
} from './constants'
import type { Entry } from '../types'

const encoder = new TextEncoder()

// fatal: false substitutes U+FFFD for every invalid byte sequence
const lossyDecoder = new TextDecoder('utf-8', { fatal: false })

/**
 * Serialize an entry to the UTF-8 bytes of one log record.
 */
export function serializeLogRecord(entry: Entry): Uint8Array {
  return encoder.encode(
    `${commandKeyword} ${entry.key} ${entry.value}${recordSeparator}`
  )
}

/**
 * Round-trip text through UTF-8 so it matches what replay will read back.
 * Lone surrogates become U+FFFD.
 */
export function normalizeText(text: string): string {
  return lossyDecoder.decode(encoder.encode(text))
}

/**
 * Decode one line of the log file. Never throws on malformed UTF-8.
 */
export function decodeLine(bytes: Uint8Array): string {
  return lossyDecoder.decode(bytes)
}

/**
 * Parse a decoded line as a log record.
 * Returns null if the line is not exactly `SET <key> <value>`.
 */
export function parseLogRecord(line: string): Entry | null {
  const trimmed = line.trim()
  if (trimmed.length === 0) {
    return null
  }

  const tokens = trimmed.split(/\s+/)
  if (tokens.length !== recordTokenCount) {
    return null
  }

  const [command, key, value] = tokens
  if (command !== commandKeyword || !key || !value) {
    return null
  }

  return { key, value }
}
