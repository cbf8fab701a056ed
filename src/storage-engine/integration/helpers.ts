import { rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface TestPaths {
  storePath: string
}

/**
 * Generate a unique log file path with a prefix.
 */
export function createTestPaths(prefix: string): TestPaths {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  const storePath = join(tmpdir(), `test-${prefix}-${id}.db`)
  return { storePath }
}

/**
 * Clean up test files.
 */
export async function cleanup(paths: TestPaths[]): Promise<void> {
  for (const { storePath } of paths) {
    await rm(storePath, { force: true, recursive: true })
  }
}

/**
 * Collect all entries from an async generator into an array.
 */
export async function collectEntries<T>(
  generator: AsyncGenerator<T>
): Promise<T[]> {
  const entries: T[] = []
  for await (const entry of generator) {
    entries.push(entry)
  }
  return entries
}

/**
 * Concatenate text and raw bytes into one buffer, encoding text as UTF-8.
 */
export function bytesOf(...parts: Array<string | number[]>): Uint8Array {
  const encoder = new TextEncoder()
  const chunks = parts.map((part) =>
    typeof part === 'string' ? encoder.encode(part) : Uint8Array.from(part)
  )
  const total = chunks.reduce((size, chunk) => size + chunk.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    result.set(chunk, offset)
    offset += chunk.length
  }
  return result
}
