/**
 * Line-oriented command shell over a store.
 *
 * Commands: SET <key> <value>, GET <key>, EXIT (keywords are
 * case-insensitive). Replies are single lines: OK, the value, NULL for
 * an absent key, BYE, or an `ERR: ` message.
 */

import { createInterface } from 'node:readline'
import { IoFailureError, InvalidArgumentError } from './storage-engine'
import { silentLogger } from './logger'
import type { Store } from './store'
import type { Logger } from './types'

export interface ShellReply {
  /** Line to print, or null when there is nothing to print */
  output: string | null
  /** True once the session should end */
  exit: boolean
}

export interface ShellStreams {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  /** Write a `> ` prompt before each line (default: false) */
  prompt?: boolean
  logger?: Logger
}

export const nullReply = 'NULL'

/**
 * Execute one line of input against the store.
 * Store validation and write failures become `ERR: ` replies; any other
 * error is rethrown.
 */
export async function executeLine(
  store: Store,
  line: string,
  logger: Logger = silentLogger
): Promise<ShellReply> {
  const parts = line.trim().split(/\s+/).filter((part) => part.length > 0)
  if (parts.length === 0) {
    return { output: null, exit: false }
  }

  const command = parts[0].toUpperCase()
  const args = parts.slice(1)

  try {
    switch (command) {
      case 'SET': {
        if (args.length !== 2) {
          return reply('ERR: Usage SET <key> <value>')
        }
        const [key, value] = args
        await store.set(key, value)
        return reply('OK')
      }
      case 'GET': {
        if (args.length !== 1) {
          return reply('ERR: Usage GET <key>')
        }
        return reply(store.get(args[0]) ?? nullReply)
      }
      case 'EXIT':
        return { output: 'BYE', exit: true }
      default:
        logger.warn(`Unknown command entered: ${command}`)
        return reply(`ERR: Unknown command '${command}'`)
    }
  } catch (error) {
    if (
      error instanceof InvalidArgumentError ||
      error instanceof IoFailureError
    ) {
      logger.error(error.message)
      return reply(`ERR: ${error.message}`)
    }
    throw error
  }
}

/**
 * Read commands from a stream until EXIT or end of input.
 * Lines are handled strictly one after another.
 */
export async function runShell(
  store: Store,
  { input, output, prompt = false, logger = silentLogger }: ShellStreams
): Promise<void> {
  const lines = createInterface({ input, terminal: false })
  const writePrompt = (): void => {
    if (prompt) {
      output.write('> ')
    }
  }

  let interrupted = false
  const onInterrupt = (): void => {
    interrupted = true
    lines.close()
  }
  process.once('SIGINT', onInterrupt)

  try {
    writePrompt()
    for await (const line of lines) {
      const { output: text, exit } = await executeLine(store, line, logger)
      if (text !== null) {
        output.write(`${text}\n`)
      }
      if (exit) {
        break
      }
      writePrompt()
    }

    if (interrupted) {
      output.write('\nBYE\n')
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt)
    lines.close()
  }
}

function reply(output: string): ShellReply {
  return { output, exit: false }
}
