import { command } from 'cleye'
import { Store } from '../store'
import { createConsoleLogger } from '../logger'
import { runShell } from '../shell'
import { sharedFlags } from './flags'
import { runCommand } from './run-command'

export interface ShellFlags {
  storePath: string
  verbose: boolean
}

/**
 * Open the store and serve commands from stdin until EXIT or EOF.
 */
export function startShell(flags: ShellFlags): void {
  runCommand(async () => {
    const logger = createConsoleLogger(flags.verbose)
    const store = await Store.open({ storePath: flags.storePath, logger })
    logger.info('Store started')

    try {
      await runShell(store, {
        input: process.stdin,
        output: process.stdout,
        prompt: process.stdin.isTTY === true,
        logger
      })
    } finally {
      await store.close()
    }
  })
}

export const shellCmd = command(
  {
    name: 'shell',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Read SET/GET/EXIT commands from stdin (default command)',
      examples: ['appendkv shell', 'printf "SET a 1\\nGET a\\n" | appendkv']
    }
  },
  (argv) => startShell(argv.flags)
)
