import { command } from 'cleye'
import { LogStore } from '../storage-engine'
import { createConsoleLogger } from '../logger'
import { sharedFlags } from './flags'
import { runCommand } from './run-command'

export const logCmd = command(
  {
    name: 'log',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Display the records replayed from the log file',
      examples: ['appendkv log', 'appendkv log -s ./my.db']
    }
  },
  (argv) =>
    runCommand(async () => {
      const logger = createConsoleLogger(argv.flags.verbose)
      const logStore = new LogStore(argv.flags.storePath)
      logger.info(`Replaying ${logStore.getFilePath()}`)

      try {
        let count = 0
        for await (const entry of logStore.replay()) {
          count++
          console.log(`[${count}] ${entry.key} = ${entry.value}`)
        }

        const { skipped } = logStore.lastReplayStats()
        if (count === 0 && skipped === 0) {
          console.log('Log is empty')
        } else {
          console.log(`Total: ${count} records, ${skipped} skipped`)
        }
      } finally {
        await logStore.close()
      }
    })
)
