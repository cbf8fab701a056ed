import { command } from 'cleye'
import { Store } from '../store'
import { createConsoleLogger } from '../logger'
import { sharedFlags } from './flags'
import { runCommand } from './run-command'

export const setCmd = command(
  {
    name: 'set',
    parameters: ['<key>', '<value>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Durably store a value under a key',
      examples: ['appendkv set color blue', 'appendkv set -s ./my.db color blue']
    }
  },
  (argv) =>
    runCommand(async () => {
      const store = await Store.open({
        storePath: argv.flags.storePath,
        logger: createConsoleLogger(argv.flags.verbose)
      })

      try {
        const [key, value] = argv._
        await store.set(key, value)
        console.log('OK')
      } finally {
        await store.close()
      }
    })
)
