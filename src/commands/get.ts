import { command } from 'cleye'
import { Store } from '../store'
import { createConsoleLogger } from '../logger'
import { nullReply } from '../shell'
import { sharedFlags } from './flags'
import { runCommand } from './run-command'

export const getCmd = command(
  {
    name: 'get',
    parameters: ['<key>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print the latest value for a key, or NULL',
      examples: ['appendkv get color', 'appendkv get -s ./my.db color']
    }
  },
  (argv) =>
    runCommand(async () => {
      const store = await Store.open({
        storePath: argv.flags.storePath,
        logger: createConsoleLogger(argv.flags.verbose)
      })

      try {
        const [key] = argv._
        const value = store.get(key)

        if (value !== undefined) {
          console.log(value)
        } else {
          console.log(nullReply)
          process.exitCode = 1
        }
      } finally {
        await store.close()
      }
    })
)
