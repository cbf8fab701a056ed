import { IoFailureError, InvalidArgumentError } from '../storage-engine'

/**
 * Run a command body and report its failure on stderr with exit code 1.
 * Expected store errors print their message; anything else prints the
 * stack as well.
 */
export function runCommand(task: () => Promise<void>): void {
  task().catch((error: unknown) => {
    if (
      error instanceof InvalidArgumentError ||
      error instanceof IoFailureError
    ) {
      console.error(`ERR: ${error.message}`)
    } else if (error instanceof Error) {
      console.error(error.stack ?? error.message)
    } else {
      console.error(String(error))
    }
    process.exitCode = 1
  })
}
