/**
 * Error thrown when `set` receives a key or value that cannot be
 * represented as a single log record.
 */
export class InvalidArgumentError extends Error {
  constructor(
    public readonly field: 'key' | 'value',
    message: string
  ) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Error thrown when a record could not be durably written to the log file.
 * The write may have been partially applied; callers must assume it was not.
 */
export class IoFailureError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to write data to ${filePath}: ${describeCause(cause)}`, {
      cause
    })
    this.name = 'IoFailureError'
  }
}

/**
 * Error thrown when writing to a store that has been closed.
 */
export class StoreClosedError extends Error {
  constructor(message: string = 'Cannot write to a closed store') {
    super(message)
    this.name = 'StoreClosedError'
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message
  }
  return String(cause)
}
