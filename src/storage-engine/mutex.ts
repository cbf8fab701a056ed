/**
 * Async mutex that runs one task at a time, in the order they were
 * submitted. Used to keep a single writer per store within the process.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /**
   * Run a task once every previously submitted task has settled.
   * The task's result or rejection is passed through to the caller.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let release: () => void = () => {}
    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })
    this.pending++

    try {
      await previous
      return await task()
    } finally {
      this.pending--
      release()
    }
  }

  /**
   * Check if a task is running or waiting.
   */
  isLocked(): boolean {
    return this.pending > 0
  }
}
