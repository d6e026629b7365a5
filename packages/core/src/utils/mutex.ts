/**
 * Async Mutex
 *
 * Runs tasks one at a time in call order. A failing task does not block
 * the ones queued behind it.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private queued = 0

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.queued++
    const run = this.tail.then(task).finally(() => {
      this.queued--
    })
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  /** True while a task is running or waiting */
  get isLocked(): boolean {
    return this.queued > 0
  }

  /** Resolves once every task queued so far has settled */
  idle(): Promise<void> {
    return this.tail
  }
}
