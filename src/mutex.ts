/**
 * Promise-chain mutual exclusion for handle replacement.
 * Tasks run one at a time, in the order they were queued. Not reentrant:
 * a task must never wait on another task queued on the same mutex.
 */
export class HandleMutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Runs a task once every previously queued task has settled.
   *
   * @param task - Work that reads or replaces handles
   * @returns The task's result
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
