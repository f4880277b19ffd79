/**
 * @file src/store/mutex.ts
 * @description Promise-chain mutual exclusion lock for async critical sections.
 *
 *   Callers queue in FIFO order; a task that throws or rejects still releases the lock.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every previously queued task has settled.
   * @returns Whatever `task` resolves or rejects with.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Resolves once every task queued so far has settled.
   */
  drain(): Promise<void> {
    return this.tail;
  }
}
