/**
 * SerialExecutor — runs mutating operations one at a time.
 *
 * The timelock core holds no lock of its own. Every top-level mutating
 * request goes through one executor, so a second request starts only
 * after the first has settled. Calls an adapter makes back into the
 * timelock while a task is running do not go through the executor.
 */

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Queue `task` behind everything already submitted.
   * The returned promise settles with the task's own outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this._pending++;
    const result = this.tail.then(task).finally(() => {
      this._pending--;
    });
    // The chain only orders tasks; each failure reaches its own caller
    // through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  /** Tasks submitted and not yet settled. */
  get pending(): number {
    return this._pending;
  }
}
