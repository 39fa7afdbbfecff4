/**
 * Runs tasks one at a time in submission order.
 * A failed task does not stall the tasks queued behind it.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get pending(): number {
    return this._pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this._pending++;
    const result = this.tail.then(task).finally(() => {
      this._pending--;
    });
    // The queue only tracks completion; the outcome belongs to the caller of run()
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
