/**
 * Runs tasks one at a time in submission order.
 *
 * A failing task rejects its own promise; tasks queued behind it still run.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get pendingCount(): number {
    return this.pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;

    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      }
    );

    return result;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
