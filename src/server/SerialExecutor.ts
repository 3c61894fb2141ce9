/**
 * Runs state-changing requests one after another so that concurrent HTTP
 * calls queue up instead of meeting the ledger's reentrancy guard.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // a failed task is reported to its own caller; the chain carries on
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
