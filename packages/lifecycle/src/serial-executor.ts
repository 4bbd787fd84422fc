/**
 * Runs async operations one at a time, in submission order
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private pendingCount = 0;

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pendingCount++;
    const result = this.tail.then(operation).finally(() => {
      this.pendingCount--;
    });
    // A failed operation must not block the ones queued behind it
    this.tail = result.catch(() => undefined);
    return result;
  }

  get pending(): number {
    return this.pendingCount;
  }
}
