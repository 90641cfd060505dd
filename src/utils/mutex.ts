// This module provides a promise-chain mutex for short async critical sections.

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  // Number of callers queued or running inside the critical section.
  public get pending(): number {
    return this.waiting;
  }

  // This method runs one operation after every previously queued operation has settled.
  public runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    this.waiting += 1;
    const run = this.tail.then(() => operation());
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.tail = settled;

    return run.finally(() => {
      this.waiting -= 1;
    });
  }
}
