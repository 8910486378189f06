/**
 * Promise-chain lock. Callers run one at a time in arrival order; a failing
 * callback releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  lock<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
