/**
 * Promise-chained mutual exclusion. Each caller waits for every earlier
 * holder to settle; the lock is released on every exit path of `fn`.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  public isHeld(): boolean {
    return this.held;
  }

  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
