/**
 * Async Mutex
 *
 * Serializes critical sections across concurrent async tasks. Each caller
 * waits for the previous holder's promise before running.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Runs `fn` while holding the lock and releases it afterwards, even on error
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
