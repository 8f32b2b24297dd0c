/**
 * Result Channel
 *
 * One-way queue from background fetch cycles to the single owner of viewer
 * state. Producers only post; the owner drains and applies.
 */
export class ResultChannel<T> {
  private readonly queue: T[] = [];

  post(msg: T): void {
    this.queue.push(msg);
  }

  /**
   * Removes and returns everything queued right now, oldest first
   */
  drain(): T[] {
    return this.queue.splice(0, this.queue.length);
  }

  get size(): number {
    return this.queue.length;
  }
}
