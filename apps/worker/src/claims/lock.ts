/**
 * Serial queue
 *
 * Runs async tasks one at a time in submission order. A rejected task
 * does not block the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.queued--;
      },
      () => {
        this.queued--;
      }
    );
    return result;
  }

  /** Tasks waiting or running */
  get size(): number {
    return this.queued;
  }
}
