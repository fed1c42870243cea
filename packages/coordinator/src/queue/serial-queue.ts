/**
 * FIFO drained by one asynchronous task.
 *
 * Items are handled strictly one after another in push order. The drain task
 * starts on the first push and ends when the queue is empty; `whenIdle()`
 * resolves at that point.
 */
export class SerialQueue<T extends NonNullable<unknown>> {
  private readonly items: T[] = [];
  private running = false;
  private idle: Promise<void> = Promise.resolve();

  constructor(
    private readonly handler: (item: T) => Promise<void>,
    private readonly onError: (error: unknown, item: T) => void,
  ) {}

  push(item: T): void {
    this.items.push(item);
    if (!this.running) {
      this.running = true;
      this.idle = this.drain();
    }
  }

  /**
   * Remove and return the items that have not started.
   */
  clear(): T[] {
    return this.items.splice(0);
  }

  get size(): number {
    return this.items.length;
  }

  get busy(): boolean {
    return this.running;
  }

  whenIdle(): Promise<void> {
    return this.idle;
  }

  private async drain(): Promise<void> {
    try {
      for (let item = this.items.shift(); item !== undefined; item = this.items.shift()) {
        try {
          await this.handler(item);
        } catch (error) {
          this.onError(error, item);
        }
      }
    } finally {
      this.running = false;
    }
  }
}
