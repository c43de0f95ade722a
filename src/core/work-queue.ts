// Unbounded multi-producer / single-consumer channel

const CLOSE = Symbol('close');
type Entry<T> = T | typeof CLOSE;

export class WorkQueue<T> {
  private buffer: Array<Entry<T>> = [];
  private waiter?: (entry: Entry<T>) => void;
  private closed = false;
  private draining = false;

  /**
   * Add an item. Returns false once the queue has been closed.
   */
  public enqueue(item: T): boolean {
    if (this.closed) {
      return false;
    }
    this.push(item);
    return true;
  }

  /**
   * Enqueue the shutdown sentinel. Items already queued are still drained.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.push(CLOSE);
  }

  public get pending(): number {
    return this.buffer.filter((entry) => entry !== CLOSE).length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run the single consumer loop until the sentinel arrives. Items are
   * handled strictly one at a time; a handler failure goes to `onError`
   * and the loop carries on.
   */
  public async drain(
    handler: (item: T) => Promise<void>,
    onError: (error: unknown, item: T) => void
  ): Promise<void> {
    if (this.draining) {
      throw new Error('WorkQueue already has a consumer');
    }
    this.draining = true;

    try {
      for (;;) {
        const entry = await this.next();
        if (entry === CLOSE) return;
        try {
          await handler(entry);
        } catch (error) {
          onError(error, entry);
        }
      }
    } finally {
      this.draining = false;
    }
  }

  private push(entry: Entry<T>): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(entry);
      return;
    }
    this.buffer.push(entry);
  }

  private next(): Promise<Entry<T>> {
    if (this.buffer.length > 0) {
      const [entry] = this.buffer.splice(0, 1);
      return Promise.resolve(entry);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
