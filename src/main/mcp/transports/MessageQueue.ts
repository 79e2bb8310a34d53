/**
 * Push-based async queue bridging event-style sources (readline, socket
 * frames) to a single pull-based consumer.
 */
export class MessageQueue<T extends object> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;
  private consumed = false;

  get isEnded(): boolean {
    return this.ended;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Returns false once the queue has ended.
   */
  push(item: T): boolean {
    if (this.ended) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Items already queued are still delivered before the sequence finishes.
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('Message stream can only be consumed once');
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<T>> => {
        const item = this.items.shift();
        if (item !== undefined) {
          return Promise.resolve({ value: item, done: false });
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiters.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        this.items = [];
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
