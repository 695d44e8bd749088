/**
 * Unbounded FIFO queue read through `for await`. Producers push from event callbacks, a
 * single consumer drains. Values pushed before `close()` are still delivered.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  public push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    // Waiters only exist while the buffer is empty.
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter({ done: true, value: undefined });
    }
  }

  public next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise<IteratorResult<T>>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next()
    };
  }
}
