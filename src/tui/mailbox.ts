/**
 * Unbounded FIFO with a single consumer. Producers post from anywhere
 * (key handlers, finished commands); the event loop awaits `next()`.
 */
export class Mailbox<T> {
  private readonly queue: T[] = [];
  private waiter: ((value: T) => void) | null = null;

  post(value: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(value);
      return;
    }
    this.queue.push(value);
  }

  next(): Promise<T> {
    const value = this.queue.shift();
    if (value !== undefined) return Promise.resolve(value);
    if (this.waiter) return Promise.reject(new Error('Mailbox already has a consumer'));
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.queue.length;
  }
}
