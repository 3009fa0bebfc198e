/**
 * Single-consumer event queue. `receive` resolves with the oldest event,
 * waiting when the queue is empty.
 */
export class EventChannel<T> {
  private readonly queue: Array<T> = [];
  private waiter: ((event: T) => void) | null = null;

  send(event: T) {
    const waiter = this.waiter;
    if (waiter !== null) {
      this.waiter = null;
      waiter(event);
      return;
    }
    this.queue.push(event);
  }

  receive(): Promise<T> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error('EventChannel supports a single receiver'));
    }
    return new Promise<T>((resolve) => {
      this.waiter = resolve;
    });
  }

  has(predicate: (event: T) => boolean) {
    return this.queue.some(predicate);
  }

  get pending() {
    return this.queue.length;
  }
}
