/**
 * Unbounded FIFO with an awaitable, time-limited `take`.
 *
 * Remote handlers `put`; only the engine loop `take`s, so whatever a request asks for is
 * applied on the loop's own turn.
 */
export class Mailbox<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  get size(): number {
    return this.items.length;
  }

  /** Next item, or undefined once `timeoutMs` passes with nothing queued. */
  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());

    return new Promise(resolve => {
      const waiter = (item: T | undefined) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        resolve(undefined);
      }, Math.max(0, timeoutMs));
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything queued. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }
}
