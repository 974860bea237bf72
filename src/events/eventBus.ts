export type Unsubscribe = () => void;

/**
 * Synchronous, typed event bus.
 *
 * Emission order is preserved per subscriber. A throwing subscriber is reported
 * through `onError` and never reaches the emitter.
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();

  constructor(private readonly onError?: (error: unknown) => void) {}

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  get size(): number {
    return this.subscribers.size;
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch (error) {
        this.onError?.(error);
      }
    }
  }
}
