import type { Message } from '../types.js';
import { normalizeName } from '../utils.js';

/** Anything that answers a request message with a response message. */
export interface MessageHandler {
  handle(message: Message, ctx: { sender: string }): Promise<Message>;
}

export type HandlerFactory = () => MessageHandler;

/**
 * The message substrate the engine talks through.
 *
 * `send` resolves with whatever the recipient returned; it may reject or never settle.
 * Callers must not trust the shape of the resolved value.
 */
export interface Transport {
  register(identity: string, factory: HandlerFactory): Promise<void>;
  send(message: Message, recipient: string, sender: string): Promise<unknown>;
}

export class UnknownRecipientError extends Error {
  constructor(readonly recipient: string) {
    super(`No participant registered as "${recipient}"`);
    this.name = 'UnknownRecipientError';
  }
}

/**
 * In-process transport. Each identity gets one handler instance, created lazily on
 * first delivery, and deliveries to that identity are processed one at a time.
 */
export class LocalTransport implements Transport {
  private factories = new Map<string, HandlerFactory>();
  private handlers = new Map<string, MessageHandler>();
  private queues = new Map<string, Promise<unknown>>();

  async register(identity: string, factory: HandlerFactory): Promise<void> {
    const key = normalizeName(identity);
    if (!key) throw new Error('Cannot register a blank identity');
    if (this.factories.has(key)) throw new Error(`"${identity}" is already registered`);
    this.factories.set(key, factory);
  }

  has(identity: string): boolean {
    return this.factories.has(normalizeName(identity));
  }

  unregister(identity: string): void {
    const key = normalizeName(identity);
    this.factories.delete(key);
    this.handlers.delete(key);
    this.queues.delete(key);
  }

  send(message: Message, recipient: string, sender: string): Promise<unknown> {
    const key = normalizeName(recipient);
    const handler = this.handlerFor(key);
    if (!handler) return Promise.reject(new UnknownRecipientError(recipient));

    const previous = this.queues.get(key) ?? Promise.resolve();
    const delivery = previous.then(
      () => handler.handle(message, { sender }),
      () => handler.handle(message, { sender })
    );
    // Keep the chain alive regardless of this delivery's outcome.
    this.queues.set(
      key,
      delivery.then(
        () => undefined,
        () => undefined
      )
    );
    return delivery;
  }

  private handlerFor(key: string): MessageHandler | undefined {
    const existing = this.handlers.get(key);
    if (existing) return existing;
    const factory = this.factories.get(key);
    if (!factory) return undefined;
    const handler = factory();
    this.handlers.set(key, handler);
    return handler;
  }
}
