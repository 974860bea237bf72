import type { Message, MessageKind } from '../types.js';
import type { MessageHandler } from '../messaging/transport.js';

export type KindHandler = (message: Message, ctx: { sender: string }) => Promise<string>;

/**
 * The moderator's inbound side: a table from message kind to handler.
 * Every reply is a `response` message; kinds without a handler get an empty one.
 */
export class ModeratorHandler implements MessageHandler {
  constructor(
    private readonly identity: string,
    private readonly table: Partial<Record<MessageKind, KindHandler>>
  ) {}

  async handle(message: Message, ctx: { sender: string }): Promise<Message> {
    const fn = this.table[message.kind];
    const content = fn ? await fn(message, ctx) : '';
    return { kind: 'response', source: this.identity, content };
  }
}
