import type { Message, MessageKind } from './types.js';
import type { MessageHandler, Transport } from './messaging/transport.js';
import { logger } from './logger.js';

export function quietLogger(): void {
  logger.setConsoleOutputEnabled(false);
  logger.setPersistenceEnabled(false);
}

/** Always picks the first open seat, so seats fill in join order. */
export const firstSeat = (): number => 0;

export type Answer = string | ((message: Message) => string | Promise<string>);

/** Participant with canned answers per message kind; records everything it receives. */
export class ScriptedPlayer implements MessageHandler {
  readonly received: Message[] = [];

  constructor(
    readonly identity: string,
    private readonly answers: Partial<Record<MessageKind, Answer>> = {}
  ) {}

  async handle(message: Message): Promise<Message> {
    this.received.push(message);
    const answer = this.answers[message.kind];
    const content = typeof answer === 'function' ? await answer(message) : (answer ?? '');
    return { kind: 'response', source: this.identity, content };
  }

  contentsOf(kind: MessageKind): string[] {
    return this.received.filter(m => m.kind === kind).map(m => m.content);
  }
}

/** Register `player` on the transport and ask `moderator` for a seat. Resolves with the reply content. */
export async function joinWith(transport: Transport, player: ScriptedPlayer, moderator: string, credential = 'join'): Promise<string> {
  await transport.register(player.identity, () => player);
  const reply = await transport.send({ kind: 'register', source: player.identity, content: credential }, moderator, player.identity);
  return typeof reply === 'object' && reply !== null && 'content' in reply && typeof reply.content === 'string' ? reply.content : '';
}
