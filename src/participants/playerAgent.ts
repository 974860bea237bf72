import { MessageSchema, type Message, type MessageKind } from '../types.js';
import type { MessageHandler, Transport } from '../messaging/transport.js';
import type { Responder } from './responder.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

type Handler = (message: Message) => Promise<string>;

// "There are survive players: a, b", "Now the alive players are: a, b.", "Which player in: a, b would ..."
const ALIVE_LIST = /(?:survive players|alive players are|Which player in):\s*([^.?\n]+?)(?:\s+would you like|[.?\n]|$)/i;

export class JoinRefusedError extends Error {
  constructor(readonly identity: string) {
    super(`${identity} could not join: name taken, no open seat, or credential rejected`);
    this.name = 'JoinRefusedError';
  }
}

/**
 * Remote participant. Notices are remembered as context; request kinds are answered by the
 * responder. Dispatch is a table keyed by message kind.
 */
export class PlayerAgent implements MessageHandler {
  readonly identity: string;
  private currentRole = 'unknown';
  private notices: string[] = [];
  private importantInfo?: string;
  private alive: string[] = [];
  private readonly handlers: Partial<Record<MessageKind, Handler>>;

  constructor(
    identity: string,
    private readonly responder: Responder,
    private readonly opts: { noticeWindow?: number } = {}
  ) {
    this.identity = identity;
    const ask: Handler = message => this.ask(message);
    this.handlers = {
      'system-notice': async message => {
        this.remember(message.content);
        return '';
      },
      'important-info': async message => {
        this.importantInfo = message.content;
        return '';
      },
      'night-kill': ask,
      divine: ask,
      save: ask,
      poison: ask,
      'day-discuss': ask,
      'day-vote': ask,
      move: ask,
    };
  }

  get role(): string {
    return this.currentRole;
  }

  setRole(role: string) {
    this.currentRole = role;
  }

  async handle(message: Message): Promise<Message> {
    const handler = this.handlers[message.kind];
    const content = handler ? await handler(message) : '';
    return { kind: 'response', source: this.identity, content };
  }

  private remember(text: string) {
    const alive = text.match(ALIVE_LIST)?.[1];
    if (alive) {
      this.alive = alive
        .split(',')
        .map(s => s.trim())
        .filter(Boolean);
    }
    this.notices.push(text);
    const window = this.opts.noticeWindow ?? 200;
    if (this.notices.length > window) this.notices.splice(0, this.notices.length - window);
  }

  private async ask(message: Message): Promise<string> {
    this.remember(message.content);
    try {
      return await this.responder.respond({
        identity: this.identity,
        role: this.currentRole,
        kind: message.kind,
        content: message.content,
        notices: this.notices.slice(0, -1),
        importantInfo: this.importantInfo,
        alive: this.alive,
      });
    } catch (error) {
      // The moderator treats an empty answer as abstaining.
      logger.log({
        type: 'SYSTEM',
        player: this.identity,
        content: `could not answer ${message.kind}: ${errorMessage(error)}`,
        metadata: { visibility: 'private' },
      });
      return '';
    }
  }
}

/**
 * Make `agent` reachable, then ask the moderator for a seat.
 * Resolves with the assigned role; throws `JoinRefusedError` when the moderator answers empty.
 */
export async function joinGame(
  transport: Transport,
  agent: PlayerAgent,
  opts: { moderator: string; credential?: string }
): Promise<string> {
  await transport.register(agent.identity, () => agent);
  const request: Message = { kind: 'register', source: agent.identity, content: opts.credential ?? 'join werewolf game' };
  const reply = await transport.send(request, opts.moderator, agent.identity);
  const parsed = MessageSchema.safeParse(reply);
  const role = parsed.success ? parsed.data.content.trim() : '';
  if (!role) throw new JoinRefusedError(agent.identity);
  agent.setRole(role);
  return role;
}
