import type { Message } from '../types.js';
import type { Roster } from '../roster.js';
import { Mailbox } from './mailbox.js';
import { logger } from '../logger.js';
import { AuthError, errorMessage } from '../errors.js';

export interface JoinRequest {
  identity: string;
  credential: string;
  reply: (role: string) => void;
}

export interface LobbyConfig {
  timeoutMs: number;
  pollMs: number;
  /** Rejects (with `AuthError`) joins that fail verification. */
  authorize?: (identity: string, credential: string) => Promise<void>;
}

/**
 * Registration phase shared by every moderated game.
 *
 * Remote `register` messages only enqueue a request; `fill` is the single place that seats
 * anyone, and it runs on the engine loop.
 */
export class Lobby<R extends string> {
  private readonly mailbox = new Mailbox<JoinRequest>();
  private open = true;

  constructor(
    private readonly roster: Roster<R>,
    private readonly cfg: LobbyConfig,
    private readonly now: () => number = Date.now
  ) {}

  get isOpen(): boolean {
    return this.open;
  }

  /** Inbound `register` handler. Resolves with the assigned role, or '' when the join is refused. */
  requestJoin = (message: Message): Promise<string> => {
    if (!this.open) return Promise.resolve('');
    return new Promise(resolve => {
      this.mailbox.put({ identity: message.source, credential: message.content, reply: resolve });
    });
  };

  /**
   * Seat joiners until every slot is taken or the timeout elapses.
   * Returns true when the roster filled. The lobby is closed either way.
   */
  async fill(): Promise<boolean> {
    // Forget role tags from any earlier game in this process.
    logger.clearPlayerRoles();
    const deadline = this.now() + this.cfg.timeoutMs;

    while (!this.roster.isFull) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        logger.log({ type: 'SYSTEM', content: 'Registration timeout, game cannot start.' });
        this.close();
        return false;
      }

      const request = await this.mailbox.take(Math.min(this.cfg.pollMs, remaining));
      if (!request) {
        logger.log({
          type: 'SYSTEM',
          content: `Waiting for ${this.roster.openSlotCount} more players to register...`,
        });
        continue;
      }
      await this.seat(request);
    }

    this.close();
    logger.log({ type: 'SYSTEM', content: 'All players registered.' });
    return true;
  }

  private async seat(request: JoinRequest): Promise<void> {
    if (this.cfg.authorize) {
      try {
        await this.cfg.authorize(request.identity, request.credential);
      } catch (error) {
        const code = error instanceof AuthError ? error.code : 'error';
        logger.log({
          type: 'SYSTEM',
          player: request.identity,
          content: `join rejected (${code}): ${errorMessage(error)}`,
          metadata: { visibility: 'private' },
        });
        request.reply('');
        return;
      }
    }

    const role = this.roster.register(request.identity);
    if (role === undefined) {
      logger.log({
        type: 'SYSTEM',
        player: request.identity,
        content: 'join refused: name taken or no open seat',
        metadata: { visibility: 'private' },
      });
      request.reply('');
      return;
    }

    logger.setPlayerRole(request.identity, role);
    logger.log({
      type: 'SYSTEM',
      player: request.identity,
      content: `joined as ${role}`,
      metadata: { role, visibility: 'private' },
    });
    request.reply(role);
  }

  private close(): void {
    this.open = false;
    for (const pending of this.mailbox.drain()) pending.reply('');
  }
}
