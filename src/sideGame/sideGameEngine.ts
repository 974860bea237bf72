import type { Side, SideGameConfig, SideGameOutcome } from '../types.js';
import { Roster } from '../roster.js';
import { createRng } from '../random.js';
import { Messenger } from '../messaging/messenger.js';
import type { Transport } from '../messaging/transport.js';
import type { ChainClient } from '../chain/chainClient.js';
import type { AuthVerifier } from '../auth/verifyAuth.js';
import type { Rng } from '../random.js';
import { Lobby } from '../engine/lobby.js';
import { ModeratorHandler } from '../engine/moderatorHandler.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { type BoardRules, parseMoveReply } from './rules.js';

export interface SideGameDeps {
  transport: Transport;
  sessionId: string;
  rules: BoardRules;
  /** Receives the winner through `finishTask` when present. */
  chain?: ChainClient;
  auth?: AuthVerifier;
  rng?: Rng;
  now?: () => number;
}

export interface MoveRecord {
  turn: number;
  side: Side;
  player: string;
  move: string;
  legal: boolean;
  summary: string;
}

/**
 * Moderator for a two-seat turn game (white / black) whose rules are a black box.
 * White moves first; sides alternate whether or not the previous move was legal.
 */
export class SideGameEngine {
  readonly roster: Roster<Side>;
  readonly lobby: Lobby<Side>;
  readonly messenger: Messenger;
  readonly moves: MoveRecord[] = [];
  outcome?: SideGameOutcome;

  constructor(
    readonly config: SideGameConfig,
    private readonly deps: SideGameDeps
  ) {
    const rng = deps.rng ?? createRng(config.seed);
    this.roster = new Roster<Side>({ white: 1, black: 1 }, rng);
    this.messenger = new Messenger(deps.transport, {
      sender: config.moderator,
      sendTimeoutMs: config.send_timeout_ms,
    });
    const auth = deps.auth;
    this.lobby = new Lobby(
      this.roster,
      {
        timeoutMs: config.registration_timeout_seconds * 1000,
        pollMs: config.registration_poll_seconds * 1000,
        authorize: auth ? (identity, credential) => auth.verifyJoin(deps.sessionId, identity, credential) : undefined,
      },
      deps.now
    );
  }

  async open(): Promise<void> {
    await this.deps.transport.register(
      this.config.moderator,
      () => new ModeratorHandler(this.config.moderator, { register: this.lobby.requestJoin })
    );
  }

  async start(): Promise<SideGameOutcome> {
    if (this.outcome) return this.outcome;
    if (!(await this.lobby.fill())) return this.finish({ kind: 'aborted', reason: 'registration timeout' });

    const { rules } = this.deps;
    for (let turn = 1; turn <= this.config.max_turns; turn++) {
      if (rules.isGameOver()) break;
      const side: Side = turn % 2 === 1 ? 'white' : 'black';
      try {
        await this.playTurn(turn, side);
      } catch (error) {
        return this.finish({ kind: 'aborted', reason: `turn ${turn} failed: ${errorMessage(error)}` });
      }
    }

    if (!rules.isGameOver()) return this.finish({ kind: 'turn-limit', turns: this.config.max_turns });

    const winner = rules.winner();
    if (winner === undefined || winner === 'draw') return this.finish({ kind: 'draw' });
    const identity = this.roster.peersOf(winner)[0];
    if (identity === undefined) return this.finish({ kind: 'draw' });
    return this.finish({ kind: 'winner', side: winner, identity });
  }

  private async playTurn(turn: number, side: Side): Promise<void> {
    const { rules } = this.deps;
    const prompt = `Board: ${rules.describe()}\nPossible moves are: ${rules.legalMoves(side).join(', ')}`;
    const replies = await this.messenger.fanout(this.messenger.message('move', prompt), this.roster, side);

    for (const reply of replies) {
      const parsed = parseMoveReply(reply.message.content);
      const move = parsed?.move ?? '';
      const legal = parsed !== undefined && rules.isLegal(side, move);
      const summary = legal ? rules.apply(side, move) : `Invalid move: ${move || '(unparseable reply)'}`;

      this.moves.push({ turn, side, player: reply.from, move, legal, summary });
      logger.log({
        type: legal ? 'ACTION' : 'SYSTEM',
        player: reply.from,
        content: summary,
        metadata: { role: side, visibility: 'public', turn, thinking: parsed?.thinking },
      });
    }
  }

  private async finish(outcome: SideGameOutcome): Promise<SideGameOutcome> {
    this.outcome = outcome;
    const text =
      outcome.kind === 'winner'
        ? `Game over! ${outcome.identity} (${outcome.side}) wins!`
        : outcome.kind === 'draw'
          ? 'Game over! Draw!'
          : outcome.kind === 'turn-limit'
            ? `Game over, no winner after ${outcome.turns} turns`
            : `Game aborted: ${outcome.reason}`;
    logger.log({ type: outcome.kind === 'winner' ? 'WIN' : 'SYSTEM', content: text, metadata: { visibility: 'public' } });

    if (outcome.kind === 'winner' && this.deps.chain) {
      try {
        await this.deps.chain.finishTask(this.deps.sessionId, outcome.identity);
      } catch (error) {
        logger.log({
          type: 'SYSTEM',
          content: `Could not record winner on chain: ${errorMessage(error)}`,
          metadata: { visibility: 'private' },
        });
        throw error;
      }
    }
    return outcome;
  }
}
