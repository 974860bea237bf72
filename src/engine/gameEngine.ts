import type { AbilityBudget, Faction, GameConfig, GameOutcome, Phase, Role } from '../types.js';
import { Roster } from '../roster.js';
import { createRng, type Rng } from '../random.js';
import { Messenger } from '../messaging/messenger.js';
import type { Transport } from '../messaging/transport.js';
import { logger } from '../logger.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { AuthVerifier } from '../auth/verifyAuth.js';
import { Lobby } from './lobby.js';
import { ModeratorHandler } from './moderatorHandler.js';
import { evaluateWin } from './win.js';
import { type RoundContext, announce, notify } from '../phases/context.js';
import { NightPhase, type NightOutcome } from '../phases/nightPhase.js';
import { DayPhase } from '../phases/dayPhase.js';

export interface GameEngineDeps {
  transport: Transport;
  /** Task / session the participants join; checked by the auth verifier. */
  sessionId: string;
  rng?: Rng;
  auth?: AuthVerifier;
  now?: () => number;
}

const PHASE_ORDER: Record<Phase, number> = { lobby: 0, night: 1, day: 2, terminal: 3 };

export function outcomeText(outcome: GameOutcome): string {
  switch (outcome.kind) {
    case 'winner':
      return outcome.winner === 'wolves' ? 'Game over: wolf win' : 'Game over: village win';
    case 'round-limit':
      return `Game over: no winner after ${outcome.rounds} rounds`;
    case 'aborted':
      return `Game aborted: ${outcome.reason}`;
  }
}

/**
 * Moderator for one werewolf game.
 *
 * Single writer: roster, phase and ability budget change only inside `start()`'s loop.
 * Inbound messages (registrations) are queued by the lobby and applied on the loop's turn.
 */
export class GameEngine {
  readonly config: GameConfig;
  readonly roster: Roster<Role>;
  readonly messenger: Messenger;
  readonly lobby: Lobby<Role>;
  readonly budget: AbilityBudget = { heal: true, poison: true };

  round = 0;
  outcome?: GameOutcome;

  private currentPhase: Phase = 'lobby';
  private readonly transport: Transport;
  private readonly rng: Rng;
  private readonly nightPhaseRunner = new NightPhase();
  private readonly dayPhaseRunner = new DayPhase();

  constructor(config: GameConfig, deps: GameEngineDeps) {
    if (config.require_auth && !deps.auth) {
      throw new ConfigError('require_auth is set but no auth verifier was provided.');
    }

    this.config = config;
    this.transport = deps.transport;
    this.rng = deps.rng ?? createRng(config.seed);
    this.roster = new Roster<Role>(config.role_slots, this.rng);
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

  get phase(): Phase {
    return this.currentPhase;
  }

  /** Make the moderator reachable. Must be called before participants try to join. */
  async open(): Promise<void> {
    await this.transport.register(
      this.config.moderator,
      () => new ModeratorHandler(this.config.moderator, { register: this.lobby.requestJoin })
    );
    logger.log({ type: 'SYSTEM', content: `Moderator ${this.config.moderator} is accepting registrations.` });
  }

  async start(): Promise<GameOutcome> {
    if (this.outcome) return this.outcome;

    const filled = await this.lobby.fill();
    if (!filled) return this.finish({ kind: 'aborted', reason: 'registration timeout' });

    await this.revealWolves();
    logger.log({ type: 'SYSTEM', content: 'Game starting...', metadata: { visibility: 'public' } });

    for (let round = 1; round <= this.config.max_rounds; round++) {
      this.round = round;
      const ctx = this.roundContext();

      this.enter('night');
      let night: NightOutcome;
      try {
        await announce(ctx, `New night comes. There are survive players: ${this.roster.survivors().join(', ')}`);
        night = await this.nightPhaseRunner.run(ctx);
      } catch (error) {
        return this.abort('night phase failed', error);
      }

      const eliminated = this.applyNightEliminations(night);
      const nightWinner = evaluateWin(this.roster);
      if (nightWinner) return this.finish({ kind: 'winner', winner: nightWinner });

      this.enter('day');
      try {
        await this.dayPhaseRunner.run(ctx, eliminated);
      } catch (error) {
        return this.abort('day phase failed', error);
      }

      const dayWinner: Faction | undefined = evaluateWin(this.roster);
      if (dayWinner) return this.finish({ kind: 'winner', winner: dayWinner });
    }

    return this.finish({ kind: 'round-limit', rounds: this.config.max_rounds });
  }

  /** Kill first, then poison. Returns the names actually marked dead. */
  private applyNightEliminations(night: NightOutcome): string[] {
    const eliminated: string[] = [];
    for (const candidate of [night.killCandidate, night.poisonCandidate]) {
      if (candidate === undefined) continue;
      const dead = this.roster.markDead(candidate);
      if (dead === undefined) continue;
      eliminated.push(dead);
      logger.log({
        type: 'DEATH',
        player: dead,
        content: 'died during the night.',
        metadata: { visibility: 'public', round: this.round },
      });
    }
    return eliminated;
  }

  private async revealWolves(): Promise<void> {
    const wolves = this.roster.peersOf('wolf');
    await notify(this.roundContext(), wolves, `The wolves are: ${wolves.join(', ')}`, {
      kind: 'important-info',
      visibility: 'faction',
    });
  }

  private roundContext(): RoundContext {
    return {
      round: this.round,
      roster: this.roster,
      messenger: this.messenger,
      budget: this.budget,
      rng: this.rng,
    };
  }

  private enter(next: Phase): void {
    if (this.currentPhase === 'terminal') {
      throw new Error(`Cannot enter ${next}: the game is over`);
    }
    if (PHASE_ORDER[next] < PHASE_ORDER[this.currentPhase] && !(next === 'night' && this.currentPhase === 'day')) {
      throw new Error(`Illegal phase transition ${this.currentPhase} -> ${next}`);
    }
    this.currentPhase = next;
  }

  private async abort(message: string, error: unknown): Promise<GameOutcome> {
    const reason = `${message}: ${errorMessage(error)}`;
    logger.log({
      type: 'SYSTEM',
      content: `Engine abort: ${reason}`,
      metadata: { visibility: 'private' },
    });
    return this.finish({ kind: 'aborted', reason });
  }

  private async finish(outcome: GameOutcome): Promise<GameOutcome> {
    this.currentPhase = 'terminal';
    this.outcome = outcome;

    const text = outcomeText(outcome);
    logger.log({
      type: outcome.kind === 'winner' ? 'WIN' : 'SYSTEM',
      content: text,
      metadata: { visibility: 'public', round: this.round },
    });
    await this.messenger.broadcast(this.messenger.message('system-notice', text), this.roster);
    return outcome;
  }
}
