import type { Role } from '../types.js';
import { collectVotes, filterVoters, resolveName, resolveVoteTargets, toVotes } from '../tally.js';
import { normalizeName } from '../utils.js';
import { logger } from '../logger.js';
import { type RoundContext, notify } from './context.js';

export interface Investigation {
  seer: string;
  target: string;
  role: Role;
}

export interface NightOutcome {
  /** Wolves' target after the witch's heal; undefined if no one or healed. */
  killCandidate?: string;
  poisonCandidate?: string;
  healed: boolean;
  investigation?: Investigation;
}

/**
 * One night, in fixed order: wolf vote, witch heal, witch poison, seer.
 * Nothing here marks anyone dead; the engine applies the returned candidates.
 */
export class NightPhase {
  async run(ctx: RoundContext): Promise<NightOutcome> {
    logger.log({ type: 'SYSTEM', content: `--- Night ${ctx.round} ---`, metadata: { visibility: 'public' } });

    let killCandidate = await this.wolfVote(ctx);

    const witch = ctx.roster.aliveOfRole('witch')[0]?.identity;
    let healed = false;
    if (witch && ctx.budget.heal) {
      healed = await this.offerHeal(ctx, witch, killCandidate);
      if (healed) killCandidate = undefined;
    }

    let poisonCandidate: string | undefined;
    if (witch && !healed && ctx.budget.poison) {
      poisonCandidate = await this.offerPoison(ctx, witch);
    }

    const investigation = await this.divine(ctx);

    return { killCandidate, poisonCandidate, healed, investigation };
  }

  private async wolfVote(ctx: RoundContext): Promise<string | undefined> {
    const { roster, messenger } = ctx;
    const request = messenger.message('night-kill', 'Which player do you vote to eliminate?');
    const replies = await messenger.fanout(request, roster, 'wolf');

    const votes = filterVoters(
      resolveVoteTargets(toVotes(replies), roster.survivors()),
      voter => roster.isAlive(voter) && roster.roleOf(voter) === 'wolf'
    );
    for (const vote of votes) {
      logger.log({
        type: 'VOTE',
        player: vote.voter,
        content: `voted to kill ${vote.content}`,
        metadata: { vote: vote.content, visibility: 'faction', round: ctx.round },
      });
    }

    const winner = collectVotes(votes, ctx.rng);
    const target = winner === undefined ? undefined : roster.find(winner)?.identity;

    logger.log({
      type: 'ACTION',
      content: target ? `Wolves chose ${target}` : 'Wolves chose no one',
      metadata: { target, visibility: 'faction', round: ctx.round },
    });
    await notify(ctx, roster.aliveOfRole('wolf').map(p => p.identity), `The player with the most votes is: ${target ?? 'nobody'}`, {
      visibility: 'faction',
    });
    return target;
  }

  /** Offered whenever the potion is left, victim or not; `yes` always spends it. */
  private async offerHeal(ctx: RoundContext, witch: string, victim: string | undefined): Promise<boolean> {
    const request = ctx.messenger.message(
      'save',
      victim
        ? `You're the witch. Tonight ${victim} is eliminated. Would you like to resurrect this player?`
        : "You're the witch. Tonight no player is eliminated. Would you like to use the healing potion anyway?"
    );
    const result = await ctx.messenger.send(request, witch);
    if (!result.ok || normalizeName(result.response.content) !== 'yes') return false;

    ctx.budget.heal = false;
    logger.log({
      type: 'ACTION',
      player: witch,
      content: victim ? `used the healing potion on ${victim}` : 'used the healing potion on no one',
      metadata: { target: victim, visibility: 'private', round: ctx.round },
    });
    return true;
  }

  private async offerPoison(ctx: RoundContext, witch: string): Promise<string | undefined> {
    const survivors = ctx.roster.survivors();
    const request = ctx.messenger.message(
      'poison',
      `Would you like to eliminate one player? If yes, specify the player name. Alive players: ${survivors.join(', ')}.`
    );
    const result = await ctx.messenger.send(request, witch);
    if (!result.ok) return undefined;

    const answer = normalizeName(result.response.content);
    if (!answer || answer === 'no') return undefined;

    // Any answer other than `no` spends the potion, even one that names nobody.
    ctx.budget.poison = false;
    const target = resolveName(answer, survivors);
    if (!target) {
      logger.log({
        type: 'ACTION',
        player: witch,
        content: `poison answer "${result.response.content}" names no living player; potion wasted`,
        metadata: { visibility: 'private', round: ctx.round },
      });
      return undefined;
    }

    logger.log({
      type: 'ACTION',
      player: witch,
      content: `used the poison on ${target}`,
      metadata: { target, visibility: 'private', round: ctx.round },
    });
    return target;
  }

  private async divine(ctx: RoundContext): Promise<Investigation | undefined> {
    const seer = ctx.roster.aliveOfRole('seer')[0]?.identity;
    if (!seer) return undefined;

    const survivors = ctx.roster.survivors();
    const request = ctx.messenger.message(
      'divine',
      `You're the seer. Which player in: ${survivors.join(', ')} would you like to check tonight?`
    );
    const result = await ctx.messenger.send(request, seer);
    if (!result.ok) return undefined;

    const target = resolveName(result.response.content, survivors);
    const role = target === undefined ? undefined : ctx.roster.roleOf(target);
    if (!target || !role) return undefined;

    logger.log({
      type: 'ACTION',
      player: seer,
      content: `checked ${target} and found ${role}`,
      metadata: { target, result: role, visibility: 'private', round: ctx.round },
    });
    await notify(ctx, [seer], `The role of ${target} is ${role}`);
    return { seer, target, role };
  }
}
