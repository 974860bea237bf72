import { collectVotes, filterVoters, resolveVoteTargets, toVotes } from '../tally.js';
import { logger } from '../logger.js';
import { type RoundContext, announce } from './context.js';

export interface DayOutcome {
  eliminated?: string;
}

export function nightResultsText(eliminated: readonly string[]): string {
  if (eliminated.length === 0) {
    return 'The day is coming, all the players open your eyes. Last night is peaceful, no player is eliminated.';
  }
  return `The day is coming, all the players open your eyes. Last night, the following player(s) has been eliminated: ${eliminated.join(', ')}`;
}

export class DayPhase {
  async run(ctx: RoundContext, nightEliminated: readonly string[]): Promise<DayOutcome> {
    logger.log({ type: 'SYSTEM', content: `--- Day ${ctx.round} ---`, metadata: { visibility: 'public' } });
    await announce(ctx, nightResultsText(nightEliminated));

    await this.discuss(ctx);
    return this.vote(ctx);
  }

  /**
   * Speakers go one at a time in seat order. Each statement is re-broadcast before the next
   * speaker is asked, so later speakers hear earlier ones.
   */
  private async discuss(ctx: RoundContext): Promise<void> {
    const { roster, messenger } = ctx;
    const speakers = roster.survivors();
    const request = messenger.message(
      'day-discuss',
      `Now the alive players are: ${speakers.join(', ')}. Given the game rules and your role, based on the situation and the information you gain, what do you want to say to others?`
    );

    for (const speaker of speakers) {
      const result = await messenger.send(request, speaker);
      if (!result.ok) continue;
      const statement = result.response.content.trim();
      if (!statement) continue;

      logger.log({ type: 'CHAT', player: speaker, content: statement, metadata: { visibility: 'public', round: ctx.round } });
      await messenger.broadcast(messenger.message('system-notice', `${speaker}: ${statement}`), roster);
    }
  }

  private async vote(ctx: RoundContext): Promise<DayOutcome> {
    const { roster, messenger } = ctx;
    logger.log({ type: 'SYSTEM', content: `--- Day ${ctx.round} Voting ---`, metadata: { visibility: 'public' } });

    const request = messenger.message('day-vote', "It's time to vote. Which player do you suspect to be a wolf?");
    const replies = await messenger.fanout(request, roster, '*');
    const votes = filterVoters(resolveVoteTargets(toVotes(replies), roster.survivors()), voter => roster.isAlive(voter));

    for (const vote of votes) {
      logger.log({
        type: 'VOTE',
        player: vote.voter,
        content: `voted for ${vote.content}`,
        metadata: { vote: vote.content, visibility: 'public', round: ctx.round },
      });
    }

    const winner = collectVotes(votes, ctx.rng);
    const target = winner === undefined ? undefined : roster.find(winner)?.identity;
    if (!target) {
      logger.log({ type: 'SYSTEM', content: 'No valid votes. No one was eliminated.', metadata: { visibility: 'public' } });
      return {};
    }

    await announce(ctx, `The voting result is: Player ${target} has been eliminated.`);
    const eliminated = roster.markDead(target);
    if (eliminated) {
      logger.log({ type: 'DEATH', player: eliminated, content: 'was eliminated by vote.', metadata: { visibility: 'public', round: ctx.round } });
    }
    return { eliminated };
  }
}
