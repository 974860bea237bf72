import type { AbilityBudget, LogVisibility, MessageKind, Role } from '../types.js';
import type { Roster } from '../roster.js';
import type { Messenger } from '../messaging/messenger.js';
import type { Rng } from '../random.js';
import { logger } from '../logger.js';

/** What a phase runner may touch during one round. Only the engine builds one. */
export interface RoundContext {
  readonly round: number;
  readonly roster: Roster<Role>;
  readonly messenger: Messenger;
  readonly budget: AbilityBudget;
  readonly rng: Rng;
}

/** Public announcement: logged once, then sent to every alive participant. */
export async function announce(ctx: RoundContext, content: string): Promise<void> {
  logger.log({ type: 'SYSTEM', content, metadata: { visibility: 'public', round: ctx.round } });
  await ctx.messenger.broadcast(ctx.messenger.message('system-notice', content), ctx.roster);
}

/** Private notice to specific participants. Failures are logged by the messenger and ignored. */
export async function notify(
  ctx: RoundContext,
  recipients: readonly string[],
  content: string,
  opts: { kind?: MessageKind; visibility?: LogVisibility } = {}
): Promise<void> {
  if (recipients.length === 0) return;
  const kind = opts.kind ?? 'system-notice';
  logger.log({
    type: 'NOTICE',
    content: `to ${recipients.join(', ')}: ${content}`,
    metadata: { visibility: opts.visibility ?? 'private', kind, round: ctx.round },
  });
  await ctx.messenger.fanoutTo(ctx.messenger.message(kind, content), recipients);
}
