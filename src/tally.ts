import type { Reply } from './messaging/messenger.js';
import type { Rng } from './random.js';
import { pickRandom } from './random.js';
import { normalizeName } from './utils.js';

export interface Vote {
  voter: string;
  content: string;
}

/** Votes are attributed to the identity that was asked, not to the self-reported source. */
export function toVotes(replies: readonly Reply[]): Vote[] {
  return replies.map(r => ({ voter: r.from, content: r.message.content }));
}

/**
 * Count votes per normalized target and return the winner.
 *
 * Ties are broken by a uniform draw from `rng` over the tied targets in sorted order,
 * so the result depends on the seed and never on arrival order.
 * Returns undefined when no vote names anyone.
 */
export function collectVotes(votes: readonly Vote[], rng: Rng): string | undefined {
  const counts = new Map<string, number>();
  for (const vote of votes) {
    const target = normalizeName(vote.content);
    if (!target) continue;
    counts.set(target, (counts.get(target) ?? 0) + 1);
  }
  if (counts.size === 0) return undefined;

  let max = 0;
  for (const n of counts.values()) max = Math.max(max, n);

  const leaders = [...counts.entries()]
    .filter(([, n]) => n === max)
    .map(([target]) => target)
    .sort();
  if (leaders.length === 1) return leaders[0];
  return pickRandom(leaders, rng);
}

/**
 * Map free-text content to the first candidate (in the order given) whose name appears in it.
 *
 * Matching is case-insensitive substring containment, first match wins. A short name contained
 * in a longer one ("al" in "alice") resolves to whichever comes first in `candidates`.
 */
export function resolveName(content: string, candidates: readonly string[]): string | undefined {
  const text = normalizeName(content);
  if (!text) return undefined;
  return candidates.find(name => {
    const key = normalizeName(name);
    return key !== '' && text.includes(key);
  });
}

/**
 * Rewrite each vote's content to a canonical candidate name and drop votes naming no one.
 * `candidates` should be the alive identities in roster order.
 */
export function resolveVoteTargets(votes: readonly Vote[], candidates: readonly string[]): Vote[] {
  const resolved: Vote[] = [];
  for (const vote of votes) {
    const target = resolveName(vote.content, candidates);
    if (target === undefined) continue;
    resolved.push({ voter: vote.voter, content: target });
  }
  return resolved;
}

/** Keep votes whose voter passes `eligible`. */
export function filterVoters(votes: readonly Vote[], eligible: (voter: string) => boolean): Vote[] {
  return votes.filter(v => eligible(v.voter));
}
