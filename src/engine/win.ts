import type { Faction, Role } from '../types.js';
import type { Roster } from '../roster.js';

/**
 * Winner for the current roster, if any.
 * - Wolves win at parity or better: `aliveWolves * 2 >= aliveTotal`.
 * - Otherwise the village wins once no wolf is alive.
 */
export function evaluateWin(roster: Roster<Role>): Faction | undefined {
  const aliveWolves = roster.countAlive('wolf');
  const aliveTotal = roster.countAlive();

  if (aliveWolves * 2 >= aliveTotal) return 'wolves';
  if (aliveWolves === 0) return 'village';
  return undefined;
}
