import type { GameLogEntry } from '../types.js';
import { EventBus } from './eventBus.js';

/**
 * Global stream of game log entries.
 *
 * Engines emit through the logger; the logger and any observers subscribe.
 */
export const eventBus = new EventBus<GameLogEntry>(error => {
  console.error('Log subscriber failed:', error);
});
