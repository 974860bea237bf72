import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { GameLogEntry, LogType } from './types.js';
import { eventBus } from './events/index.js';
import { envFlag } from './utils.js';

const ROLE_COLORS: Record<string, (text: string) => string> = {
  wolf: chalk.red,
  villager: chalk.green,
  seer: chalk.blue,
  witch: chalk.magenta,
  white: chalk.whiteBright,
  black: chalk.gray,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  NOTICE: chalk.cyan,
  CHAT: chalk.white,
  ACTION: chalk.yellow,
  VOTE: chalk.blue,
  DEATH: chalk.bgRed.white,
  WIN: chalk.green.bold,
  DELIVERY: chalk.yellowBright,
};

const WORD_COLORS: Record<string, (text: string) => string> = {
  wolf: chalk.red,
  wolves: chalk.red,
  villager: chalk.green,
  villagers: chalk.green,
  seer: chalk.blue,
  seers: chalk.blue,
  witch: chalk.magenta,
  witches: chalk.magenta,
};

const PLAYER_COLOR = chalk.hex('#FFA500');

export class GameLogger {
  private logDir: string;
  private logFile: string;
  private transcriptFile: string;
  private logs: GameLogEntry[] = [];
  private consoleOutputEnabled = true;
  private persistenceEnabled = true;
  private playerRoles: Map<string, string> = new Map();

  constructor(logDir = path.join(process.cwd(), 'logs')) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logDir = logDir;
    this.logFile = path.join(logDir, `game-${timestamp}.json`);
    this.transcriptFile = path.join(logDir, `transcript-${timestamp}.txt`);

    // The logger listens on the global bus and persists/prints entries.
    eventBus.subscribe(entry => {
      this.handleEntry(entry);
    });
  }

  /**
   * Enable or disable writing `logs/game-*.json` and `logs/transcript-*.txt`.
   * Dry runs and tests turn this off; console output and in-memory logs are unaffected.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  setPlayerRole(player: string, role: string) {
    this.playerRoles.set(player, role);
  }

  clearPlayerRoles() {
    this.playerRoles.clear();
  }

  getLogs(): GameLogEntry[] {
    return this.logs.slice();
  }

  /**
   * Emit a log entry on the global bus and return the materialized entry.
   * Entries about a known player are tagged with that player's role unless the caller set one.
   */
  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const enriched = this.enrichEntry(fullEntry);
    eventBus.emit(enriched);
    return enriched;
  }

  private enrichEntry(entry: GameLogEntry): GameLogEntry {
    const hasRoleProperty = entry.metadata !== undefined && 'role' in entry.metadata;
    const inferredRole = entry.player && !hasRoleProperty ? this.playerRoles.get(entry.player) : undefined;
    if (inferredRole === undefined) return entry;
    return {
      ...entry,
      metadata: { ...(entry.metadata ?? {}), role: inferredRole },
    };
  }

  private handleEntry(entry: GameLogEntry) {
    this.logs.push(entry);
    this.flush();

    if (!this.consoleOutputEnabled) return;

    // Notices are echoed per recipient and get noisy; opt in.
    if (entry.type === 'NOTICE' && !envFlag('WEREWOLF_PRINT_NOTICES')) return;

    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role ?? this.playerRoles.get(entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role]?.(role) ?? role}` : '';
      playerInfo = ` <${PLAYER_COLOR(entry.player)}${roleStr}>`;
    }

    const content = entry.content.replace(/\b(wolves|wolf|villagers?|seers?|witch(?:es)?)\b/gi, match => {
      const colorFn = WORD_COLORS[match.toLowerCase()];
      return colorFn ? colorFn(match) : match;
    });

    console.log(`${prefix} ${typeStr}${playerInfo}: ${content}`);
  }

  private flush() {
    if (!this.persistenceEnabled) return;
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    fs.writeFileSync(this.logFile, JSON.stringify(this.logs, null, 2));
    fs.writeFileSync(this.transcriptFile, buildTranscriptText(this.logs));
  }
}

/** Public transcript: private and faction entries never appear. */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    const visibility = entry.metadata?.visibility;
    if (visibility === 'private' || visibility === 'faction') continue;
    if (entry.type === 'NOTICE' || entry.type === 'DELIVERY' || entry.type === 'ACTION') continue;

    switch (entry.type) {
      case 'CHAT':
        lines.push(entry.player ? `${entry.player}: ${entry.content}` : `[CHAT] ${entry.content}`);
        break;
      case 'VOTE':
      case 'DEATH':
        lines.push(`[${entry.type}] ${entry.player ? `${entry.player} ` : ''}${entry.content}`.trimEnd());
        break;
      default:
        lines.push(`[${entry.type}] ${entry.content}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export const logger = new GameLogger();
