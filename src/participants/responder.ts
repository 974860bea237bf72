import { generateText, gateway, type ModelMessage } from 'ai';
import type { MessageKind, PlayerConfig } from '../types.js';
import { fnv1a32 } from '../utils.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { gamePrompt, responseFormat } from './prompts.js';

/** Everything a participant knows when it has to answer a request. */
export interface ResponderRequest {
  identity: string;
  role: string;
  kind: MessageKind;
  content: string;
  /** Public notices received so far, oldest first. */
  notices: readonly string[];
  /** Private info (e.g. the wolf team), if any was received. */
  importantInfo?: string;
  /** Latest list of living players the participant has seen. */
  alive: readonly string[];
}

export interface Responder {
  respond(request: ResponderRequest): Promise<string>;
}

/** Model-backed responder through Vercel AI Gateway. */
export class GatewayResponder implements Responder {
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(private readonly config: PlayerConfig) {
    if (!config.model.includes('/')) {
      throw new Error(
        `Invalid model id "${config.model}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o").`
      );
    }
  }

  async respond(request: ResponderRequest): Promise<string> {
    const system = [gamePrompt(request.identity, request.role), request.importantInfo, responseFormat(request.kind)]
      .filter(Boolean)
      .join('\n\n');

    const messages: ModelMessage[] = [
      ...request.notices.map((text): ModelMessage => ({ role: 'user', content: text })),
      { role: 'user', content: request.content },
    ];

    try {
      const result = await generateText({
        model: this.getModel(),
        system,
        messages,
        temperature: this.config.temperature,
      });
      return result.text.trim();
    } catch (error) {
      logger.log({
        type: 'SYSTEM',
        player: request.identity,
        content: `Error generating ${request.kind} response: ${errorMessage(error)}`,
        metadata: { visibility: 'private' },
      });
      throw error;
    }
  }

  private getModel(): ReturnType<typeof gateway> {
    this.cachedModel ??= gateway(this.config.model);
    return this.cachedModel;
  }
}

function pickDeterministic(options: readonly string[], key: string): string | undefined {
  if (options.length === 0) return undefined;
  return options[fnv1a32(key) % options.length];
}

const KNOWN_WOLF = /The role of (.+?) is wolf/i;
const WOLF_TEAM = /The wolves are:\s*(.+)$/i;
const POSSIBLE_MOVES = /Possible moves are:\s*(.+)$/im;

function splitNames(list: string): string[] {
  return list
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * Offline responder for dry runs and tests. Answers are a pure function of the seed and the
 * request, so the same game replays identically.
 */
export class ScriptedResponder implements Responder {
  constructor(private readonly seed: number = 1) {}

  async respond(request: ResponderRequest): Promise<string> {
    const key = `${this.seed}|${request.identity}|${request.kind}|${request.notices.length}`;
    const self = request.identity.toLowerCase();
    const teammates = request.importantInfo?.match(WOLF_TEAM)?.[1];
    const friends = new Set(splitNames(teammates ?? '').map(n => n.toLowerCase()));
    const suspect = this.knownWolf(request);
    const others = request.alive.filter(n => n.toLowerCase() !== self);

    switch (request.kind) {
      case 'night-kill':
        return pickDeterministic(others.filter(n => !friends.has(n.toLowerCase())), key) ?? '';
      case 'day-vote': {
        if (suspect && others.includes(suspect)) return suspect;
        const pool = friends.size > 0 ? others.filter(n => !friends.has(n.toLowerCase())) : others;
        return pickDeterministic(pool, key) ?? '';
      }
      case 'divine':
        return pickDeterministic(others, key) ?? '';
      case 'save':
      case 'poison':
        return 'no';
      case 'day-discuss':
        return suspect ? `I have reason to believe ${suspect} is a wolf.` : 'No strong reads yet. Let us compare notes.';
      case 'move': {
        const moves = splitNames(request.content.match(POSSIBLE_MOVES)?.[1] ?? '');
        const move = pickDeterministic(moves, key);
        return move ? `thinking: dry run\nmove: ${move}` : 'thinking: no legal moves\nmove: none';
      }
      default:
        return '';
    }
  }

  private knownWolf(request: ResponderRequest): string | undefined {
    for (let i = request.notices.length - 1; i >= 0; i--) {
      const name = request.notices[i]?.match(KNOWN_WOLF)?.[1]?.trim();
      if (name) return name;
    }
    return undefined;
  }
}
