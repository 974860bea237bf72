import type { Side } from '../types.js';

/**
 * Black-box rules of an embedded two-player board game. The moderator never looks inside;
 * it only asks these questions and forwards the text.
 */
export interface BoardRules {
  /** Human-readable board for the prompt. */
  describe(): string;
  legalMoves(side: Side): string[];
  isLegal(side: Side, move: string): boolean;
  /** Apply a legal move and return a one-line summary of it. */
  apply(side: Side, move: string): string;
  isGameOver(): boolean;
  /** Winning side once the game is over; 'draw' for no winner. */
  winner(): Side | 'draw' | undefined;
}

export interface ParsedMove {
  thinking: string;
  move: string;
}

/**
 * Parse a reply of the form `thinking: ... move: ...`.
 * Returns undefined when either label is missing or either part is empty.
 */
export function parseMoveReply(reply: string): ParsedMove | undefined {
  const lower = reply.toLowerCase();
  const thinkingAt = lower.indexOf('thinking:');
  const moveAt = lower.lastIndexOf('move:');
  if (thinkingAt < 0 || moveAt < 0 || moveAt < thinkingAt) return undefined;

  const thinking = reply.slice(thinkingAt + 'thinking:'.length, moveAt).trim();
  const move = reply.slice(moveAt + 'move:'.length).trim().split(/\s+/)[0] ?? '';
  if (!thinking || !move) return undefined;
  return { thinking, move };
}

export function otherSide(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}
