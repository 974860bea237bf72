import type { MessageKind } from '../types.js';
import { SideSchema } from '../types.js';

const WEREWOLF_RULES = `Act as a player in a werewolf game.

PLAYER ROLES:
Players are split into two wolves, two villagers, one seer and one witch. Only wolves know who their teammates are.
Wolves: know each other and eliminate one villager each night while trying to stay undetected.
Villagers: do not know who the wolves are; during the day they work out who the wolves might be and vote them out.
Seer: a villager who learns the true role of one player each night.
Witch: a villager with one healing potion (saves the night's victim) and one poison (eliminates a player at night), each usable once.

GAME RULE:
Night and day alternate until one side wins.
1. Night: wolves vote for a victim; the witch may heal or poison; the seer checks one player.
2. Day: surviving players discuss, then vote; the player with the most votes is eliminated.

VICTORY CONDITION:
Wolves win once they are at least as many as the other living players.
Villagers win once every wolf is eliminated.

CONSTRAINTS:
Respond only from the conversation so far and your strategy.`;

export function gamePrompt(identity: string, role: string): string {
  if (SideSchema.safeParse(role).success) {
    return `You are a chess player named ${identity} and you play as: ${role}.
You are playing against another player; make the best move to win the game.
Choose a move from the possible moves.`;
  }
  return `${WEREWOLF_RULES}\n\nYour name is ${identity} and you are playing ${role} in this game.`;
}

const RESPONSE_FORMATS: Partial<Record<MessageKind, string>> = {
  'night-kill': 'Please only specify the name of the player you want to eliminate.',
  'day-vote': 'Please only specify the name of the player you suspect to be a werewolf.',
  save: "Please respond with 'yes' if you want to use the healing potion, or 'no' if not.",
  poison: "Please only specify a player name if you want to use the poison, or respond with 'no'.",
  divine: 'Please only specify the name of the player whose identity you want to investigate.',
  'day-discuss': 'Please share your suspicions and reasoning concisely. You may choose to reveal your role based on your strategy.',
  move: `Please respond with your move in the following format:
thinking: [your thought process]
move: [your move from the possible moves]
For example:
thinking: I want to control the center
move: e2e4`,
};

export function responseFormat(kind: MessageKind): string {
  return RESPONSE_FORMATS[kind] ?? 'Please respond according to the game rules and your role.';
}
