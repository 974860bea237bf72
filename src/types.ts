import { z } from 'zod';

// --- Roles & messages ---

export const RoleSchema = z.enum(['wolf', 'villager', 'seer', 'witch']);
export type Role = z.infer<typeof RoleSchema>;

// Two-sided turn games (see sideGame/) reuse the roster with these slots.
export const SideSchema = z.enum(['white', 'black']);
export type Side = z.infer<typeof SideSchema>;

export const MessageKindSchema = z.enum([
  'register',
  'system-notice',
  'response',
  'important-info',
  'night-kill',
  'divine',
  'save',
  'poison',
  'day-discuss',
  'day-vote',
  'move',
]);
export type MessageKind = z.infer<typeof MessageKindSchema>;

export const MessageSchema = z.object({
  kind: MessageKindSchema,
  source: z.string(),
  content: z.string(),
});
export type Message = Readonly<z.infer<typeof MessageSchema>>;

// Credential carried in the content of a `register` message when the session is gated.
export const JoinCredentialSchema = z.object({
  timestamp: z.union([z.number(), z.string()]),
  signature: z.string(),
});
export type JoinCredential = z.infer<typeof JoinCredentialSchema>;

// --- Configuration Types ---

export const PlayerConfigSchema = z.object({
  name: z.string().min(1),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o'),
  temperature: z.number().default(0.7),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const DEFAULT_ROLE_SLOTS: Readonly<Record<Role, number>> = {
  wolf: 2,
  villager: 2,
  seer: 1,
  witch: 1,
};

export const GameConfigSchema = z.object({
  moderator: z.string().min(1).default('moderator'),
  // Slot table: role -> number of seats. Slot order follows this table's key order.
  role_slots: z.record(RoleSchema, z.number().int().nonnegative()).default({ ...DEFAULT_ROLE_SLOTS }),
  max_rounds: z.number().int().positive().default(10),
  registration_timeout_seconds: z.number().positive().default(300),
  registration_poll_seconds: z.number().positive().default(5),
  send_timeout_ms: z.number().int().positive().default(60_000),
  // Seeds role assignment and tie-breaks. If omitted, a time-based seed is used.
  seed: z.number().int().optional(),
  require_auth: z.boolean().default(false),
  // Local participants spawned by the CLI.
  players: z.array(PlayerConfigSchema).default([]),
});
export type GameConfig = z.infer<typeof GameConfigSchema>;

export const SideGameConfigSchema = z.object({
  moderator: z.string().min(1).default('moderator'),
  max_turns: z.number().int().positive().default(100),
  registration_timeout_seconds: z.number().positive().default(300),
  registration_poll_seconds: z.number().positive().default(5),
  send_timeout_ms: z.number().int().positive().default(60_000),
  seed: z.number().int().optional(),
});
export type SideGameConfig = z.infer<typeof SideGameConfigSchema>;

// --- Game State Types ---

export type Phase = 'lobby' | 'night' | 'day' | 'terminal';

export type Faction = 'wolves' | 'village';

export type GameOutcome =
  | { kind: 'winner'; winner: Faction }
  | { kind: 'round-limit'; rounds: number }
  | { kind: 'aborted'; reason: string };

export type SideGameOutcome =
  | { kind: 'winner'; side: Side; identity: string }
  | { kind: 'draw' }
  | { kind: 'turn-limit'; turns: number }
  | { kind: 'aborted'; reason: string };

export interface AbilityBudget {
  heal: boolean;
  poison: boolean;
}

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'NOTICE' | 'CHAT' | 'ACTION' | 'VOTE' | 'DEATH' | 'WIN' | 'DELIVERY';

export type LogVisibility = 'public' | 'private' | 'faction';

export interface GameLogMetadata {
  role?: string;
  visibility?: LogVisibility;

  player?: string;
  target?: string;
  vote?: string;
  result?: string;
  round?: number;

  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
