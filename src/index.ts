#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { loadConfig, loadSessionEnv } from './config.js';
import { logger } from './logger.js';
import { isDryRun, dryRunSeed } from './utils.js';
import type { GameConfig, GameOutcome } from './types.js';
import { LocalTransport } from './messaging/transport.js';
import { GameEngine } from './engine/gameEngine.js';
import { LedgerState, LocalLedger } from './chain/localLedger.js';
import { AuthVerifier, createAuth } from './auth/verifyAuth.js';
import { PlayerAgent, joinGame } from './participants/playerAgent.js';
import { GatewayResponder, ScriptedResponder, type Responder } from './participants/responder.js';
import { errorMessage } from './errors.js';

interface CliArgs {
  configFile: string;
  dryRun: boolean;
  seed?: number;
  quiet: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let seed: number | undefined;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }

    if (arg === '--quiet') {
      quiet = true;
      continue;
    }

    if (arg === '--seed') {
      const next = argv[i + 1];
      if (!next) throw new Error(`Missing value for ${arg}`);
      const n = Number(next);
      if (!Number.isInteger(n)) throw new Error(`Invalid seed "${next}" for ${arg}`);
      seed = n;
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'werewolf-config.yaml', dryRun, seed, quiet };
}

/**
 * Runs a full local session: the moderator plus one in-process participant per configured player,
 * all on one `LocalTransport` and one in-memory ledger.
 */
async function runLocalSession(config: GameConfig, taskId: string, dryRun: boolean): Promise<GameOutcome> {
  const transport = new LocalTransport();
  const ledger = new LedgerState();
  const moderatorWallet = new LocalLedger(ledger);
  await moderatorWallet.register(config.moderator);
  await moderatorWallet.createTask(taskId, 1_000_000);

  const engine = new GameEngine(config, {
    transport,
    sessionId: taskId,
    auth: config.require_auth ? new AuthVerifier(moderatorWallet) : undefined,
  });
  await engine.open();
  const game = engine.start();

  const joins = config.players.map(async player => {
    const wallet = new LocalLedger(ledger);
    await wallet.register(player.name);
    await wallet.joinTask(taskId, player.name);

    const responder: Responder = dryRun ? new ScriptedResponder(dryRunSeed()) : new GatewayResponder(player);
    const agent = new PlayerAgent(player.name, responder);
    const credential = config.require_auth ? await createAuth(wallet, Math.floor(Date.now() / 1000)) : undefined;
    try {
      const role = await joinGame(transport, agent, { moderator: config.moderator, credential });
      logger.log({ type: 'SYSTEM', player: player.name, content: `joined the game`, metadata: { role, visibility: 'private' } });
    } catch (error) {
      logger.log({ type: 'SYSTEM', player: player.name, content: `join failed: ${errorMessage(error)}` });
    }
  });

  const [outcome] = await Promise.all([game, Promise.all(joins)]);
  return outcome;
}

async function main(): Promise<void> {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.quiet) logger.setConsoleOutputEnabled(false);

  if (args.dryRun) {
    process.env.WEREWOLF_DRY_RUN = '1';
    if (args.seed !== undefined) process.env.WEREWOLF_DRY_RUN_SEED = String(args.seed);
  }
  const dryRun = isDryRun();
  if (dryRun) {
    logger.setPersistenceEnabled(false);
    logger.log({
      type: 'SYSTEM',
      content: `Dry-run mode enabled (seed: ${process.env.WEREWOLF_DRY_RUN_SEED ?? 'default'})`,
    });
  }

  // Configuration problems are fatal before any game state exists.
  const session = loadSessionEnv(process.env, { requireGatewayKey: !dryRun });
  const config = loadConfig(path.resolve(process.cwd(), args.configFile));
  // Dry runs replay identically unless the config pins its own seed.
  const seed = args.seed ?? config.seed ?? (dryRun ? dryRunSeed() : undefined);

  const outcome = await runLocalSession({ ...config, seed }, session.taskId, dryRun);
  if (outcome.kind === 'aborted') process.exitCode = 2;
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exitCode = 1;
});
