import * as fs from 'fs';
import * as yaml from 'yaml';
import { ZodError } from 'zod';
import { GameConfigSchema, type GameConfig } from './types.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export function parseConfig(raw: unknown): GameConfig {
  try {
    const config = GameConfigSchema.parse(raw ?? {});
    const totalSlots = Object.values(config.role_slots).reduce<number>((a, b) => a + (b ?? 0), 0);
    if (totalSlots === 0) {
      throw new ConfigError('role_slots must define at least one seat.');
    }
    return config;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (error instanceof ZodError) {
      const details = error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid game config: ${details}`, { cause: error });
    }
    throw error;
  }
}

export function loadConfig(configPath: string): GameConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = parseConfig(yaml.parse(fileContents));
    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${errorMessage(error)}`,
      metadata: { visibility: 'private' },
    });
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export interface SessionEnv {
  taskId: string;
  gatewayApiKey?: string;
}

/**
 * Reads the session values every run needs. The gateway key is only required when
 * participants call a model.
 */
export function loadSessionEnv(env: NodeJS.ProcessEnv, opts: { requireGatewayKey: boolean }): SessionEnv {
  const taskId = (env.WEREWOLF_TASK_ID ?? '').trim();
  if (!taskId) {
    throw new ConfigError("'WEREWOLF_TASK_ID' is not set. Add it to your .env file or the environment.");
  }

  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  if (opts.requireGatewayKey && !gatewayApiKey) {
    throw new ConfigError(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  return { taskId, gatewayApiKey };
}
