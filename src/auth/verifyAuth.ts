import type { ChainClient } from '../chain/chainClient.js';
import { JoinCredentialSchema, type JoinCredential } from '../types.js';
import { AuthError } from '../errors.js';
import { logger } from '../logger.js';

export const TOKEN_MAX_AGE_SECONDS = 300;

export interface AuthVerifierOptions {
  /** Clock in milliseconds. */
  now?: () => number;
  maxAgeSeconds?: number;
}

function parseTimestamp(raw: string | number): number {
  const text = String(raw).trim();
  if (!/^-?\d+$/.test(text)) throw new AuthError('InvalidTimestamp', `Invalid timestamp "${text}"`);
  return Number(text);
}

/**
 * Session gate for joining agents. Every check failure is an `AuthError`; callers must abort
 * the join or action that asked.
 */
export class AuthVerifier {
  private readonly now: () => number;
  private readonly maxAgeSeconds: number;

  constructor(
    private readonly chain: ChainClient,
    opts: AuthVerifierOptions = {}
  ) {
    this.now = opts.now ?? Date.now;
    this.maxAgeSeconds = opts.maxAgeSeconds ?? TOKEN_MAX_AGE_SECONDS;
  }

  async verify(
    sessionId: string,
    agentId: string | undefined,
    timestamp: string | number | undefined,
    signature: string | undefined
  ): Promise<void> {
    if (!signature || timestamp === undefined || timestamp === '' || !agentId) {
      throw new AuthError('Unauthorized');
    }

    const ts = parseTimestamp(timestamp);
    const currentTime = Math.floor(this.now() / 1000);
    if (currentTime - ts > this.maxAgeSeconds) {
      logger.log({ type: 'SYSTEM', player: agentId, content: 'has expired token', metadata: { visibility: 'private' } });
      throw new AuthError('TokenExpired', 'Token expired');
    }

    if (!(await this.chain.hasAuth(sessionId, agentId))) {
      logger.log({ type: 'SYSTEM', player: agentId, content: 'is not auth on chain', metadata: { visibility: 'private' } });
      throw new AuthError('NotAuthorized', 'No auth on chain');
    }

    const address = await this.chain.getAgent(agentId);
    if (!address || !(await this.chain.validSignature(String(ts), signature, address))) {
      logger.log({ type: 'SYSTEM', player: agentId, content: 'has invalid signature', metadata: { visibility: 'private' } });
      throw new AuthError('InvalidSignature', 'Invalid signature');
    }
  }

  /** Verify the JSON credential carried in a `register` message. */
  async verifyJoin(sessionId: string, agentId: string, credential: string): Promise<void> {
    const parsed = parseJoinCredential(credential);
    await this.verify(sessionId, agentId, parsed?.timestamp, parsed?.signature);
  }
}

export function parseJoinCredential(content: string): JoinCredential | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    // Plain-text join message: no credential.
    return undefined;
  }
  const parsed = JoinCredentialSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/** Credential for `register`: the signed current time in whole seconds. */
export async function createAuth(chain: ChainClient, timestamp: number): Promise<string> {
  if (!Number.isInteger(timestamp)) throw new AuthError('InvalidTimestamp', 'Invalid timestamp in create');
  const signature = await chain.signMessage(String(timestamp));
  return JSON.stringify({ timestamp, signature } satisfies JoinCredential);
}
