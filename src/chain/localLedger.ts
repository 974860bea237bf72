import { createPublicKey, generateKeyPairSync, sign, verify, type KeyObject } from 'node:crypto';
import type { ChainClient } from './chainClient.js';

interface TaskRecord {
  owner: string;
  price: number;
  members: Set<string>;
  winner?: string;
}

/** Shared in-memory state behind every `LocalLedger` wallet of one session. */
export class LedgerState {
  readonly agents = new Map<string, string>();
  readonly tasks = new Map<string, TaskRecord>();

  task(taskId: string): TaskRecord | undefined {
    return this.tasks.get(taskId);
  }
}

/**
 * In-process stand-in for the chain registry, used by dry runs and local sessions.
 *
 * Each instance is one wallet: an ed25519 key pair whose address is the hex-encoded public key.
 */
export class LocalLedger implements ChainClient {
  readonly address: string;
  private readonly privateKey: KeyObject;

  constructor(private readonly state: LedgerState) {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    this.privateKey = privateKey;
    this.address = publicKey.export({ format: 'der', type: 'spki' }).toString('hex');
  }

  async register(agentId: string): Promise<void> {
    const owner = this.state.agents.get(agentId);
    if (owner === this.address) return;
    if (owner !== undefined) throw new Error(`already register: ${agentId} by ${owner}`);
    this.state.agents.set(agentId, this.address);
  }

  async createTask(taskId: string, price: number): Promise<void> {
    const existing = this.state.task(taskId);
    if (existing) {
      if (existing.owner === this.address) return;
      throw new Error(`task ${taskId} already exists`);
    }
    this.state.tasks.set(taskId, { owner: this.address, price, members: new Set() });
  }

  async joinTask(taskId: string, agentId: string): Promise<void> {
    const task = this.state.task(taskId);
    if (!task) throw new Error(`task ${taskId} does not exist`);
    if (this.state.agents.get(agentId) !== this.address) {
      throw new Error(`${agentId} is not owned by this wallet`);
    }
    task.members.add(agentId);
  }

  async finishTask(taskId: string, winnerAgentId: string): Promise<void> {
    const task = this.state.task(taskId);
    if (!task) throw new Error(`task ${taskId} does not exist`);
    if (task.owner !== this.address) throw new Error(`task ${taskId} is owned by ${task.owner}`);
    if (task.winner !== undefined) throw new Error(`task ${taskId} is already finished`);
    task.winner = winnerAgentId;
  }

  async hasAuth(taskId: string, agentId: string): Promise<boolean> {
    return this.state.task(taskId)?.members.has(agentId) ?? false;
  }

  async getAgent(agentId: string): Promise<string | undefined> {
    return this.state.agents.get(agentId);
  }

  async signMessage(message: string): Promise<string> {
    return sign(null, Buffer.from(message, 'utf-8'), this.privateKey).toString('hex');
  }

  async validSignature(message: string, signature: string, address: string): Promise<boolean> {
    try {
      const key = createPublicKey({ key: Buffer.from(address, 'hex'), format: 'der', type: 'spki' });
      return verify(null, Buffer.from(message, 'utf-8'), key, Buffer.from(signature, 'hex'));
    } catch {
      // Unparseable key or signature bytes: not a valid signature.
      return false;
    }
  }
}
