import test from 'node:test';
import assert from 'node:assert/strict';
import type { ChainClient } from '../chain/chainClient.js';
import { LedgerState, LocalLedger } from '../chain/localLedger.js';
import { AuthError, type AuthErrorCode } from '../errors.js';
import { AuthVerifier, createAuth, parseJoinCredential } from './verifyAuth.js';
import { quietLogger } from '../testUtils.js';

quietLogger();

const NOW_MS = 1_700_000_000_000;
const NOW_S = NOW_MS / 1000;

/** Chain double: one known agent whose only valid signature is "sig-<message>". */
class FakeChain implements ChainClient {
  members = new Set(['alice']);
  agents = new Map([['alice', 'addr-alice']]);

  async register(): Promise<void> {}
  async createTask(): Promise<void> {}
  async joinTask(): Promise<void> {}
  async finishTask(): Promise<void> {}

  async hasAuth(_taskId: string, agentId: string): Promise<boolean> {
    return this.members.has(agentId);
  }

  async getAgent(agentId: string): Promise<string | undefined> {
    return this.agents.get(agentId);
  }

  async signMessage(message: string): Promise<string> {
    return `sig-${message}`;
  }

  async validSignature(message: string, signature: string, address: string): Promise<boolean> {
    return address === 'addr-alice' && signature === `sig-${message}`;
  }
}

const withCode = (code: AuthErrorCode) => (error: unknown) => error instanceof AuthError && error.code === code;

test('AuthVerifier: accepts a fresh, signed credential from a task member', async () => {
  const verifier = new AuthVerifier(new FakeChain(), { now: () => NOW_MS });
  await verifier.verify('task', 'alice', NOW_S, `sig-${NOW_S}`);
  await verifier.verify('task', 'alice', String(NOW_S - 300), `sig-${NOW_S - 300}`);
});

test('AuthVerifier: missing parts are Unauthorized', async () => {
  const verifier = new AuthVerifier(new FakeChain(), { now: () => NOW_MS });
  await assert.rejects(verifier.verify('task', 'alice', NOW_S, undefined), withCode('Unauthorized'));
  await assert.rejects(verifier.verify('task', 'alice', undefined, 'sig'), withCode('Unauthorized'));
  await assert.rejects(verifier.verify('task', 'alice', '', 'sig'), withCode('Unauthorized'));
  await assert.rejects(verifier.verify('task', undefined, NOW_S, 'sig'), withCode('Unauthorized'));
});

test('AuthVerifier: non-integer timestamps are InvalidTimestamp', async () => {
  const verifier = new AuthVerifier(new FakeChain(), { now: () => NOW_MS });
  await assert.rejects(verifier.verify('task', 'alice', 'soon', 'sig'), withCode('InvalidTimestamp'));
  await assert.rejects(verifier.verify('task', 'alice', '12.5', 'sig'), withCode('InvalidTimestamp'));
});

test('AuthVerifier: tokens older than five minutes are TokenExpired', async () => {
  const verifier = new AuthVerifier(new FakeChain(), { now: () => NOW_MS });
  await assert.rejects(verifier.verify('task', 'alice', NOW_S - 301, `sig-${NOW_S - 301}`), withCode('TokenExpired'));
});

test('AuthVerifier: non-members are NotAuthorized', async () => {
  const chain = new FakeChain();
  chain.members.clear();
  const verifier = new AuthVerifier(chain, { now: () => NOW_MS });
  await assert.rejects(verifier.verify('task', 'alice', NOW_S, `sig-${NOW_S}`), withCode('NotAuthorized'));
});

test('AuthVerifier: bad signatures or unknown addresses are InvalidSignature', async () => {
  const chain = new FakeChain();
  const verifier = new AuthVerifier(chain, { now: () => NOW_MS });
  await assert.rejects(verifier.verify('task', 'alice', NOW_S, 'sig-other'), withCode('InvalidSignature'));

  chain.agents.clear();
  await assert.rejects(verifier.verify('task', 'alice', NOW_S, `sig-${NOW_S}`), withCode('InvalidSignature'));
});

test('parseJoinCredential: JSON credentials parse, plain text does not', () => {
  assert.deepEqual(parseJoinCredential('{"timestamp":12,"signature":"ab"}'), { timestamp: 12, signature: 'ab' });
  assert.equal(parseJoinCredential('join werewolf game'), undefined);
  assert.equal(parseJoinCredential('{"timestamp":12}'), undefined);
});

test('createAuth: rejects a fractional timestamp', async () => {
  await assert.rejects(createAuth(new FakeChain(), 1.5), withCode('InvalidTimestamp'));
});

test('createAuth + verifyJoin: round trip over the local ledger', async () => {
  const state = new LedgerState();
  const owner = new LocalLedger(state);
  await owner.createTask('task-7', 10);

  const agent = new LocalLedger(state);
  await agent.register('alice');
  await agent.joinTask('task-7', 'alice');

  const verifier = new AuthVerifier(owner, { now: () => NOW_MS });
  const credential = await createAuth(agent, NOW_S);
  await verifier.verifyJoin('task-7', 'alice', credential);

  // The same credential does not open a different task.
  await assert.rejects(verifier.verifyJoin('task-8', 'alice', credential), withCode('NotAuthorized'));
});
