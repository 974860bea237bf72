import test from 'node:test';
import assert from 'node:assert/strict';
import { LedgerState, LocalLedger } from './localLedger.js';

test('LocalLedger: an agent id belongs to the first wallet that registers it', async () => {
  const state = new LedgerState();
  const first = new LocalLedger(state);
  const second = new LocalLedger(state);

  await first.register('alice');
  await first.register('alice');
  await assert.rejects(second.register('alice'), /already register/);
  assert.equal(await second.getAgent('alice'), first.address);
  assert.equal(await second.getAgent('bob'), undefined);
});

test('LocalLedger: only the owning wallet can join an agent to a task', async () => {
  const state = new LedgerState();
  const owner = new LocalLedger(state);
  const other = new LocalLedger(state);
  await owner.createTask('t', 5);
  await owner.register('alice');

  await assert.rejects(other.joinTask('t', 'alice'), /not owned/);
  await assert.rejects(owner.joinTask('missing', 'alice'), /does not exist/);
  assert.equal(await owner.hasAuth('t', 'alice'), false);

  await owner.joinTask('t', 'alice');
  assert.equal(await other.hasAuth('t', 'alice'), true);
});

test('LocalLedger: finishTask records one winner, by the owner only', async () => {
  const state = new LedgerState();
  const owner = new LocalLedger(state);
  const other = new LocalLedger(state);
  await owner.createTask('t', 5);

  await assert.rejects(other.finishTask('t', 'alice'), /owned by/);
  await owner.finishTask('t', 'alice');
  assert.equal(state.task('t')?.winner, 'alice');
  await assert.rejects(owner.finishTask('t', 'bob'), /already finished/);
});

test('LocalLedger: signatures verify against the signer address only', async () => {
  const state = new LedgerState();
  const signer = new LocalLedger(state);
  const stranger = new LocalLedger(state);
  const signature = await signer.signMessage('1700000000');

  assert.equal(await stranger.validSignature('1700000000', signature, signer.address), true);
  assert.equal(await stranger.validSignature('1700000001', signature, signer.address), false);
  assert.equal(await stranger.validSignature('1700000000', signature, stranger.address), false);
  assert.equal(await stranger.validSignature('1700000000', 'zz', signer.address), false);
  assert.equal(await stranger.validSignature('1700000000', signature, 'not-hex'), false);
});
