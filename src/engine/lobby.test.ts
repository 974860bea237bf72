import test from 'node:test';
import assert from 'node:assert/strict';
import type { Message } from '../types.js';
import { Roster } from '../roster.js';
import { logger } from '../logger.js';
import { Lobby } from './lobby.js';
import { firstSeat, quietLogger } from '../testUtils.js';

quietLogger();

type TestRole = 'villager' | 'seer';

const join = (source: string): Message => ({ kind: 'register', source, content: 'join werewolf game' });

test('Lobby: seats queued joins and refuses them once closed', async () => {
  const lobby = new Lobby(new Roster<TestRole>({ villager: 1, seer: 1 }, firstSeat), { timeoutMs: 1000, pollMs: 10 });
  const first = lobby.requestJoin(join('ann'));
  const second = lobby.requestJoin(join('bob'));

  assert.equal(await lobby.fill(), true);
  assert.equal(await first, 'villager');
  assert.equal(await second, 'seer');
  assert.equal(lobby.isOpen, false);
  assert.equal(await lobby.requestJoin(join('cy')), '');
});

test('Lobby: a new fill drops role tags left by an earlier game', async () => {
  logger.setPlayerRole('ann', 'wolf');
  const lobby = new Lobby(new Roster<TestRole>({ villager: 1 }, firstSeat), { timeoutMs: 20, pollMs: 5 });

  assert.equal(await lobby.fill(), false);
  assert.equal(logger.log({ type: 'SYSTEM', player: 'ann', content: 'left over' }).metadata?.role, undefined);
});

test('Lobby: a reused name is tagged with its new role', async () => {
  logger.setPlayerRole('ann', 'wolf');
  const lobby = new Lobby(new Roster<TestRole>({ seer: 1 }, firstSeat), { timeoutMs: 1000, pollMs: 10 });
  const reply = lobby.requestJoin(join('ann'));

  assert.equal(await lobby.fill(), true);
  assert.equal(await reply, 'seer');
  assert.equal(logger.log({ type: 'SYSTEM', player: 'ann', content: 'after seating' }).metadata?.role, 'seer');
});
