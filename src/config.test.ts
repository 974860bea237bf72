import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, loadSessionEnv, parseConfig } from './config.js';
import { ConfigError } from './errors.js';
import { quietLogger } from './testUtils.js';

quietLogger();

test('parseConfig: empty input takes every default', () => {
  const config = parseConfig(undefined);
  assert.equal(config.moderator, 'moderator');
  assert.deepEqual(config.role_slots, { wolf: 2, villager: 2, seer: 1, witch: 1 });
  assert.equal(config.max_rounds, 10);
  assert.equal(config.registration_timeout_seconds, 300);
  assert.equal(config.registration_poll_seconds, 5);
  assert.equal(config.send_timeout_ms, 60_000);
  assert.equal(config.require_auth, false);
  assert.equal(config.seed, undefined);
  assert.deepEqual(config.players, []);
});

test('parseConfig: schema violations become ConfigError with the field path', () => {
  assert.throws(
    () => parseConfig({ max_rounds: 0 }),
    (error: unknown) => error instanceof ConfigError && error.message.includes('max_rounds')
  );
  assert.throws(() => parseConfig({ role_slots: { wolf: 1, dragon: 1 } }), ConfigError);
});

test('parseConfig: a slot table with no seats is rejected', () => {
  assert.throws(() => parseConfig({ role_slots: { wolf: 0, villager: 0 } }), /at least one seat/);
});

test('loadConfig: reads YAML from disk', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'werewolf-config-'));
  const file = path.join(dir, 'game.yaml');
  fs.writeFileSync(
    file,
    ['moderator: host', 'max_rounds: 3', 'role_slots:', '  wolf: 1', '  villager: 2', 'players:', '  - name: Alice'].join('\n')
  );
  try {
    const config = loadConfig(file);
    assert.equal(config.moderator, 'host');
    assert.equal(config.max_rounds, 3);
    assert.deepEqual(config.role_slots, { wolf: 1, villager: 2 });
    assert.deepEqual(config.players, [{ name: 'Alice', model: 'openai/gpt-4o', temperature: 0.7 }]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('loadConfig: a missing file is a ConfigError', () => {
  assert.throws(() => loadConfig(path.join(os.tmpdir(), 'does-not-exist-werewolf.yaml')), ConfigError);
});

test('loadSessionEnv: task id is required', () => {
  assert.throws(() => loadSessionEnv({}, { requireGatewayKey: false }), ConfigError);
  assert.deepEqual(loadSessionEnv({ WEREWOLF_TASK_ID: ' task-1 ' }, { requireGatewayKey: false }), {
    taskId: 'task-1',
    gatewayApiKey: undefined,
  });
});

test('loadSessionEnv: gateway key only required when asked', () => {
  assert.throws(() => loadSessionEnv({ WEREWOLF_TASK_ID: 't' }, { requireGatewayKey: true }), /AI_GATEWAY_API_KEY/);
  assert.equal(
    loadSessionEnv({ WEREWOLF_TASK_ID: 't', AI_GATEWAY_API_KEY: 'test-secret' }, { requireGatewayKey: true }).gatewayApiKey,
    'test-secret'
  );
});
