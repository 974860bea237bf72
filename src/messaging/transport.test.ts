import test from 'node:test';
import assert from 'node:assert/strict';
import type { Message } from '../types.js';
import { sleep } from '../utils.js';
import { LocalTransport, UnknownRecipientError, type MessageHandler } from './transport.js';

const ping: Message = { kind: 'system-notice', source: 'mod', content: 'ping' };

test('LocalTransport: unknown recipient rejects', async () => {
  const transport = new LocalTransport();
  await assert.rejects(transport.send(ping, 'nobody', 'mod'), UnknownRecipientError);
});

test('LocalTransport: identities are unique and case-insensitive', async () => {
  const transport = new LocalTransport();
  const handler: MessageHandler = { handle: async m => m };
  await transport.register('Alice', () => handler);
  await assert.rejects(transport.register('alice', () => handler), /already registered/);
  await assert.rejects(transport.register('  ', () => handler), /blank/);
  assert.equal(transport.has('ALICE'), true);

  transport.unregister('alice');
  assert.equal(transport.has('Alice'), false);
});

test('LocalTransport: handler is created once, on first delivery', async () => {
  const transport = new LocalTransport();
  let created = 0;
  await transport.register('a', () => {
    created++;
    return { handle: async m => ({ ...m, kind: 'response' }) };
  });
  assert.equal(created, 0);

  await transport.send(ping, 'a', 'mod');
  await transport.send(ping, 'a', 'mod');
  assert.equal(created, 1);
});

test('LocalTransport: deliveries to one identity run one at a time', async () => {
  const transport = new LocalTransport();
  let active = 0;
  let peak = 0;
  const order: string[] = [];
  await transport.register('a', () => ({
    handle: async message => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      order.push(message.content);
      active--;
      return { kind: 'response', source: 'a', content: message.content };
    },
  }));

  await Promise.all(['1', '2', '3'].map(content => transport.send({ ...ping, content }, 'a', 'mod')));
  assert.equal(peak, 1);
  assert.deepEqual(order, ['1', '2', '3']);
});

test('LocalTransport: a failed delivery does not block the next one', async () => {
  const transport = new LocalTransport();
  let calls = 0;
  await transport.register('a', () => ({
    handle: async message => {
      calls++;
      if (calls === 1) throw new Error('first fails');
      return { kind: 'response', source: 'a', content: message.content };
    },
  }));

  const first = transport.send(ping, 'a', 'mod');
  const second = transport.send(ping, 'a', 'mod');
  await assert.rejects(first, /first fails/);
  assert.deepEqual(await second, { kind: 'response', source: 'a', content: 'ping' });
});
