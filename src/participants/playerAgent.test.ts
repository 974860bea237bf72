import test from 'node:test';
import assert from 'node:assert/strict';
import type { Message, MessageKind } from '../types.js';
import { LocalTransport } from '../messaging/transport.js';
import { JoinRefusedError, PlayerAgent, joinGame } from './playerAgent.js';
import { ScriptedResponder, type Responder, type ResponderRequest } from './responder.js';
import { ScriptedPlayer, quietLogger } from '../testUtils.js';

quietLogger();

class RecordingResponder implements Responder {
  readonly requests: ResponderRequest[] = [];

  constructor(private readonly answer: string | Error = 'ok') {}

  async respond(request: ResponderRequest): Promise<string> {
    this.requests.push(request);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

const msg = (kind: MessageKind, content: string): Message => ({ kind, source: 'mod', content });

function request(overrides: Partial<ResponderRequest>): ResponderRequest {
  return { identity: 'a', role: 'villager', kind: 'day-vote', content: '', notices: [], alive: [], ...overrides };
}

test('PlayerAgent: notices are remembered and passed to the responder as context', async () => {
  const responder = new RecordingResponder('c');
  const agent = new PlayerAgent('a', responder);

  assert.deepEqual(await agent.handle(msg('system-notice', 'New night comes. There are survive players: a, b, c')), {
    kind: 'response',
    source: 'a',
    content: '',
  });
  await agent.handle(msg('important-info', 'The wolves are: a, b'));
  const reply = await agent.handle(msg('day-vote', 'Which player do you suspect?'));

  assert.equal(reply.content, 'c');
  const [seen] = responder.requests;
  assert.ok(seen);
  assert.deepEqual(seen.notices, ['New night comes. There are survive players: a, b, c']);
  assert.equal(seen.importantInfo, 'The wolves are: a, b');
  assert.deepEqual(seen.alive, ['a', 'b', 'c']);
  assert.equal(seen.kind, 'day-vote');
});

test('PlayerAgent: the alive list follows the latest roll call', async () => {
  const responder = new RecordingResponder();
  const agent = new PlayerAgent('a', responder);
  await agent.handle(msg('system-notice', 'New night comes. There are survive players: a, b, c, d'));
  await agent.handle(msg('divine', "You're the seer. Which player in: a, c, d would you like to check tonight?"));
  assert.deepEqual(responder.requests[0]?.alive, ['a', 'c', 'd']);
});

test('PlayerAgent: a failing responder abstains with an empty answer', async () => {
  const agent = new PlayerAgent('a', new RecordingResponder(new Error('model unavailable')));
  const reply = await agent.handle(msg('night-kill', 'Which player do you vote to eliminate?'));
  assert.equal(reply.content, '');
});

test('PlayerAgent: notice memory is bounded', async () => {
  const responder = new RecordingResponder();
  const agent = new PlayerAgent('a', responder, { noticeWindow: 2 });
  for (const n of ['1', '2', '3']) await agent.handle(msg('system-notice', n));
  await agent.handle(msg('day-discuss', 'speak'));
  // The request itself takes a slot and is not repeated as context.
  assert.deepEqual(responder.requests[0]?.notices, ['3']);
});

test('joinGame: the assigned role is stored on the agent', async () => {
  const transport = new LocalTransport();
  await transport.register('mod', () => new ScriptedPlayer('mod', { register: 'seer' }));
  const agent = new PlayerAgent('a', new RecordingResponder());
  assert.equal(await joinGame(transport, agent, { moderator: 'mod' }), 'seer');
  assert.equal(agent.role, 'seer');
});

test('joinGame: an empty reply is a refusal', async () => {
  const transport = new LocalTransport();
  await transport.register('mod', () => new ScriptedPlayer('mod'));
  await assert.rejects(joinGame(transport, new PlayerAgent('a', new RecordingResponder()), { moderator: 'mod' }), JoinRefusedError);
});

test('ScriptedResponder: witches never spend potions', async () => {
  const responder = new ScriptedResponder(1);
  assert.equal(await responder.respond(request({ kind: 'save' })), 'no');
  assert.equal(await responder.respond(request({ kind: 'poison' })), 'no');
});

test('ScriptedResponder: wolves never target themselves or teammates', async () => {
  const responder = new ScriptedResponder(4);
  for (let n = 0; n < 10; n++) {
    const target = await responder.respond(
      request({
        identity: 'a',
        role: 'wolf',
        kind: 'night-kill',
        importantInfo: 'The wolves are: a, b',
        alive: ['a', 'b', 'c', 'd'],
        notices: Array.from({ length: n }, () => 'x'),
      })
    );
    assert.ok(target === 'c' || target === 'd', `picked ${target}`);
  }
});

test('ScriptedResponder: votes for a wolf the seer has found', async () => {
  const responder = new ScriptedResponder(1);
  const vote = await responder.respond(
    request({ identity: 'e', role: 'seer', notices: ['The role of d is wolf'], alive: ['a', 'c', 'd', 'e'] })
  );
  assert.equal(vote, 'd');
});

test('ScriptedResponder: answers move requests in the labelled format', async () => {
  const reply = await new ScriptedResponder(1).respond(
    request({ kind: 'move', content: 'Board: 3 stones left\nPossible moves are: take1, take2' })
  );
  assert.match(reply, /^thinking: dry run\nmove: take[12]$/);
});

test('ScriptedResponder: same input, same answer', async () => {
  const input = request({ kind: 'divine', alive: ['a', 'b', 'c', 'd', 'e'] });
  assert.equal(await new ScriptedResponder(3).respond(input), await new ScriptedResponder(3).respond(input));
});
