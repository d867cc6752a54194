import { test } from 'node:test';
import assert from 'node:assert/strict';
import { authorizeEvent, signPayload, verifySignature } from './signature.js';
import { RoomResolver } from './rooms.js';

const body = JSON.stringify({ repository: { name: 'Proj' }, ref: 'refs/heads/main' });

test('signPayload: sha256= followed by 64 hex digits', () => {
  assert.match(signPayload('test-secret', body), /^sha256=[0-9a-f]{64}$/);
});

test('signPayload: string and Buffer bodies sign the same', () => {
  assert.strictEqual(signPayload('test-secret', body), signPayload('test-secret', Buffer.from(body)));
});

test('verifySignature: accepts its own signature', () => {
  assert.strictEqual(verifySignature('test-secret', body, signPayload('test-secret', body)), true);
});

test('verifySignature: rejects wrong secret or altered body', () => {
  const header = signPayload('test-secret', body);
  assert.strictEqual(verifySignature('other-secret', body, header), false);
  assert.strictEqual(verifySignature('test-secret', body + ' ', header), false);
});

test('verifySignature: rejects missing and malformed headers', () => {
  const hex = signPayload('test-secret', body).slice('sha256='.length);
  assert.strictEqual(verifySignature('test-secret', body, undefined), false);
  assert.strictEqual(verifySignature('test-secret', body, ''), false);
  assert.strictEqual(verifySignature('test-secret', body, hex), false);
  assert.strictEqual(verifySignature('test-secret', body, `sha1=${hex}`), false);
  assert.strictEqual(verifySignature('test-secret', body, `sha256=${hex.slice(1)}`), false);
  assert.strictEqual(verifySignature('test-secret', body, `sha256=${hex.toUpperCase()}`), false);
});

test('authorizeEvent: checks against the resolved secret', () => {
  const resolver = new RoomResolver({
    projects: {
      Proj: { rooms: ['a'], simpleRooms: [], secret: 's1' },
      Quiet: { rooms: [], simpleRooms: [], secret: 's2' },
    },
    defaultRoom: 'lobby',
    globalSecret: 'g',
  });

  assert.strictEqual(authorizeEvent(resolver, 'Proj', body, signPayload('s1', body)), resolver.resolve('Proj'));
  assert.strictEqual(authorizeEvent(resolver, 'Proj', body, signPayload('g', body)), undefined);

  assert.strictEqual(authorizeEvent(resolver, 'Other', body, signPayload('g', body)), resolver.resolve('Other'));
  assert.strictEqual(authorizeEvent(resolver, 'Other', body, signPayload('s1', body)), undefined);

  const quiet = authorizeEvent(resolver, 'Quiet', body, signPayload('s2', body));
  assert.deepStrictEqual(quiet?.rooms, []);
  assert.strictEqual(authorizeEvent(resolver, 'Quiet', body, signPayload('g', body)), undefined);
});
