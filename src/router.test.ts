import { test } from 'node:test';
import assert from 'node:assert/strict';
import { planDeliveries, displayAuthor } from './router.js';
import { RoomResolver } from './rooms.js';
import { UsernameAliasTable } from './aliases.js';

function makeResolver(): RoomResolver {
  return new RoomResolver({
    projects: {
      Proj: { rooms: ['a', 'b'], simpleRooms: ['c'], secret: 's1' },
      Both: { rooms: ['dev'], simpleRooms: ['dev'] },
      Quiet: { rooms: [], simpleRooms: [], secret: 's2' },
    },
    defaultRoom: 'lobby',
    globalSecret: 'g',
  });
}

test('planDeliveries: full rooms then simple rooms, in configured order', () => {
  assert.deepStrictEqual(planDeliveries(makeResolver(), 'Proj'), [
    { room: 'a', tier: 'full' },
    { room: 'b', tier: 'full' },
    { room: 'c', tier: 'simple' },
  ]);
});

test('planDeliveries: unknown project goes to the default room in full', () => {
  assert.deepStrictEqual(planDeliveries(makeResolver(), 'Other'), [
    { room: 'lobby', tier: 'full' },
  ]);
});

test('planDeliveries: room in both lists gets both renderings', () => {
  assert.deepStrictEqual(planDeliveries(makeResolver(), 'Both'), [
    { room: 'dev', tier: 'full' },
    { room: 'dev', tier: 'simple' },
  ]);
});

test('planDeliveries: silenced project produces nothing', () => {
  assert.deepStrictEqual(planDeliveries(makeResolver(), 'Quiet'), []);
});

test('displayAuthor: resolves aliases regardless of case', () => {
  const aliases = UsernameAliasTable.fromRecord({ Steve: 'Steve the Great' });
  assert.strictEqual(displayAuthor(aliases, 'STEVE'), 'Steve the Great');
  assert.strictEqual(displayAuthor(aliases, 'Mia'), 'Mia');
});

test('displayAuthor: surrounding whitespace is ignored', () => {
  const aliases = UsernameAliasTable.fromRecord({ Steve: 'Steve the Great' });
  assert.strictEqual(displayAuthor(aliases, ' steve '), 'Steve the Great');
});

test('displayAuthor: a name without an alias comes back as received', () => {
  const aliases = UsernameAliasTable.fromRecord({ Steve: 'Steve the Great' });
  assert.strictEqual(displayAuthor(aliases, ' Mia'), ' Mia');
  assert.strictEqual(displayAuthor(aliases, 'Mia\t'), 'Mia\t');
  assert.strictEqual(displayAuthor(aliases, '   '), '   ');
});

test('displayAuthor: tabs, newlines and no-break spaces are trimmed for matching', () => {
  const aliases = UsernameAliasTable.fromRecord({ Steve: 'Steve the Great' });
  assert.strictEqual(displayAuthor(aliases, '\tSTEVE\n'), 'Steve the Great');
  assert.strictEqual(displayAuthor(aliases, '\u00a0steve\u3000'), 'Steve the Great');
  assert.strictEqual(displayAuthor(aliases, 'st eve'), 'st eve');
});
