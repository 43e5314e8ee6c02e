import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseFrame, parseObserverCommand, parsePlayerCommand } from '../services/protocol.js';
import { parseServerMessage, parseSnapshot } from '../bot/messages.js';
import { joinUrl } from '../bot/client.js';
import { matchSocketPath } from '../routes/sockets.js';
import { predictableGame } from './fakes.js';

describe('parseFrame', () => {
  it('accepts JSON objects only', () => {
    assert.deepEqual(parseFrame('{"action":"move"}'), { action: 'move' });
    assert.equal(parseFrame('[1,2]'), null);
    assert.equal(parseFrame('null'), null);
    assert.equal(parseFrame('not json'), null);
  });
});

describe('parsePlayerCommand', () => {
  it('parses moves with a valid direction', () => {
    assert.deepEqual(parsePlayerCommand('{"action":"move","direction":"left"}'), { action: 'move', direction: 'left' });
    assert.equal(parsePlayerCommand('{"action":"move","direction":"north"}'), null);
  });

  it('keeps only well-typed ready fields', () => {
    assert.deepEqual(
      parsePlayerCommand('{"action":"ready","mode":"vs_ai","name":"Ada","ai_difficulty":7}'),
      { action: 'ready', mode: 'vs_ai', name: 'Ada', ai_difficulty: 7 }
    );
    assert.deepEqual(
      parsePlayerCommand('{"action":"ready","mode":"solo","name":42,"ai_difficulty":"7"}'),
      { action: 'ready' }
    );
  });

  it('rejects unknown actions', () => {
    assert.equal(parsePlayerCommand('{"action":"jump"}'), null);
    assert.equal(parsePlayerCommand('{}'), null);
  });
});

describe('parseObserverCommand', () => {
  it('parses room switches by number or numeric string', () => {
    assert.deepEqual(parseObserverCommand('{"action":"switch_room","room_id":3}'), { action: 'switch_room', room_id: 3 });
    assert.deepEqual(parseObserverCommand('{"action":"switch_room","room_id":"4"}'), { action: 'switch_room', room_id: 4 });
    assert.equal(parseObserverCommand('{"action":"switch_room","room_id":"two"}'), null);
    assert.equal(parseObserverCommand('{"action":"switch_room","room_id":1.5}'), null);
  });

  it('parses room list requests', () => {
    assert.deepEqual(parseObserverCommand('{"action":"get_rooms"}'), { action: 'get_rooms' });
    assert.equal(parseObserverCommand('{"action":"ready"}'), null);
  });
});

describe('parseSnapshot', () => {
  it('reads back a serialized game', () => {
    const snapshot = predictableGame().toJSON();
    assert.deepEqual(parseSnapshot(JSON.parse(JSON.stringify(snapshot))), snapshot);
  });

  it('rejects snapshots with a broken snake', () => {
    const raw = JSON.parse(JSON.stringify(predictableGame().toJSON()));
    raw.snakes['2'].body = [[1, 'x']];
    assert.equal(parseSnapshot(raw), null);
  });
});

describe('parseServerMessage', () => {
  it('parses the messages a bot acts on', () => {
    assert.deepEqual(parseServerMessage('{"type":"joined","room_id":2,"player_id":1}'), {
      type: 'joined',
      room_id: 2,
      player_id: 1,
    });
    assert.deepEqual(
      parseServerMessage('{"type":"gameover","winner":null,"wins":{"1":1,"2":1},"names":{"1":"Ada","2":"Bob"},"room_id":1}'),
      { type: 'gameover', winner: null, wins: { 1: 1, 2: 1 }, names: { 1: 'Ada', 2: 'Bob' } }
    );
    assert.deepEqual(parseServerMessage('{"type":"waiting","message":"Waiting for Player 2..."}'), {
      type: 'waiting',
      message: 'Waiting for Player 2...',
    });
  });

  it('ignores other or malformed messages', () => {
    assert.equal(parseServerMessage('{"type":"room_list","rooms":[]}'), null);
    assert.equal(parseServerMessage('{"type":"joined","room_id":2,"player_id":3}'), null);
    assert.equal(parseServerMessage('garbage'), null);
  });
});

describe('joinUrl', () => {
  it('points a server url at the join endpoint', () => {
    assert.equal(joinUrl('ws://localhost:8000/ws/'), 'ws://localhost:8000/ws/join');
    assert.equal(joinUrl('ws://localhost:8000/ws/join'), 'ws://localhost:8000/ws/join');
  });
});

describe('matchSocketPath', () => {
  it('routes the WebSocket endpoints', () => {
    assert.deepEqual(matchSocketPath('/ws/join'), { kind: 'join' });
    assert.deepEqual(matchSocketPath('/ws/observe/'), { kind: 'observe' });
    assert.deepEqual(matchSocketPath('/ws/2'), { kind: 'legacy', playerId: 2 });
    assert.deepEqual(matchSocketPath('/ws/-1'), { kind: 'legacy', playerId: -1 });
    assert.equal(matchSocketPath('/ws/lobby'), null);
    assert.equal(matchSocketPath('/status'), null);
  });
});
