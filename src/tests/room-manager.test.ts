import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RoomManager, type ObserverSession } from '../services/roomManager.js';
import type { GameRoom } from '../services/room.js';
import { FakeBotLauncher, FakeConnection, ManualScheduler, predictableGame, quietConsole } from './fakes.js';

function manager(maxRooms = 10, bots: FakeBotLauncher | null = new FakeBotLauncher()): RoomManager {
  return new RoomManager({ scheduler: new ManualScheduler(), bots, createGame: predictableGame, maxRooms });
}

function seatPlayer(rooms: RoomManager): { room: GameRoom; conn: FakeConnection } {
  const seat = rooms.findOrCreateRoom();
  assert.ok(seat);
  const conn = new FakeConnection();
  seat.room.connectPlayer(seat.playerId, conn);
  return { room: seat.room, conn };
}

// Seats two players in a fresh room and starts their game
function startMatch(rooms: RoomManager): GameRoom {
  const { room } = seatPlayer(rooms);
  seatPlayer(rooms);
  room.handleMessage(1, { action: 'ready', name: 'Ada' });
  room.handleMessage(2, { action: 'ready', name: 'Bob' });
  return room;
}

describe('RoomManager', () => {
  let restoreConsole: () => void;
  before(() => { restoreConsole = quietConsole(); });
  after(() => restoreConsole());

  describe('matchmaking', () => {
    it('fills a waiting room before opening a new one', () => {
      const rooms = manager();
      const first = rooms.findOrCreateRoom();
      assert.ok(first);
      assert.equal(first.room.roomId, 1);
      assert.equal(first.playerId, 1);
      first.room.connectPlayer(1, new FakeConnection());

      const second = rooms.findOrCreateRoom();
      assert.ok(second);
      assert.equal(second.room, first.room);
      assert.equal(second.playerId, 2);
      second.room.connectPlayer(2, new FakeConnection());

      const third = rooms.findOrCreateRoom();
      assert.ok(third);
      assert.equal(third.room.roomId, 2);
      assert.equal(third.playerId, 1);
    });

    it('returns null when every room is taken', () => {
      const rooms = manager(1);
      seatPlayer(rooms);
      seatPlayer(rooms);
      assert.equal(rooms.findOrCreateRoom(), null);
    });

    it('reuses the lowest empty room id', () => {
      const rooms = manager();
      const { room } = seatPlayer(rooms);
      seatPlayer(rooms);
      seatPlayer(rooms);
      room.disconnectPlayer(1);
      room.disconnectPlayer(2);

      const reused = rooms.createRoom();
      assert.equal(reused?.roomId, 1);
      assert.notEqual(reused, room);
    });

    it('removes empty rooms on cleanup', () => {
      const rooms = manager();
      const { room } = seatPlayer(rooms);
      seatPlayer(rooms);
      seatPlayer(rooms);
      room.disconnectPlayer(1);
      room.disconnectPlayer(2);
      rooms.cleanupEmptyRooms();
      assert.deepEqual([...rooms.rooms.keys()], [2]);
    });

    it('reports only occupied rooms in the status', () => {
      const rooms = manager();
      seatPlayer(rooms);
      rooms.createRoom();
      assert.deepEqual(rooms.getStatus(), {
        total_rooms: 2,
        rooms: [{ room_id: 1, players: [1], observers: 0, game_running: false, waiting_for_player: true }],
      });
    });

    it('looks rooms up by id', () => {
      const rooms = manager();
      const { room } = seatPlayer(rooms);
      assert.equal(rooms.getRoom(1), room);
      assert.equal(rooms.getRoom(5), null);
    });
  });

  describe('observers', () => {
    it('sends lobby observers an empty room list while nothing is playing', () => {
      const rooms = manager();
      const watcher = new FakeConnection();
      rooms.joinLobby({ conn: watcher, room: null });
      rooms.broadcastRoomList();
      assert.deepEqual(watcher.last(), {
        type: 'room_list',
        rooms: [],
        current_room: null,
      });
    });

    it('moves lobby observers into the first game that starts', () => {
      const rooms = manager();
      const watcher = new FakeConnection();
      const session: ObserverSession = { conn: watcher, room: null };
      rooms.joinLobby(session);

      const room = startMatch(rooms);

      assert.deepEqual(watcher.types(), ['observer_joined', 'room_list', 'state']);
      assert.deepEqual(watcher.messages[1], {
        type: 'room_list',
        rooms: [{ room_id: 1, names: { 1: 'Ada', 2: 'Bob' }, wins: { 1: 0, 2: 0 } }],
        current_room: 1,
      });
      assert.equal(session.room, room);
      assert.equal(rooms.lobby.size, 0);
      assert.equal(room.observers.has(watcher), true);
    });

    it('switches an observer between active rooms', () => {
      const rooms = manager();
      const first = startMatch(rooms);
      const second = startMatch(rooms);
      const watcher = new FakeConnection();
      const session: ObserverSession = { conn: watcher, room: first };
      first.connectObserver(watcher);

      assert.equal(rooms.switchObserver(session, 2), true);
      assert.equal(session.room, second);
      assert.equal(first.observers.has(watcher), false);
      assert.equal(second.observers.has(watcher), true);
      assert.equal(watcher.last()?.type, 'observer_joined');
    });

    it('refuses to switch to a missing or idle room', () => {
      const rooms = manager();
      startMatch(rooms);
      seatPlayer(rooms);
      const session: ObserverSession = { conn: new FakeConnection(), room: null };
      assert.equal(rooms.switchObserver(session, 7), false);
      assert.equal(rooms.switchObserver(session, 2), false);
      assert.equal(session.room, null);
    });

    it('seats a new observer in the first active room', () => {
      const rooms = manager();
      const room = startMatch(rooms);
      const watcher = new FakeConnection();
      const session: ObserverSession = { conn: watcher, room: null };

      assert.equal(rooms.addObserver(session), room);
      assert.equal(session.room, room);
      assert.equal(watcher.last()?.type, 'observer_joined');

      rooms.removeObserver(session);
      assert.equal(room.observers.size, 0);
      assert.equal(rooms.observers.size, 0);
    });

    it('parks a new observer in the lobby while nothing is playing', () => {
      const rooms = manager();
      const session: ObserverSession = { conn: new FakeConnection(), room: null };
      assert.equal(rooms.addObserver(session), null);
      assert.equal(rooms.lobby.has(session), true);

      rooms.removeObserver(session);
      assert.equal(rooms.lobby.size, 0);
    });

    it('returns observers of a closed room to the lobby', () => {
      const rooms = manager();
      const room = startMatch(rooms);
      const watcher = new FakeConnection();
      const session: ObserverSession = { conn: watcher, room: null };
      rooms.addObserver(session);

      room.disconnectPlayer(1);
      room.disconnectPlayer(2);
      rooms.cleanupEmptyRooms();

      assert.equal(session.room, null);
      assert.equal(rooms.lobby.has(session), true);
      assert.equal(room.observers.size, 0);
      assert.deepEqual(watcher.last(), { type: 'room_list', rooms: [], current_room: null });
    });

    it('moves observers of a closed room into another game', () => {
      const rooms = manager();
      const first = startMatch(rooms);
      const second = startMatch(rooms);
      const watcher = new FakeConnection();
      const session: ObserverSession = { conn: watcher, room: null };
      rooms.addObserver(session);
      assert.equal(session.room, first);

      first.disconnectPlayer(1);
      first.disconnectPlayer(2);
      rooms.cleanupEmptyRooms();

      assert.equal(session.room, second);
      assert.equal(second.observers.has(watcher), true);
      assert.equal(rooms.lobby.size, 0);
      assert.deepEqual(watcher.types().slice(-2), ['observer_joined', 'room_list']);
    });

    it('builds the room list for an observer', () => {
      const rooms = manager();
      assert.deepEqual(rooms.roomListMessage(null), { type: 'room_list', rooms: [], current_room: null });
    });
  });

  describe('bot-vs-bot', () => {
    it('launches two bots', () => {
      const bots = new FakeBotLauncher();
      const rooms = manager(10, bots);
      assert.equal(rooms.spawnBotVsBot(3, 8), true);
      assert.deepEqual(bots.difficulties(), [3, 8]);
    });

    it('reports failure without a launcher', () => {
      assert.equal(manager(10, null).spawnBotVsBot(3, 8), false);
    });
  });
});
