import { ROOMS } from '../world/config.js';
import { GameRoom, type GameRoomOptions } from './room.js';
import type { BotLauncher } from './bots.js';
import type { Connection, PlayerId, RoomSummary, ServerMessage, ServerStatus } from '../types.js';

export interface Seat {
  room: GameRoom;
  playerId: PlayerId;
}

// Where an observer currently is; kept up to date when the lobby empties
export interface ObserverSession {
  conn: Connection;
  room: GameRoom | null;
}

export interface RoomManagerOptions extends Omit<GameRoomOptions, 'onActivityChange'> {
  maxRooms?: number;
}

export class RoomManager {
  readonly rooms = new Map<number, GameRoom>();
  readonly lobby = new Set<ObserverSession>();
  // Every connected observer, in the lobby or watching a room
  readonly observers = new Set<ObserverSession>();
  readonly maxRooms: number;
  private readonly roomOptions: GameRoomOptions;
  private readonly bots: BotLauncher | null;

  constructor(options: RoomManagerOptions = {}) {
    const { maxRooms, ...roomOptions } = options;
    this.maxRooms = maxRooms ?? ROOMS.MAX_ROOMS;
    this.bots = roomOptions.bots ?? null;
    this.roomOptions = { ...roomOptions, onActivityChange: () => this.broadcastRoomList() };
  }

  // ─── Matchmaking ───

  /**
   * Seat a new player: a room waiting for an opponent first, then a fresh
   * room in the lowest free slot. Runs synchronously, so two joins can
   * never be handed the same seat.
   */
  findOrCreateRoom(): Seat | null {
    const waiting = this.findWaitingRoom();
    if (waiting) {
      return { room: waiting, playerId: waiting.getAvailableSlot() ?? 2 };
    }
    const room = this.createRoom();
    return room ? { room, playerId: 1 } : null;
  }

  createRoom(): GameRoom | null {
    for (let roomId = 1; roomId <= this.maxRooms; roomId++) {
      const existing = this.rooms.get(roomId);
      if (!existing || existing.isEmpty()) {
        const evicted = existing ? this.retireRoom(existing) : 0;
        const room = new GameRoom(roomId, this.roomOptions);
        this.rooms.set(roomId, room);
        const active = [...this.rooms.values()].filter((r) => !r.isEmpty()).length;
        console.log(`🏠 Room ${roomId} created (${active} active rooms)`);
        if (evicted > 0) this.broadcastRoomList();
        return room;
      }
    }
    return null;
  }

  findWaitingRoom(): GameRoom | null {
    for (const room of this.rooms.values()) {
      if (room.isWaitingForPlayer()) return room;
    }
    return null;
  }

  findActiveRoom(): GameRoom | null {
    for (const room of this.rooms.values()) {
      if (room.isActive()) return room;
    }
    return null;
  }

  getActiveRooms(): GameRoom[] {
    return [...this.rooms.values()].filter((room) => room.isActive());
  }

  getRoom(roomId: number): GameRoom | null {
    return this.rooms.get(roomId) ?? null;
  }

  cleanupEmptyRooms(): void {
    let evicted = 0;
    for (const [roomId, room] of this.rooms) {
      if (room.isEmpty()) {
        evicted += this.retireRoom(room);
        this.rooms.delete(roomId);
        console.log(`🧹 Room ${roomId} cleaned up`);
      }
    }
    if (evicted > 0) this.broadcastRoomList();
  }

  // Stops a room and sends its observers back to the lobby; returns how many moved
  private retireRoom(room: GameRoom): number {
    room.shutdown();
    let moved = 0;
    for (const session of this.observers) {
      if (session.room !== room) continue;
      room.disconnectObserver(session.conn);
      this.joinLobby(session);
      moved++;
    }
    return moved;
  }

  getStatus(): ServerStatus {
    return {
      total_rooms: this.rooms.size,
      rooms: [...this.rooms.values()]
        .filter((room) => !room.isEmpty())
        .map((room) => room.status()),
    };
  }

  activeRoomSummaries(): RoomSummary[] {
    return this.getActiveRooms().map((room) => room.summary());
  }

  // ─── Observers ───

  /** Registers a new observer: into the first active room, or the lobby when none is playing. */
  addObserver(session: ObserverSession): GameRoom | null {
    this.observers.add(session);
    const room = this.findActiveRoom();
    if (room) {
      session.room = room;
      room.connectObserver(session.conn);
    } else {
      this.joinLobby(session);
    }
    return room;
  }

  removeObserver(session: ObserverSession): void {
    this.observers.delete(session);
    if (this.leaveLobby(session)) {
      console.log('👁️ Observer left lobby');
    } else {
      session.room?.disconnectObserver(session.conn);
    }
    session.room = null;
  }

  joinLobby(session: ObserverSession): void {
    session.room = null;
    this.lobby.add(session);
  }

  leaveLobby(session: ObserverSession): boolean {
    return this.lobby.delete(session);
  }

  /** Moves an observer into an active room; returns false if that room is not playing. */
  switchObserver(session: ObserverSession, roomId: number): boolean {
    const target = this.getRoom(roomId);
    if (!target || !target.isActive()) return false;

    if (session.room) session.room.disconnectObserver(session.conn);
    this.lobby.delete(session);
    session.room = target;
    target.connectObserver(session.conn);
    return true;
  }

  roomListMessage(current: GameRoom | null): ServerMessage {
    return { type: 'room_list', rooms: this.activeRoomSummaries(), current_room: current?.roomId ?? null };
  }

  /**
   * Refreshes every observer's room list. Lobby observers are moved into the
   * first active room as soon as there is one.
   */
  broadcastRoomList(): void {
    const active = this.getActiveRooms();
    const rooms = active.map((room) => room.summary());

    for (const room of this.rooms.values()) {
      for (const conn of [...room.observers]) {
        try {
          conn.send({ type: 'room_list', rooms, current_room: room.roomId });
        } catch {
          room.disconnectObserver(conn);
        }
      }
    }

    if (this.lobby.size === 0) return;

    const first = active[0];
    if (!first) {
      for (const session of [...this.lobby]) {
        try {
          session.conn.send({ type: 'room_list', rooms: [], current_room: null });
        } catch {
          this.lobby.delete(session);
        }
      }
      return;
    }

    for (const session of [...this.lobby]) {
      this.lobby.delete(session);
      session.room = first;
      first.observers.add(session.conn);
      try {
        session.conn.send(first.observerJoinedMessage());
        session.conn.send({ type: 'room_list', rooms, current_room: first.roomId });
        console.log(`👁️ Lobby observer joined Room ${first.roomId}`);
      } catch {
        first.disconnectObserver(session.conn);
        session.room = null;
      }
    }
  }

  // ─── Bots ───

  spawnBotVsBot(difficulty1: number, difficulty2: number): boolean {
    if (!this.bots) {
      console.warn('⚠️ No bot launcher configured; cannot start a bot-vs-bot match');
      return false;
    }
    const bot1 = this.bots.launch(difficulty1);
    const bot2 = this.bots.launch(difficulty2);
    if (!bot1 || !bot2) {
      bot1?.stop();
      bot2?.stop();
      console.error('❌ Failed to spawn bot-vs-bot match');
      return false;
    }
    console.log(
      `🤖 Spawned bot-vs-bot match: CopperBot L${difficulty1} (PID: ${bot1.pid ?? 'unknown'}) vs CopperBot L${difficulty2} (PID: ${bot2.pid ?? 'unknown'})`
    );
    return true;
  }

  shutdown(): void {
    for (const room of this.rooms.values()) room.shutdown();
  }
}
