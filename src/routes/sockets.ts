import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket } from 'ws';
import { v4 as uuid } from 'uuid';
import { BOTS, CLOSE_CODES } from '../world/config.js';
import { parseObserverCommand, parsePlayerCommand } from '../services/protocol.js';
import type { ObserverSession, RoomManager, Seat } from '../services/roomManager.js';
import type { Connection, ServerMessage } from '../types.js';

export type SocketRoute =
  | { kind: 'join' }
  | { kind: 'observe' }
  | { kind: 'legacy'; playerId: number };

export function matchSocketPath(pathname: string): SocketRoute | null {
  const trimmed = pathname.replace(/\/+$/, '');
  if (trimmed === '/ws/join') return { kind: 'join' };
  if (trimmed === '/ws/observe') return { kind: 'observe' };
  const legacy = /^\/ws\/(-?\d+)$/.exec(trimmed);
  if (legacy) return { kind: 'legacy', playerId: Number(legacy[1]) };
  return null;
}

/** A ws socket speaking the JSON protocol. Sending on a closed socket throws. */
export class SocketConnection implements Connection {
  readonly id = uuid();

  constructor(private readonly ws: WebSocket) {}

  send(message: ServerMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new Error(`socket ${this.id} is not open`);
    }
    this.ws.send(JSON.stringify(message));
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }
}

export interface SocketOptions {
  random?: () => number;
}

function randomDifficulty(random: () => number): number {
  const span = BOTS.OBSERVER_MATCH_MAX - BOTS.OBSERVER_MATCH_MIN + 1;
  return BOTS.OBSERVER_MATCH_MIN + Math.min(span - 1, Math.floor(random() * span));
}

function trySend(conn: Connection, message: ServerMessage): void {
  try {
    conn.send(message);
  } catch (err) {
    console.warn(`⚠️ Could not send ${message.type} to ${conn.id}: ${err}`);
  }
}

// ─── Players ───

function bindPlayer(ws: WebSocket, conn: SocketConnection, seat: Seat, manager: RoomManager): void {
  const { room, playerId } = seat;
  // Messages after a forced disconnect must not act on someone else's seat
  const seated = () => room.connections.get(playerId) === conn;

  ws.on('message', (data) => {
    if (!seated()) return;
    const command = parsePlayerCommand(data.toString());
    if (!command) {
      console.warn(`⚠️ [Room ${room.roomId}] Ignoring malformed message from Player ${playerId}`);
      return;
    }
    room.handleMessage(playerId, command);
  });

  ws.on('close', () => {
    if (seated()) room.disconnectPlayer(playerId);
    manager.cleanupEmptyRooms();
  });

  room.connectPlayer(playerId, conn);
  trySend(conn, { type: 'joined', room_id: room.roomId, player_id: playerId });
}

function handleJoin(ws: WebSocket, manager: RoomManager): void {
  const seat = manager.findOrCreateRoom();
  if (!seat) {
    ws.close(CLOSE_CODES.SERVER_FULL, 'Server full - no room available');
    return;
  }
  bindPlayer(ws, new SocketConnection(ws), seat, manager);
}

function handleLegacy(ws: WebSocket, requested: number, manager: RoomManager): void {
  if (requested !== 1 && requested !== 2) {
    ws.close(CLOSE_CODES.INVALID_PLAYER, 'Invalid player_id. Use /ws/join instead.');
    return;
  }

  let seat: Seat | null = null;
  if (requested === 2) {
    const waiting = manager.findWaitingRoom();
    if (waiting) seat = { room: waiting, playerId: waiting.getAvailableSlot() ?? 2 };
  }
  if (!seat) {
    const room = manager.createRoom();
    if (!room) {
      ws.close(CLOSE_CODES.SERVER_FULL, 'Server full');
      return;
    }
    seat = { room, playerId: 1 };
  }
  bindPlayer(ws, new SocketConnection(ws), seat, manager);
}

// ─── Observers ───

function handleObserve(ws: WebSocket, manager: RoomManager, random: () => number): void {
  const conn = new SocketConnection(ws);
  const session: ObserverSession = { conn, room: null };

  if (!manager.addObserver(session)) {
    trySend(conn, { type: 'observer_lobby', message: 'No active games. Launching bot-vs-bot match...' });
    console.log('👁️ Observer joined - spawning bot-vs-bot match');
    manager.spawnBotVsBot(randomDifficulty(random), randomDifficulty(random));
  }

  ws.on('message', (data) => {
    const command = parseObserverCommand(data.toString());
    if (!command) return;

    if (command.action === 'switch_room') {
      if (manager.switchObserver(session, command.room_id)) {
        console.log(`👁️ Observer switched to Room ${command.room_id}`);
      } else {
        trySend(conn, { type: 'error', message: `Room ${command.room_id} not available` });
      }
      return;
    }

    trySend(conn, manager.roomListMessage(session.room));
  });

  ws.on('close', () => manager.removeObserver(session));
}

// ─── Upgrade routing ───

/**
 * Routes WebSocket upgrades on the HTTP server to the join, observe and
 * legacy endpoints. Any other path is refused with a 404.
 */
export function attachSockets(server: Server, manager: RoomManager, options: SocketOptions = {}): WebSocketServer {
  const random = options.random ?? Math.random;
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    const route = matchSocketPath(pathname);
    if (!route) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      ws.on('error', (err) => console.warn(`⚠️ WebSocket error on ${pathname}: ${err.message}`));
      switch (route.kind) {
        case 'join':
          handleJoin(ws, manager);
          break;
        case 'observe':
          handleObserve(ws, manager, random);
          break;
        case 'legacy':
          handleLegacy(ws, route.playerId, manager);
          break;
      }
    });
  });

  return wss;
}
