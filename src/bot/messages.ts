import { parseFrame, isDirection, isGameMode, isRecord } from '../services/protocol.js';
import type { Cell, GameSnapshot, PerPlayer, PlayerId, SnakeView } from '../types.js';

// The subset of server messages CopperBot acts on
export type BotInbound =
  | { type: 'joined'; room_id: number; player_id: PlayerId }
  | { type: 'state'; game: GameSnapshot }
  | { type: 'start'; room_id: number }
  | { type: 'waiting'; message: string }
  | { type: 'gameover'; winner: PlayerId | null; wins: PerPlayer<number>; names: PerPlayer<string> };

function toPlayerId(value: unknown): PlayerId | null {
  return value === 1 || value === 2 ? value : null;
}

function toCell(value: unknown): Cell | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [x, y] = value;
  return Number.isInteger(x) && Number.isInteger(y) ? [Number(x), Number(y)] : null;
}

function toSnake(value: unknown, playerId: PlayerId): SnakeView | null {
  if (!isRecord(value) || !Array.isArray(value.body) || !isDirection(value.direction)) return null;
  const body: Cell[] = [];
  for (const raw of value.body) {
    const cell = toCell(raw);
    if (!cell) return null;
    body.push(cell);
  }
  return { player_id: playerId, body, direction: value.direction, alive: value.alive === true };
}

function toPerPlayer<T>(value: unknown, pick: (v: unknown) => T | null): PerPlayer<T> | null {
  if (!isRecord(value)) return null;
  const first = pick(value['1']);
  const second = pick(value['2']);
  return first !== null && second !== null ? { 1: first, 2: second } : null;
}

export function parseSnapshot(value: unknown): GameSnapshot | null {
  if (!isRecord(value) || !isRecord(value.grid) || !isRecord(value.snakes)) return null;
  const { width, height } = value.grid;
  if (typeof width !== 'number' || typeof height !== 'number') return null;

  const one = toSnake(value.snakes['1'], 1);
  const two = toSnake(value.snakes['2'], 2);
  if (!one || !two) return null;

  return {
    mode: isGameMode(value.mode) ? value.mode : 'two_player',
    grid: { width, height },
    snakes: { 1: one, 2: two },
    food: value.food === null ? null : toCell(value.food),
    running: value.running === true,
    winner: toPlayerId(value.winner),
  };
}

export function parseServerMessage(raw: string): BotInbound | null {
  const data = parseFrame(raw);
  if (!data) return null;

  switch (data.type) {
    case 'joined': {
      const playerId = toPlayerId(data.player_id);
      return playerId && typeof data.room_id === 'number'
        ? { type: 'joined', room_id: data.room_id, player_id: playerId }
        : null;
    }
    case 'state': {
      const game = parseSnapshot(data.game);
      return game ? { type: 'state', game } : null;
    }
    case 'start':
      return typeof data.room_id === 'number' ? { type: 'start', room_id: data.room_id } : null;
    case 'waiting':
      return { type: 'waiting', message: typeof data.message === 'string' ? data.message : '' };
    case 'gameover': {
      const wins = toPerPlayer(data.wins, (v) => (typeof v === 'number' ? v : null));
      const names = toPerPlayer(data.names, (v) => (typeof v === 'string' ? v : null));
      if (!wins || !names) return null;
      return { type: 'gameover', winner: toPlayerId(data.winner), wins, names };
    }
    default:
      return null;
  }
}
