// ─── Core Types ───

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export const DELTAS: Record<Direction, Cell> = {
  up: [0, -1],
  down: [0, 1],
  left: [-1, 0],
  right: [1, 0],
};

// Grid coordinate, serialized as a two-element array
export type Cell = [x: number, y: number];

export type PlayerId = 1 | 2;

export const PLAYER_IDS: readonly PlayerId[] = [1, 2];

export type GameMode = 'two_player' | 'vs_ai';

export type PerPlayer<T> = Record<PlayerId, T>;

// ─── Snapshots ───

export interface SnakeView {
  player_id: PlayerId;
  body: Cell[];
  direction: Direction;
  alive: boolean;
}

export interface GameSnapshot {
  mode: GameMode;
  grid: { width: number; height: number };
  snakes: PerPlayer<SnakeView>;
  food: Cell | null;
  running: boolean;
  winner: PlayerId | null;
}

export interface RoomSummary {
  room_id: number;
  names: PerPlayer<string>;
  wins: PerPlayer<number>;
}

export interface RoomStatus {
  room_id: number;
  players: PlayerId[];
  observers: number;
  game_running: boolean;
  waiting_for_player: boolean;
}

export interface ServerStatus {
  total_rooms: number;
  rooms: RoomStatus[];
}

// ─── Server → Client ───

export type ServerMessage =
  | { type: 'joined'; room_id: number; player_id: PlayerId }
  | { type: 'state'; game: GameSnapshot; wins: PerPlayer<number>; names: PerPlayer<string>; room_id: number }
  | { type: 'waiting'; message: string }
  | { type: 'start'; mode: GameMode; room_id: number }
  | { type: 'gameover'; winner: PlayerId | null; wins: PerPlayer<number>; names: PerPlayer<string>; room_id: number }
  | { type: 'observer_lobby'; message: string }
  | { type: 'observer_joined'; room_id: number; game: GameSnapshot; wins: PerPlayer<number>; names: PerPlayer<string> }
  | { type: 'room_list'; rooms: RoomSummary[]; current_room: number | null }
  | { type: 'error'; message: string };

// ─── Client → Server ───

export interface MoveCommand {
  action: 'move';
  direction: Direction;
}

export interface ReadyCommand {
  action: 'ready';
  mode?: GameMode;
  name?: string;
  ai_difficulty?: number;
}

export type PlayerCommand = MoveCommand | ReadyCommand;

export type ObserverCommand =
  | { action: 'switch_room'; room_id: number }
  | { action: 'get_rooms' };

// Anything that can receive server messages (a WebSocket, or a fake in tests)
export interface Connection {
  readonly id: string;
  send(message: ServerMessage): void;
  close(code?: number, reason?: string): void;
}

// ─── Match history ───

export interface MatchRecord {
  id: string;
  roomId: number;
  mode: GameMode;
  player1Name: string;
  player2Name: string;
  winner: PlayerId | null;
  winnerName: string | null;
  ticks: number;
  finishedAt: number; // Unix timestamp (ms)
}

export interface LeaderboardEntry {
  rank: number;
  name: string;
  wins: number;
  losses: number;
  draws: number;
  games: number;
}
