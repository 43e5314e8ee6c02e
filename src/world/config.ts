import path from 'path';

// Integer from env no smaller than min, or the fallback
export function envInt(value: string | undefined, fallback: number, min = 1): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

// ─── Game Rules ───
export const GAME = {
  TICK_MS: envInt(process.env.COPPERHEAD_TICK_MS, 150),
  INPUT_QUEUE_LIMIT: 3,
  START_OFFSET: 5, // distance of each spawn from its side wall
} as const;

// ─── Board ───
// Both spawns sit START_OFFSET from their wall with a gap between them
export const MIN_GRID_WIDTH = 2 * GAME.START_OFFSET + 2;
export const MIN_GRID_HEIGHT = 1;

export function gridFromEnv(env: NodeJS.ProcessEnv): { WIDTH: number; HEIGHT: number } {
  return {
    WIDTH: envInt(env.COPPERHEAD_GRID_WIDTH, 30, MIN_GRID_WIDTH),
    HEIGHT: envInt(env.COPPERHEAD_GRID_HEIGHT, 20, MIN_GRID_HEIGHT),
  };
}

export const GRID = gridFromEnv(process.env);

// ─── Rooms ───
export const ROOMS = {
  MAX_ROOMS: envInt(process.env.COPPERHEAD_MAX_ROOMS, 10),
} as const;

// ─── CopperBot ───
export const BOTS = {
  DEFAULT_DIFFICULTY: 5,
  MIN_DIFFICULTY: 1,
  MAX_DIFFICULTY: 10,
  // Difficulty range for matches launched for an observer with nothing to watch
  OBSERVER_MATCH_MIN: 3,
  OBSERVER_MATCH_MAX: 8,
  STOP_TIMEOUT_MS: 2000,
} as const;

// ─── Server ───
export const SERVER = {
  NAME: 'CopperHead Server',
  PORT: envInt(process.env.PORT, 8000),
  QUIET_STARTUP: process.env.COPPERHEAD_QUIET_STARTUP === '1',
  DEV_MODE: process.env.DEV_MODE === 'true',
  DB_PATH: process.env.DB_PATH || path.join(process.cwd(), 'data', 'copperhead.db'),
  CLIENT_URL: 'https://revodavid.github.io/copperhead-client/',
} as const;

// ─── Close codes ───
export const CLOSE_CODES = {
  INVALID_PLAYER: 4000,
  SERVER_FULL: 4002,
} as const;

export interface ConnectionInfo {
  wsUrl: string;
  isCodespace: boolean;
}

// WebSocket base URL for clients and spawned bots (ends in /ws/)
export function getConnectionInfo(
  env: NodeJS.ProcessEnv = process.env,
  port: number = SERVER.PORT
): ConnectionInfo {
  const codespaceName = env.CODESPACE_NAME;
  const domain = env.GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN || 'app.github.dev';

  if (codespaceName) {
    return { wsUrl: `wss://${codespaceName}-${port}.${domain}/ws/`, isCodespace: true };
  }
  return { wsUrl: `ws://localhost:${port}/ws/`, isCodespace: false };
}

export function getServerUrl(env: NodeJS.ProcessEnv = process.env, port: number = SERVER.PORT): string {
  return getConnectionInfo(env, port).wsUrl;
}
