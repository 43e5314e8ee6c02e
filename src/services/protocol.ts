import { DIRECTIONS } from '../types.js';
import type { Direction, GameMode, ObserverCommand, PlayerCommand, ReadyCommand } from '../types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}

export function isGameMode(value: unknown): value is GameMode {
  return value === 'two_player' || value === 'vs_ai';
}

// JSON object from a text frame, or null
export function parseFrame(raw: string): Record<string, unknown> | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  return isRecord(data) ? data : null;
}

export function parsePlayerCommand(raw: string): PlayerCommand | null {
  const data = parseFrame(raw);
  if (!data) return null;

  if (data.action === 'move') {
    return isDirection(data.direction) ? { action: 'move', direction: data.direction } : null;
  }

  if (data.action === 'ready') {
    const command: ReadyCommand = { action: 'ready' };
    if (isGameMode(data.mode)) command.mode = data.mode;
    if (typeof data.name === 'string') command.name = data.name;
    if (typeof data.ai_difficulty === 'number' && Number.isFinite(data.ai_difficulty)) {
      command.ai_difficulty = data.ai_difficulty;
    }
    return command;
  }

  return null;
}

export function parseObserverCommand(raw: string): ObserverCommand | null {
  const data = parseFrame(raw);
  if (!data) return null;

  if (data.action === 'switch_room') {
    const roomId = typeof data.room_id === 'string' ? Number(data.room_id) : data.room_id;
    return typeof roomId === 'number' && Number.isInteger(roomId)
      ? { action: 'switch_room', room_id: roomId }
      : null;
  }
  if (data.action === 'get_rooms') {
    return { action: 'get_rooms' };
  }
  return null;
}
