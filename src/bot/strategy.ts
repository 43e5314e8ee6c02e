import { DIRECTIONS, OPPOSITE } from '../types.js';
import { step } from '../engine/snake.js';
import type { Cell, Direction, GameSnapshot, PlayerId, SnakeView } from '../types.js';

// ─── Tuning ───
// Chance of a random safe move per difficulty point below 10
const MISTAKE_RATE_PER_LEVEL = 0.05;
// Difficulty at which each lookahead switches on
const SPACE_AWARE_FROM = 4;
const HEAD_ON_AWARE_FROM = 6;

const TRAPPED_PENALTY = 500;
const HEAD_ON_PENALTY = 200;

export interface MoveOption {
  direction: Direction;
  cell: Cell;
  safe: boolean;
  space: number;
  foodDistance: number | null;
  headOnRisk: boolean;
  score: number;
}

const key = ([x, y]: Cell) => `${x},${y}`;

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

function inBounds(game: GameSnapshot, [x, y]: Cell): boolean {
  return x >= 0 && x < game.grid.width && y >= 0 && y < game.grid.height;
}

function opponentOf(me: PlayerId): PlayerId {
  return me === 1 ? 2 : 1;
}

// Tails move out of the way next tick unless that snake is about to eat
function tailVacates(snake: SnakeView, food: Cell | null): boolean {
  if (snake.body.length < 2) return false;
  return food === null || manhattan(snake.body[0], food) !== 1;
}

/** Cells that will still be occupied after the next tick. */
export function blockedCells(game: GameSnapshot): Set<string> {
  const blocked = new Set<string>();
  for (const snake of [game.snakes[1], game.snakes[2]]) {
    const last = tailVacates(snake, game.food) ? snake.body.length - 1 : snake.body.length;
    for (let i = 0; i < last; i++) blocked.add(key(snake.body[i]));
  }
  return blocked;
}

/** Reachable free cells from start, stopping once limit is reached. */
export function floodFill(game: GameSnapshot, start: Cell, blocked: Set<string>, limit: number): number {
  const seen = new Set<string>([key(start)]);
  const queue: Cell[] = [start];
  let count = 0;

  while (queue.length > 0 && count < limit) {
    const cell = queue.shift();
    if (!cell) break;
    count++;
    for (const direction of DIRECTIONS) {
      const next = step(cell, direction);
      const k = key(next);
      if (!seen.has(k) && inBounds(game, next) && !blocked.has(k)) {
        seen.add(k);
        queue.push(next);
      }
    }
  }
  return count;
}

export function evaluateMoves(game: GameSnapshot, me: PlayerId, difficulty: number): MoveOption[] {
  const snake = game.snakes[me];
  const opponent = game.snakes[opponentOf(me)];
  const head = snake.body[0];
  const blocked = blockedCells(game);

  const opponentReach = new Set<string>();
  if (opponent.alive) {
    for (const direction of DIRECTIONS) {
      if (direction !== OPPOSITE[opponent.direction]) {
        opponentReach.add(key(step(opponent.body[0], direction)));
      }
    }
  }

  const spaceLimit = game.grid.width * game.grid.height;

  return DIRECTIONS
    .filter((direction) => direction !== OPPOSITE[snake.direction])
    .map((direction): MoveOption => {
      const cell = step(head, direction);
      const safe = inBounds(game, cell) && !blocked.has(key(cell));
      const space = safe ? floodFill(game, cell, blocked, spaceLimit) : 0;
      const foodDistance = game.food ? manhattan(cell, game.food) : null;
      const headOnRisk = opponentReach.has(key(cell));

      let score = safe ? 0 : -Infinity;
      if (safe) {
        if (foodDistance !== null) score -= foodDistance;
        if (difficulty >= SPACE_AWARE_FROM && space < snake.body.length + 1) {
          score -= TRAPPED_PENALTY - space;
        }
        if (difficulty >= HEAD_ON_AWARE_FROM && headOnRisk) {
          score -= HEAD_ON_PENALTY;
        }
      }
      return { direction, cell, safe, space, foodDistance, headOnRisk, score };
    });
}

/**
 * Picks CopperBot's next direction. Lower difficulties ignore lookahead and
 * sometimes take a random safe move. Returns null when the snake is dead.
 */
export function chooseMove(
  game: GameSnapshot,
  me: PlayerId,
  difficulty: number,
  random: () => number = Math.random
): Direction | null {
  const snake = game.snakes[me];
  if (!snake.alive || snake.body.length === 0) return null;

  const options = evaluateMoves(game, me, difficulty);
  const safe = options.filter((o) => o.safe);
  if (safe.length === 0) return snake.direction;

  const mistakeChance = Math.max(0, 10 - difficulty) * MISTAKE_RATE_PER_LEVEL;
  if (random() < mistakeChance) {
    return safe[Math.floor(random() * safe.length) % safe.length].direction;
  }

  let best = safe[0];
  for (const option of safe) {
    // Ties go to the current heading, then to the roomier cell
    if (
      option.score > best.score ||
      (option.score === best.score && option.direction === snake.direction) ||
      (option.score === best.score && best.direction !== snake.direction && option.space > best.space)
    ) {
      best = option;
    }
  }
  return best.direction;
}
