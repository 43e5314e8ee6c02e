import { GAME, GRID } from '../world/config.js';
import { PLAYER_IDS } from '../types.js';
import type { Cell, GameMode, GameSnapshot, PerPlayer, PlayerId } from '../types.js';
import { Snake, sameCell } from './snake.js';

export interface GameOptions {
  mode?: GameMode;
  width?: number;
  height?: number;
  random?: () => number;
}

export class Game {
  readonly mode: GameMode;
  readonly width: number;
  readonly height: number;
  private readonly random: () => number;

  snakes: PerPlayer<Snake>;
  food: Cell | null = null;
  running = false;
  winner: PlayerId | null = null;
  ticks = 0;

  constructor(options: GameOptions = {}) {
    this.mode = options.mode ?? 'two_player';
    this.width = options.width ?? GRID.WIDTH;
    this.height = options.height ?? GRID.HEIGHT;
    this.random = options.random ?? Math.random;
    this.snakes = this.startingSnakes();
    this.spawnFood();
  }

  private startingSnakes(): PerPlayer<Snake> {
    const midY = Math.floor(this.height / 2);
    return {
      1: new Snake(1, [GAME.START_OFFSET, midY], 'right'),
      2: new Snake(2, [this.width - 1 - GAME.START_OFFSET, midY], 'left'),
    };
  }

  reset(): void {
    this.snakes = this.startingSnakes();
    this.food = null;
    this.running = false;
    this.winner = null;
    this.ticks = 0;
    this.spawnFood();
  }

  snakeList(): Snake[] {
    return PLAYER_IDS.map((id) => this.snakes[id]);
  }

  // Uniform over free cells; keeps the current food when the board is full
  spawnFood(): void {
    const occupied = new Set<string>();
    for (const snake of this.snakeList()) {
      for (const [x, y] of snake.body) occupied.add(`${x},${y}`);
    }

    const available: Cell[] = [];
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        if (!occupied.has(`${x},${y}`)) available.push([x, y]);
      }
    }

    if (available.length > 0) {
      const index = Math.min(available.length - 1, Math.floor(this.random() * available.length));
      this.food = available[index];
    }
  }

  inBounds([x, y]: Cell): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  update(): void {
    if (!this.running) return;
    this.ticks++;

    // ─── Movement ───
    for (const snake of this.snakeList()) {
      if (!snake.alive) continue;
      const nextHead = snake.getNextHead();
      const grow = this.food !== null && sameCell(nextHead, this.food);
      snake.move(grow);
      if (grow) this.spawnFood();
    }

    // ─── Collisions ───
    for (const snake of this.snakeList()) {
      if (!snake.alive) continue;
      const head = snake.head();

      if (!this.inBounds(head)) snake.alive = false;
      if (snake.occupies(head, 1)) snake.alive = false;
      for (const other of this.snakeList()) {
        if (other.playerId !== snake.playerId && other.occupies(head)) {
          snake.alive = false;
        }
      }
    }

    // ─── Game over ───
    const alive = this.snakeList().filter((s) => s.alive);
    if (alive.length <= 1) {
      this.running = false;
      this.winner = alive.length === 1 ? alive[0].playerId : null;
    }
  }

  toJSON(): GameSnapshot {
    return {
      mode: this.mode,
      grid: { width: this.width, height: this.height },
      snakes: { 1: this.snakes[1].toJSON(), 2: this.snakes[2].toJSON() },
      food: this.food ? [this.food[0], this.food[1]] : null,
      running: this.running,
      winner: this.winner,
    };
  }
}
