import { GAME } from '../world/config.js';
import { DELTAS, OPPOSITE } from '../types.js';
import type { Cell, Direction, PlayerId, SnakeView } from '../types.js';

export function step([x, y]: Cell, direction: Direction): Cell {
  const [dx, dy] = DELTAS[direction];
  return [x + dx, y + dy];
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export class Snake {
  readonly playerId: PlayerId;
  body: Cell[];
  direction: Direction;
  nextDirection: Direction;
  inputQueue: Direction[] = [];
  alive = true;

  constructor(playerId: PlayerId, start: Cell, direction: Direction) {
    this.playerId = playerId;
    this.body = [start];
    this.direction = direction;
    this.nextDirection = direction;
  }

  head(): Cell {
    return this.body[0];
  }

  /**
   * Queue a turn. Checked against the last queued direction (or the pending
   * one when the queue is empty) so repeats and reversals never get in.
   */
  queueDirection(direction: Direction): void {
    const last = this.inputQueue.length > 0
      ? this.inputQueue[this.inputQueue.length - 1]
      : this.nextDirection;
    if (direction === last || OPPOSITE[direction] === last) return;

    this.inputQueue.push(direction);
    if (this.inputQueue.length > GAME.INPUT_QUEUE_LIMIT) {
      this.inputQueue.shift();
    }
  }

  processInput(): void {
    const queued = this.inputQueue.shift();
    if (queued && OPPOSITE[queued] !== this.direction) {
      this.nextDirection = queued;
    }
  }

  // Where the head lands on the next move, without consuming input
  getNextHead(): Cell {
    let direction = this.nextDirection;
    const candidate = this.inputQueue[0];
    if (candidate && OPPOSITE[candidate] !== this.direction) {
      direction = candidate;
    }
    return step(this.head(), direction);
  }

  move(grow = false): void {
    this.processInput();
    this.direction = this.nextDirection;
    this.body.unshift(step(this.head(), this.direction));
    if (!grow) {
      this.body.pop();
    }
  }

  occupies(cell: Cell, fromIndex = 0): boolean {
    for (let i = fromIndex; i < this.body.length; i++) {
      if (sameCell(this.body[i], cell)) return true;
    }
    return false;
  }

  toJSON(): SnakeView {
    return {
      player_id: this.playerId,
      body: this.body.map(([x, y]): Cell => [x, y]),
      direction: this.direction,
      alive: this.alive,
    };
  }
}
