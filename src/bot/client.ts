import WebSocket from 'ws';
import { chooseMove } from './strategy.js';
import { parseServerMessage, type BotInbound } from './messages.js';
import type { PlayerCommand, PlayerId } from '../types.js';

export interface CopperBotOptions {
  server: string;
  difficulty: number;
  name?: string;
  quiet?: boolean;
  random?: () => number;
}

// ws://host/ws/ → ws://host/ws/join
export function joinUrl(server: string): string {
  const trimmed = server.replace(/\/+$/, '');
  return trimmed.endsWith('/join') ? trimmed : `${trimmed}/join`;
}

export class CopperBot {
  readonly name: string;
  playerId: PlayerId | null = null;
  roomId: number | null = null;
  gamesPlayed = 0;

  private socket: WebSocket | null = null;
  private readonly random: () => number;

  constructor(private readonly options: CopperBotOptions) {
    this.name = options.name ?? `CopperBot L${options.difficulty}`;
    this.random = options.random ?? Math.random;
  }

  private log(message: string): void {
    if (!this.options.quiet) console.log(message);
  }

  /** Connects and plays until the server closes the socket. */
  run(): Promise<number> {
    return new Promise((resolve, reject) => {
      const url = joinUrl(this.options.server);
      const socket = new WebSocket(url);
      this.socket = socket;

      socket.on('open', () => this.log(`🐍 ${this.name} connected to ${url}`));
      socket.on('message', (data) => {
        const message = parseServerMessage(data.toString());
        if (message) this.handle(message);
      });
      socket.on('close', (code, reason) => {
        this.log(`👋 ${this.name} disconnected (${code}${reason.length ? `: ${reason.toString()}` : ''})`);
        this.socket = null;
        resolve(code);
      });
      socket.on('error', (err) => {
        if (socket.readyState !== WebSocket.OPEN) reject(err);
        else console.error(`❌ ${this.name} socket error: ${err.message}`);
      });
    });
  }

  stop(): void {
    this.socket?.close(1000, 'bot stopped');
  }

  handle(message: BotInbound): void {
    switch (message.type) {
      case 'joined':
        this.playerId = message.player_id;
        this.roomId = message.room_id;
        this.log(`🏠 Joined Room ${message.room_id} as Player ${message.player_id}`);
        this.send({ action: 'ready', name: this.name });
        break;

      case 'start':
        this.log(`🎮 Game started in Room ${message.room_id}`);
        break;

      case 'waiting':
        this.log(`⏳ ${message.message}`);
        break;

      case 'state': {
        if (this.playerId === null || !message.game.running) break;
        const snake = message.game.snakes[this.playerId];
        const move = chooseMove(message.game, this.playerId, this.options.difficulty, this.random);
        if (move && move !== snake.direction) {
          this.send({ action: 'move', direction: move });
        }
        break;
      }

      case 'gameover': {
        this.gamesPlayed++;
        const result = message.winner === null
          ? 'Draw'
          : message.winner === this.playerId ? 'Won' : `Lost to ${message.names[message.winner]}`;
        this.log(`🏁 ${result} (wins ${message.wins[1]}-${message.wins[2]})`);
        this.send({ action: 'ready', name: this.name });
        break;
      }
    }
  }

  private send(command: PlayerCommand): void {
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify(command));
    }
  }
}
