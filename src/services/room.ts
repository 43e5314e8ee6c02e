import { Game } from '../engine/game.js';
import { GAME } from '../world/config.js';
import { clampDifficulty, type BotHandle, type BotLauncher } from './bots.js';
import type { MatchRecorder } from './history.js';
import type {
  Connection,
  GameMode,
  PerPlayer,
  PlayerCommand,
  PlayerId,
  RoomStatus,
  RoomSummary,
  ServerMessage,
} from '../types.js';

export const MAX_NAME_LENGTH = 24;

export interface TickScheduler {
  // Calls onTick every intervalMs until the returned function is called
  start(onTick: () => void, intervalMs: number): () => void;
}

export const intervalScheduler: TickScheduler = {
  start(onTick, intervalMs) {
    const timer = setInterval(onTick, intervalMs);
    return () => clearInterval(timer);
  },
};

export interface GameRoomOptions {
  scheduler?: TickScheduler;
  bots?: BotLauncher | null;
  history?: MatchRecorder | null;
  tickMs?: number;
  createGame?: (mode: GameMode) => Game;
  // Fired when the room starts or finishes a game
  onActivityChange?: () => void;
}

function defaultNames(): PerPlayer<string> {
  return { 1: 'Player 1', 2: 'Player 2' };
}

export function normalizeName(raw: string | undefined, playerId: PlayerId): string {
  const name = raw?.trim().slice(0, MAX_NAME_LENGTH) ?? '';
  return name.length > 0 ? name : `Player ${playerId}`;
}

/**
 * One game room: two player seats, any number of observers, and the tick
 * loop that drives the shared Game.
 */
export class GameRoom {
  readonly roomId: number;
  game: Game;
  readonly connections = new Map<PlayerId, Connection>();
  readonly observers = new Set<Connection>();
  readonly ready = new Set<PlayerId>();
  pendingMode: GameMode = 'two_player';
  wins: PerPlayer<number> = { 1: 0, 2: 0 };
  names: PerPlayer<string> = defaultNames();
  bot: BotHandle | null = null;

  private stopLoop: (() => void) | null = null;
  private readonly scheduler: TickScheduler;
  private readonly bots: BotLauncher | null;
  private readonly history: MatchRecorder | null;
  private readonly tickMs: number;
  private readonly createGame: (mode: GameMode) => Game;
  private readonly onActivityChange: () => void;

  constructor(roomId: number, options: GameRoomOptions = {}) {
    this.roomId = roomId;
    this.scheduler = options.scheduler ?? intervalScheduler;
    this.bots = options.bots ?? null;
    this.history = options.history ?? null;
    this.tickMs = options.tickMs ?? GAME.TICK_MS;
    this.createGame = options.createGame ?? ((mode) => new Game({ mode }));
    this.onActivityChange = options.onActivityChange ?? (() => {});
    this.game = this.createGame('two_player');
  }

  // ─── Predicates ───

  isEmpty(): boolean {
    return this.connections.size === 0;
  }

  isWaitingForPlayer(): boolean {
    return this.connections.size === 1 && !this.game.running;
  }

  isFull(): boolean {
    return this.connections.size >= 2;
  }

  isActive(): boolean {
    return this.game.running;
  }

  getAvailableSlot(): PlayerId | null {
    if (!this.connections.has(1)) return 1;
    if (!this.connections.has(2)) return 2;
    return null;
  }

  // ─── Membership ───

  connectPlayer(playerId: PlayerId, conn: Connection): void {
    this.connections.set(playerId, conn);
    console.log(`✅ [Room ${this.roomId}] Player ${playerId} connected (${this.connections.size} player(s))`);
    this.broadcastState();
  }

  connectObserver(conn: Connection): void {
    this.observers.add(conn);
    console.log(`👁️ [Room ${this.roomId}] Observer connected (${this.observers.size} observer(s))`);
    conn.send(this.observerJoinedMessage());
  }

  disconnectPlayer(playerId: PlayerId): void {
    this.connections.delete(playerId);
    this.ready.delete(playerId);
    if (this.stopLoop) {
      this.haltLoop();
      console.log(`⏹️ [Room ${this.roomId}] Game stopped (player disconnected)`);
    }
    this.stopBot();
    this.game = this.createGame('two_player');
    this.pendingMode = 'two_player';
    this.wins = { 1: 0, 2: 0 };
    this.names = defaultNames();
    console.log(`❌ [Room ${this.roomId}] Player ${playerId} disconnected (${this.connections.size} player(s))`);
  }

  disconnectObserver(conn: Connection): void {
    if (this.observers.delete(conn)) {
      console.log(`👁️ [Room ${this.roomId}] Observer disconnected (${this.observers.size} observer(s))`);
    }
  }

  // Stops the tick loop and any spawned bot without touching seats
  shutdown(): void {
    this.haltLoop();
    this.stopBot();
  }

  // ─── Commands ───

  handleMessage(playerId: PlayerId, command: PlayerCommand): void {
    if (command.action === 'move') {
      if (this.game.running) {
        this.game.snakes[playerId].queueDirection(command.direction);
      }
      return;
    }

    // Only the first ready player picks the mode (not the bot joining later)
    if (this.ready.size === 0 && command.mode) {
      this.pendingMode = command.mode;
    }

    const name = normalizeName(command.name, playerId);
    this.names[playerId] = name;

    if (command.mode === 'vs_ai' && !this.bot) {
      this.spawnBot(clampDifficulty(command.ai_difficulty));
    }

    this.ready.add(playerId);
    console.log(`👍 [Room ${this.roomId}] ${name} ready (mode: ${this.pendingMode}, ready: ${this.ready.size})`);

    if (this.ready.size >= 2 && !this.game.running) {
      this.startGame();
    } else if (this.ready.size < 2) {
      const conn = this.connections.get(playerId);
      if (conn) {
        const message = this.pendingMode === 'vs_ai' ? 'Launching CopperBot...' : 'Waiting for Player 2...';
        this.sendTo(playerId, conn, { type: 'waiting', message });
      }
    }
  }

  // ─── Bots ───

  private spawnBot(difficulty: number): void {
    this.stopBot();
    if (!this.bots) {
      console.warn(`⚠️ [Room ${this.roomId}] No bot launcher configured; cannot start CopperBot`);
      return;
    }
    this.bot = this.bots.launch(difficulty);
    if (this.bot) {
      console.log(`🤖 [Room ${this.roomId}] CopperBot L${difficulty} spawned (PID: ${this.bot.pid ?? 'unknown'})`);
    }
  }

  private stopBot(): void {
    if (!this.bot) return;
    try {
      this.bot.stop();
      console.log(`🤖 [Room ${this.roomId}] CopperBot process terminated`);
    } catch (err) {
      console.warn(`⚠️ [Room ${this.roomId}] Failed to terminate CopperBot: ${err}`);
    }
    this.bot = null;
  }

  // ─── Game loop ───

  startGame(): void {
    this.haltLoop();
    this.game = this.createGame('two_player');
    this.game.running = true;

    console.log(`🎮 [Room ${this.roomId}] Game started! Mode: ${this.pendingMode}`);
    this.broadcast({ type: 'start', mode: this.pendingMode, room_id: this.roomId });

    this.stopLoop = this.scheduler.start(() => this.tick(), this.tickMs);
    this.onActivityChange();
    // First step right away; the scheduler paces the rest
    this.tick();
  }

  /** Advances the game one step and reports the result to everyone in the room. */
  tick(): void {
    const game = this.game;
    if (!game.running) {
      this.haltLoop();
      return;
    }

    game.update();
    this.broadcastState();

    // A send failure above may have reset the room
    if (this.game !== game || game.running) return;

    this.haltLoop();
    if (game.winner !== null) {
      this.wins[game.winner] += 1;
      console.log(`🏆 [Room ${this.roomId}] Game over! Winner: ${this.names[game.winner]}`);
    } else {
      console.log(`🏁 [Room ${this.roomId}] Game over! Draw.`);
    }

    this.history?.recordMatch({
      roomId: this.roomId,
      mode: this.pendingMode,
      player1Name: this.names[1],
      player2Name: this.names[2],
      winner: game.winner,
      winnerName: game.winner !== null ? this.names[game.winner] : null,
      ticks: game.ticks,
    });

    this.broadcast({
      type: 'gameover',
      winner: game.winner,
      wins: { ...this.wins },
      names: { ...this.names },
      room_id: this.roomId,
    });
    this.ready.clear();

    this.onActivityChange();
  }

  private haltLoop(): void {
    if (this.stopLoop) {
      this.stopLoop();
      this.stopLoop = null;
    }
  }

  // ─── Messaging ───

  summary(): RoomSummary {
    return { room_id: this.roomId, names: { ...this.names }, wins: { ...this.wins } };
  }

  status(): RoomStatus {
    return {
      room_id: this.roomId,
      players: [...this.connections.keys()].sort((a, b) => a - b),
      observers: this.observers.size,
      game_running: this.game.running,
      waiting_for_player: this.isWaitingForPlayer(),
    };
  }

  observerJoinedMessage(): ServerMessage {
    return {
      type: 'observer_joined',
      room_id: this.roomId,
      game: this.game.toJSON(),
      wins: { ...this.wins },
      names: { ...this.names },
    };
  }

  broadcastState(): void {
    this.broadcast({
      type: 'state',
      game: this.game.toJSON(),
      wins: { ...this.wins },
      names: { ...this.names },
      room_id: this.roomId,
    });
  }

  broadcast(message: ServerMessage): void {
    const failedPlayers: PlayerId[] = [];
    const failedObservers: Connection[] = [];

    for (const [playerId, conn] of this.connections) {
      try {
        conn.send(message);
      } catch {
        failedPlayers.push(playerId);
      }
    }
    for (const conn of this.observers) {
      try {
        conn.send(message);
      } catch {
        failedObservers.push(conn);
      }
    }

    for (const playerId of failedPlayers) this.disconnectPlayer(playerId);
    for (const conn of failedObservers) this.disconnectObserver(conn);
  }

  private sendTo(playerId: PlayerId, conn: Connection, message: ServerMessage): void {
    try {
      conn.send(message);
    } catch (err) {
      console.warn(`⚠️ [Room ${this.roomId}] Could not reach Player ${playerId}: ${err}`);
      this.disconnectPlayer(playerId);
    }
  }
}
