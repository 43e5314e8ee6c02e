import { spawn, type ChildProcess } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import { BOTS, getServerUrl } from '../world/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// copperbot.ts under tsx, copperbot.js once built
const BOT_SCRIPT = path.join(__dirname, '..', 'bot', `copperbot${path.extname(__filename)}`);

export interface BotHandle {
  readonly pid: number | undefined;
  stop(): void;
}

export interface BotLauncher {
  launch(difficulty: number): BotHandle | null;
}

export function clampDifficulty(value: unknown): number {
  const n = typeof value === 'number' && Number.isFinite(value)
    ? Math.round(value)
    : BOTS.DEFAULT_DIFFICULTY;
  return Math.max(BOTS.MIN_DIFFICULTY, Math.min(BOTS.MAX_DIFFICULTY, n));
}

class ChildBotHandle implements BotHandle {
  constructor(private readonly child: ChildProcess) {}

  get pid(): number | undefined {
    return this.child.pid;
  }

  stop(): void {
    if (this.child.exitCode !== null || this.child.signalCode !== null) return;
    this.child.kill('SIGTERM');

    const force = setTimeout(() => {
      if (this.child.exitCode === null && this.child.signalCode === null) {
        console.warn(`⚠️ CopperBot (PID: ${this.pid}) ignored SIGTERM, killing`);
        this.child.kill('SIGKILL');
      }
    }, BOTS.STOP_TIMEOUT_MS);
    force.unref();
  }
}

/**
 * Runs CopperBot as a child Node process, through the same loader flags the
 * server was started with so the TypeScript entry point works under tsx.
 */
export class ProcessBotLauncher implements BotLauncher {
  constructor(
    private readonly serverUrl: string = getServerUrl(),
    private readonly script: string = BOT_SCRIPT
  ) {}

  launch(difficulty: number): BotHandle | null {
    const execArgv = process.execArgv.filter((arg) => !arg.startsWith('--test') && !arg.startsWith('--watch'));
    try {
      const child = spawn(
        process.execPath,
        [...execArgv, this.script, '--server', this.serverUrl, '--difficulty', String(difficulty), '--quiet'],
        { cwd: process.cwd(), stdio: 'inherit' }
      );
      child.on('error', (err) => {
        console.error(`❌ CopperBot L${difficulty} failed to start: ${err.message}`);
      });
      return new ChildBotHandle(child);
    } catch (err) {
      console.error(`❌ Failed to spawn CopperBot L${difficulty}:`, err);
      return null;
    }
  }
}
