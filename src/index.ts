import http from 'http';
import { pathToFileURL } from 'url';
import { getRequestListener } from '@hono/node-server';
import { createApp } from './app.js';
import { openDatabase } from './db/index.js';
import { attachSockets } from './routes/sockets.js';
import { ProcessBotLauncher } from './services/bots.js';
import { MatchHistory } from './services/history.js';
import { RoomManager } from './services/roomManager.js';
import { GAME, GRID, SERVER, getConnectionInfo } from './world/config.js';

export interface StartOptions {
  port?: number;
  dbPath?: string;
  // Skip the connection banner (the launcher prints its own)
  quiet?: boolean;
}

export interface RunningServer {
  server: http.Server;
  manager: RoomManager;
  close: () => Promise<void>;
}

function logStartup(port: number, quiet: boolean): void {
  console.log('🐍 CopperHead Server started');
  console.log(`   Grid: ${GRID.WIDTH}x${GRID.HEIGHT}, Tick rate: ${GAME.TICK_MS / 1000}s`);
  if (quiet) return;

  const { wsUrl, isCodespace } = getConnectionInfo(process.env, port);
  console.log('');
  if (isCodespace) {
    console.log('='.repeat(60));
    console.log('📡 CLIENT CONNECTION URL:');
    console.log(`   ${wsUrl}`);
    console.log('');
    console.log(`⚠️  IMPORTANT: Make port ${port} public!`);
    console.log('   1. Open the Ports tab (bottom panel)');
    console.log(`   2. Right-click port ${port} → Port Visibility → Public`);
    console.log('='.repeat(60));
  } else {
    console.log(`📡 Client connection URL: ${wsUrl}`);
  }
  console.log('');
}

export function startServer(options: StartOptions = {}): Promise<RunningServer> {
  const port = options.port ?? SERVER.PORT;
  const quiet = options.quiet ?? SERVER.QUIET_STARTUP;

  // ─── Initialize ───
  const database = openDatabase(options.dbPath ?? SERVER.DB_PATH);
  const history = new MatchHistory(database.db);
  const manager = new RoomManager({
    bots: new ProcessBotLauncher(getConnectionInfo(process.env, port).wsUrl),
    history,
  });

  // ─── HTTP + WebSockets ───
  const app = createApp({ manager, history });
  const server = http.createServer(getRequestListener(app.fetch));
  const wss = attachSockets(server, manager);

  const close = () =>
    new Promise<void>((resolve, reject) => {
      manager.shutdown();
      for (const client of wss.clients) client.terminate();
      wss.close();
      server.close((err) => {
        database.close();
        if (err) reject(err);
        else resolve();
      });
    });

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      database.close();
      reject(err);
    };
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      logStartup(port, quiet);
      resolve({ server, manager, close });
    });
  });
}

// ─── Start ───
async function main(): Promise<void> {
  const running = await startServer();

  const shutdown = (signal: string) => {
    console.log(`\n🛑 ${signal} received, shutting down...`);
    running.close().then(
      () => process.exit(0),
      (err) => {
        console.error('Failed to close cleanly:', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error('🔥 Failed to start CopperHead Server:', err);
    process.exit(1);
  });
}
