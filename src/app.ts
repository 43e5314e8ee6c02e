import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { SERVER } from './world/config.js';
import roomRoutes from './routes/rooms.js';
import matchRoutes from './routes/matches.js';
import type { RoomManager } from './services/roomManager.js';
import type { MatchHistory } from './services/history.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const GUIDE_PATH = path.join(__dirname, '..', 'docs', 'bot-guide.md');

export interface AppOptions {
  manager: RoomManager;
  history: MatchHistory;
  requestLogging?: boolean;
  guidePath?: string;
  devMode?: boolean;
}

export function createApp(options: AppOptions): Hono {
  const { manager, history } = options;
  const guidePath = options.guidePath ?? GUIDE_PATH;
  const devMode = options.devMode ?? SERVER.DEV_MODE;

  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }

  // ─── Routes ───

  app.get('/', (c) => {
    return c.json({ name: SERVER.NAME, status: 'running' });
  });

  // Bot-author guide
  app.get('/guide', (c) => {
    try {
      const content = fs.readFileSync(guidePath, 'utf-8');
      c.header('Content-Type', 'text/markdown; charset=utf-8');
      return c.body(content);
    } catch {
      return c.json({ error: 'Guide not found' }, 404);
    }
  });

  app.route('/', roomRoutes(manager));
  app.route('/', matchRoutes(history));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'Not found. Try GET / or GET /status.' }, 404);
  });

  // ─── Error Handler ───
  app.onError((err, c) => {
    console.error('🔥 Error:', err.message);
    console.error('Stack:', err.stack);
    return c.json({
      error: 'Internal server error',
      message: devMode ? err.message : undefined,
    }, 500);
  });

  return app;
}
