import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import path from 'path';
import fs from 'fs';

export type CopperheadDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: CopperheadDb;
  close: () => void;
}

// ─── Open + initialize ───
// Pass ':memory:' for a throwaway database.
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  initializeDatabase(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

export function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS matches (
      id TEXT PRIMARY KEY,
      room_id INTEGER NOT NULL,
      mode TEXT NOT NULL DEFAULT 'two_player',
      player1_name TEXT NOT NULL,
      player2_name TEXT NOT NULL,
      winner INTEGER,
      winner_name TEXT,
      ticks INTEGER NOT NULL DEFAULT 0,
      finished_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS matches_finished_at_idx ON matches(finished_at);
    CREATE INDEX IF NOT EXISTS matches_winner_name_idx ON matches(winner_name);
  `);
}

export { schema };
