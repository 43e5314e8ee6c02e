import { desc, sql } from 'drizzle-orm';
import { v4 as uuid } from 'uuid';
import { schema, type CopperheadDb } from '../db/index.js';
import type { GameMode, LeaderboardEntry, MatchRecord, PlayerId } from '../types.js';

export type MatchResult = Omit<MatchRecord, 'id' | 'finishedAt'>;

// What a room needs to report a finished match
export interface MatchRecorder {
  recordMatch(result: MatchResult): MatchRecord | null;
}

export const HISTORY_LIMITS = {
  DEFAULT: 20,
  MAX: 100,
} as const;

export function clampLimit(raw: string | undefined): number {
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) return HISTORY_LIMITS.DEFAULT;
  return Math.min(parsed, HISTORY_LIMITS.MAX);
}

function toPlayerId(value: number | null): PlayerId | null {
  return value === 1 || value === 2 ? value : null;
}

function toMode(value: string): GameMode {
  return value === 'vs_ai' ? 'vs_ai' : 'two_player';
}

type MatchRow = typeof schema.matches.$inferSelect;

interface LeaderboardRow {
  name: string;
  wins: number;
  losses: number;
  draws: number;
  games: number;
}

function rowToRecord(row: MatchRow): MatchRecord {
  return {
    id: row.id,
    roomId: row.roomId,
    mode: toMode(row.mode),
    player1Name: row.player1Name,
    player2Name: row.player2Name,
    winner: toPlayerId(row.winner),
    winnerName: row.winnerName,
    ticks: row.ticks,
    finishedAt: row.finishedAt,
  };
}

export class MatchHistory implements MatchRecorder {
  constructor(
    private readonly db: CopperheadDb,
    private readonly now: () => number = Date.now
  ) {}

  // A failed write is logged; a finished match never takes a room down
  recordMatch(result: MatchResult): MatchRecord | null {
    const record: MatchRecord = { ...result, id: uuid(), finishedAt: this.now() };
    try {
      this.db.insert(schema.matches).values(record).run();
      return record;
    } catch (err) {
      console.error(`❌ [History] Failed to record match from Room ${result.roomId}:`, err);
      return null;
    }
  }

  getRecentMatches(limit: number = HISTORY_LIMITS.DEFAULT): MatchRecord[] {
    return this.db.select()
      .from(schema.matches)
      .orderBy(desc(schema.matches.finishedAt))
      .limit(limit)
      .all()
      .map(rowToRecord);
  }

  // Aggregated in SQL; each match counts once for each of its two players
  getLeaderboard(limit: number = HISTORY_LIMITS.DEFAULT): LeaderboardEntry[] {
    const m = schema.matches;
    const rows = this.db.all<LeaderboardRow>(sql`
      SELECT name,
        SUM(won) AS wins,
        SUM(lost) AS losses,
        SUM(drawn) AS draws,
        COUNT(*) AS games
      FROM (
        SELECT ${m.player1Name} AS name,
          CASE WHEN ${m.winner} = 1 THEN 1 ELSE 0 END AS won,
          CASE WHEN ${m.winner} = 2 THEN 1 ELSE 0 END AS lost,
          CASE WHEN ${m.winner} IS NULL THEN 1 ELSE 0 END AS drawn
        FROM ${m}
        UNION ALL
        SELECT ${m.player2Name} AS name,
          CASE WHEN ${m.winner} = 2 THEN 1 ELSE 0 END AS won,
          CASE WHEN ${m.winner} = 1 THEN 1 ELSE 0 END AS lost,
          CASE WHEN ${m.winner} IS NULL THEN 1 ELSE 0 END AS drawn
        FROM ${m}
      ) AS sides
      GROUP BY name
      ORDER BY wins DESC, games DESC, name ASC
      LIMIT ${limit}
    `);

    return rows.map((row, i) => ({
      rank: i + 1,
      name: row.name,
      wins: Number(row.wins),
      losses: Number(row.losses),
      draws: Number(row.draws),
      games: Number(row.games),
    }));
  }
}
