import { Hono } from 'hono';
import { clampLimit, type MatchHistory } from '../services/history.js';

export default function matchRoutes(history: MatchHistory): Hono {
  const matches = new Hono();

  // GET /matches?limit=N: most recent finished games
  matches.get('/matches', (c) => {
    const limit = clampLimit(c.req.query('limit'));
    const recent = history.getRecentMatches(limit);
    return c.json({
      count: recent.length,
      matches: recent.map((m) => ({
        id: m.id,
        roomId: m.roomId,
        mode: m.mode,
        players: { 1: m.player1Name, 2: m.player2Name },
        winner: m.winner,
        winnerName: m.winnerName,
        ticks: m.ticks,
        finishedAt: new Date(m.finishedAt).toISOString(),
      })),
    });
  });

  // GET /leaderboard?limit=N: names ranked by wins
  matches.get('/leaderboard', (c) => {
    const limit = clampLimit(c.req.query('limit'));
    return c.json({ leaderboard: history.getLeaderboard(limit) });
  });

  return matches;
}
