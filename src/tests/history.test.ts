import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase, type DatabaseHandle } from '../db/index.js';
import { MatchHistory, type MatchResult } from '../services/history.js';
import { quietConsole } from './fakes.js';

function result(player1Name: string, player2Name: string, winner: 1 | 2 | null): MatchResult {
  const winnerName = winner === 1 ? player1Name : winner === 2 ? player2Name : null;
  return { roomId: 1, mode: 'two_player', player1Name, player2Name, winner, winnerName, ticks: 40 };
}

describe('MatchHistory', () => {
  let handle: DatabaseHandle;
  let history: MatchHistory;
  let clock: number;

  beforeEach(() => {
    handle = openDatabase(':memory:');
    clock = 0;
    history = new MatchHistory(handle.db, () => (clock += 1000));
  });

  afterEach(() => {
    handle.close();
  });

  function seed(): void {
    history.recordMatch(result('Ada', 'Bob', 1));
    history.recordMatch(result('Ada', 'Cy', 2));
    history.recordMatch(result('Bob', 'Cy', null));
    history.recordMatch(result('Cy', 'Ada', 1));
  }

  it('stores a finished match', () => {
    const record = history.recordMatch({ ...result('Ada', 'Bob', 2), mode: 'vs_ai', ticks: 87 });
    assert.ok(record);
    assert.equal(record.finishedAt, 1000);
    assert.deepEqual(history.getRecentMatches(), [record]);
  });

  it('lists the newest matches first', () => {
    seed();
    const recent = history.getRecentMatches(2);
    assert.deepEqual(recent.map((m) => m.finishedAt), [4000, 3000]);
    assert.deepEqual(recent.map((m) => m.winnerName), ['Cy', null]);
  });

  it('ranks players by wins, then games played', () => {
    seed();
    assert.deepEqual(history.getLeaderboard(), [
      { rank: 1, name: 'Cy', wins: 2, losses: 0, draws: 1, games: 3 },
      { rank: 2, name: 'Ada', wins: 1, losses: 2, draws: 0, games: 3 },
      { rank: 3, name: 'Bob', wins: 0, losses: 1, draws: 1, games: 2 },
    ]);
    assert.deepEqual(history.getLeaderboard(1), [
      { rank: 1, name: 'Cy', wins: 2, losses: 0, draws: 1, games: 3 },
    ]);
  });

  it('breaks ties by name', () => {
    history.recordMatch(result('Bob', 'Ada', null));
    assert.deepEqual(history.getLeaderboard(), [
      { rank: 1, name: 'Ada', wins: 0, losses: 0, draws: 1, games: 1 },
      { rank: 2, name: 'Bob', wins: 0, losses: 0, draws: 1, games: 1 },
    ]);
  });

  it('returns an empty leaderboard before any match', () => {
    assert.deepEqual(history.getLeaderboard(), []);
  });

  it('returns null when the write fails', () => {
    handle.close();
    const restore = quietConsole();
    try {
      assert.equal(history.recordMatch(result('Ada', 'Bob', 1)), null);
    } finally {
      restore();
    }
    handle = openDatabase(':memory:');
  });
});
