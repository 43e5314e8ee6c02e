import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

// ─── Matches ───
export const matches = sqliteTable('matches', {
  id: text('id').primaryKey(),
  roomId: integer('room_id').notNull(),
  mode: text('mode').notNull().default('two_player'), // two_player | vs_ai
  player1Name: text('player1_name').notNull(),
  player2Name: text('player2_name').notNull(),
  winner: integer('winner'), // 1 | 2, null on a draw
  winnerName: text('winner_name'),
  ticks: integer('ticks').notNull().default(0),
  finishedAt: integer('finished_at').notNull(), // Unix timestamp (ms)
}, (table) => ({
  finishedAtIdx: index('matches_finished_at_idx').on(table.finishedAt),
  winnerNameIdx: index('matches_winner_name_idx').on(table.winnerName),
}));
