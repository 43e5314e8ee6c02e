#!/usr/bin/env node
/**
 * CopperBot: reference bot for the CopperHead server.
 *
 * Usage:
 *   copperbot --server ws://localhost:8000/ws/ --difficulty 7
 */

import { Command, InvalidArgumentError } from 'commander';
import { BOTS, getServerUrl } from '../world/config.js';
import { CopperBot } from './client.js';

function parseDifficulty(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < BOTS.MIN_DIFFICULTY || n > BOTS.MAX_DIFFICULTY) {
    throw new InvalidArgumentError(`must be an integer from ${BOTS.MIN_DIFFICULTY} to ${BOTS.MAX_DIFFICULTY}`);
  }
  return n;
}

const program = new Command()
  .name('copperbot')
  .description('Play CopperHead against anyone waiting on the server')
  .option('-s, --server <url>', 'server WebSocket URL', getServerUrl())
  .option('-d, --difficulty <level>', 'skill level, 1-10', parseDifficulty, BOTS.DEFAULT_DIFFICULTY)
  .option('-n, --name <name>', 'display name (default: CopperBot L<difficulty>)')
  .option('-q, --quiet', 'only log errors', false)
  .action(async (opts: { server: string; difficulty: number; name?: string; quiet: boolean }) => {
    const bot = new CopperBot(opts);

    const stop = () => bot.stop();
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    try {
      await bot.run();
      process.exitCode = 0;
    } catch (err) {
      console.error(`❌ ${bot.name} could not connect to ${opts.server}: ${err instanceof Error ? err.message : err}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
