#!/usr/bin/env node
/**
 * CopperHead Server Launcher
 *
 * Starts the server and prints connection instructions for first-time
 * players, including the Codespaces port-visibility steps.
 */

import { startServer } from './index.js';
import { SERVER, getConnectionInfo, type ConnectionInfo } from './world/config.js';

// ANSI colors for terminal output
const GREEN = '\x1b[92m';
const YELLOW = '\x1b[93m';
const CYAN = '\x1b[96m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

const RULE = `${GREEN}${'='.repeat(60)}${RESET}`;

function bannerLines(): string[] {
  return [
    '',
    RULE,
    `${GREEN}${BOLD}       🐍 COPPERHEAD SNAKE GAME SERVER 🐍${RESET}`,
    RULE,
    '',
  ];
}

function instructionLines({ wsUrl, isCodespace }: ConnectionInfo, port: number): string[] {
  const lines = [
    `${CYAN}📡 HOW TO PLAY:${RESET}`,
    '',
    `   ${BOLD}Step 1:${RESET} Open the game client in your browser:`,
    `          ${YELLOW}${SERVER.CLIENT_URL}${RESET}`,
    '',
    `   ${BOLD}Step 2:${RESET} Paste this Server URL into the client:`,
    '',
    `          ${GREEN}${BOLD}${wsUrl}${RESET}`,
    '',
  ];

  if (isCodespace) {
    lines.push(
      `   ${BOLD}Step 3:${RESET} ${YELLOW}⚠️  IMPORTANT - Make your port PUBLIC:${RESET}`,
      `          • Click the ${BOLD}Ports${RESET} tab in the bottom panel`,
      `          • Right-click on port ${BOLD}${port}${RESET}`,
      `          • Select ${BOLD}Port Visibility → Public${RESET}`,
      ''
    );
  }

  lines.push(RULE, '');
  return lines;
}

async function main(): Promise<void> {
  const port = SERVER.PORT;
  for (const line of bannerLines()) console.log(line);
  for (const line of instructionLines(getConnectionInfo(process.env, port), port)) console.log(line);
  console.log('Starting server... (Press Ctrl+C to stop)\n');

  const running = await startServer({ port, quiet: true });

  const stop = () => {
    console.log(`\n${YELLOW}Server stopped.${RESET}`);
    running.close().then(
      () => process.exit(0),
      (err) => {
        console.error('Failed to close cleanly:', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main().catch((err) => {
  console.error('🔥 Failed to start CopperHead Server:', err);
  process.exit(1);
});
