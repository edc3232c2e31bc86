#!/usr/bin/env -S npx tsx
/**
 * tilegrid CLI
 *
 * Plays one game of Connected Components in the terminal.
 *
 * Usage:
 *   tilegrid play --p1 human --p2 openai
 *
 * Or via environment variables:
 *   TILEGRID_ROWS=6 TILEGRID_COLS=6 tilegrid play
 */

import { type Interface, createInterface } from 'node:readline/promises';
import OpenAI from 'openai';
import type { LineReader } from 'tilegrid-agents';
import { isGameError } from 'tilegrid-core';
import { type CliOptions, HELP_TEXT, parseArgs } from './config.js';
import { exitCodeFor, runLocalGame } from './run-game.js';
import { createSeats, openAICompletionFactory } from './seats.js';

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2), process.env);
  } catch (error) {
    if (isGameError(error, 'INVALID_CONFIG')) {
      console.error(error.message);
      console.error('Run with --help for usage.');
      return 2;
    }
    throw error;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  // Only opened when a human seat asks for it, so bot-only games never hold stdin
  const terminal: { rl: Interface | null } = { rl: null };
  const reader = (): LineReader => {
    terminal.rl ??= createInterface({ input: process.stdin, output: process.stdout });
    return terminal.rl;
  };

  try {
    const players = createSeats(options.p1, options.p2, {
      reader,
      completion: openAICompletionFactory(() => new OpenAI(), options.model),
    });
    const result = await runLocalGame(players, {
      rows: options.rows,
      cols: options.cols,
      maxAttempts: options.maxAttempts,
    });
    return exitCodeFor(result);
  } catch (error) {
    if (isGameError(error, 'INVALID_CONFIG')) {
      console.error(error.message);
      return 2;
    }
    throw error;
  } finally {
    terminal.rl?.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
