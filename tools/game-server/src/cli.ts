#!/usr/bin/env -S npx tsx
/**
 * tilegrid arena server CLI
 *
 * Usage:
 *   PORT=3002 TILEGRID_ROWS=5 TILEGRID_COLS=5 tilegrid-server
 */
import { isGameError } from 'tilegrid-core';
import { type GameServer, createGameServer } from './server.js';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.error(`${name} must be a non-negative integer, got "${raw}"`);
    process.exit(2);
  }
  return value;
}

const PORT = readInt('PORT', 3002);
let server: GameServer;
try {
  server = createGameServer({
    port: PORT,
    rows: readInt('TILEGRID_ROWS', 5),
    cols: readInt('TILEGRID_COLS', 5),
    maxAttempts: readInt('TILEGRID_MAX_ATTEMPTS', 4),
    turnTimeoutMs: readInt('TILEGRID_TURN_TIMEOUT_MS', 30_000),
  });
} catch (error) {
  if (!isGameError(error, 'INVALID_CONFIG')) throw error;
  console.error(error.message);
  process.exit(2);
}

server.listening
  .then((port) => {
    console.log(`tilegrid arena running on ws://localhost:${port}`);
    console.log('Agents join with {"type":"join","name":"..."}');
  })
  .catch((err: unknown) => {
    console.error('Failed to start arena server:', err);
    process.exit(1);
  });

process.on('SIGINT', () => {
  server.close();
  process.exit(0);
});
