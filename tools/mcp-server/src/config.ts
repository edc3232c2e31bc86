import { GameError } from 'tilegrid-core';
import { MAX_BOARD_SIDE, OPPONENT_KINDS, type OpponentKind } from './index.js';

export interface McpCliOptions {
  rows?: number;
  cols?: number;
  opponent?: OpponentKind;
  help: boolean;
}

export type Env = Record<string, string | undefined>;

export const HELP_TEXT = `
tilegrid MCP Server

Usage: tilegrid-mcp [options]

Options:
  --rows <n>          Default board rows for new games (default: 5)
  --cols <n>          Default board columns for new games (default: 5)
  --opponent <kind>   Default opponent: random or greedy (default: greedy)
  -h, --help          Show this help message

Environment variables:
  TILEGRID_ROWS       Default board rows
  TILEGRID_COLS       Default board columns
`;

function parseBoardSide(name: string, raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(value) || value < 1) {
    throw new GameError('INVALID_CONFIG', `${name} must be a positive integer, got "${raw}"`);
  }
  if (value > MAX_BOARD_SIDE) {
    throw new GameError('INVALID_CONFIG', `${name} must be at most ${MAX_BOARD_SIDE}, got "${raw}"`);
  }
  return value;
}

/**
 * Parse MCP server flags. Flags override the environment.
 */
export function parseArgs(argv: readonly string[], env: Env = {}): McpCliOptions {
  const options: McpCliOptions = { help: false };
  if (env.TILEGRID_ROWS) options.rows = parseBoardSide('TILEGRID_ROWS', env.TILEGRID_ROWS);
  if (env.TILEGRID_COLS) options.cols = parseBoardSide('TILEGRID_COLS', env.TILEGRID_COLS);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }
    if (arg !== '--rows' && arg !== '--cols' && arg !== '--opponent') {
      throw new GameError('INVALID_CONFIG', `Unknown option: ${arg}`);
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new GameError('INVALID_CONFIG', `Missing value for ${arg}`);
    }
    i++;

    if (arg === '--rows') {
      options.rows = parseBoardSide(arg, value);
    } else if (arg === '--cols') {
      options.cols = parseBoardSide(arg, value);
    } else {
      const kind = OPPONENT_KINDS.find((k) => k === value);
      if (!kind) {
        throw new GameError('INVALID_CONFIG', `--opponent must be one of ${OPPONENT_KINDS.join(', ')}, got "${value}"`);
      }
      options.opponent = kind;
    }
  }
  return options;
}
