import { DEFAULT_MODEL } from 'tilegrid-agents';
import { DEFAULT_COLS, DEFAULT_MAX_ATTEMPTS, DEFAULT_ROWS, GameError } from 'tilegrid-core';

export type SeatKind = 'human' | 'openai' | 'random' | 'greedy';

export const SEAT_KINDS: readonly SeatKind[] = ['human', 'openai', 'random', 'greedy'];

export interface CliOptions {
  rows: number;
  cols: number;
  p1: SeatKind;
  p2: SeatKind;
  model: string;
  maxAttempts: number;
  help: boolean;
}

export type Env = Record<string, string | undefined>;

export const HELP_TEXT = `
tilegrid - Connected Components on a grid

Usage: tilegrid [play] [options]

Options:
  --rows <n>           Board rows (default: ${DEFAULT_ROWS})
  --cols <n>           Board columns (default: ${DEFAULT_COLS})
  --p1 <seat>          First player: human | openai | random | greedy (default: human)
  --p2 <seat>          Second player (default: openai)
  --model <name>       OpenAI chat model for openai seats (default: ${DEFAULT_MODEL})
  --max-attempts <n>   Failed moves a non-human seat may make per turn (default: ${DEFAULT_MAX_ATTEMPTS})
  -h, --help           Show this help message

Environment variables:
  TILEGRID_ROWS, TILEGRID_COLS, TILEGRID_MODEL, TILEGRID_MAX_ATTEMPTS
  OPENAI_API_KEY       Used by openai seats

Example:
  tilegrid play --p1 human --p2 openai --rows 5 --cols 5
`;

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(value) || value < 1) {
    throw new GameError('INVALID_CONFIG', `${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseSeat(name: string, raw: string): SeatKind {
  const seat = SEAT_KINDS.find((kind) => kind === raw);
  if (!seat) {
    throw new GameError('INVALID_CONFIG', `${name} must be one of ${SEAT_KINDS.join(', ')}, got "${raw}"`);
  }
  return seat;
}

/**
 * Resolve options from defaults, then environment, then flags.
 *
 * @throws GameError INVALID_CONFIG on unknown flags or bad values
 */
export function parseArgs(argv: readonly string[], env: Env = {}): CliOptions {
  const options: CliOptions = {
    rows: env.TILEGRID_ROWS ? parsePositiveInt('TILEGRID_ROWS', env.TILEGRID_ROWS) : DEFAULT_ROWS,
    cols: env.TILEGRID_COLS ? parsePositiveInt('TILEGRID_COLS', env.TILEGRID_COLS) : DEFAULT_COLS,
    p1: 'human',
    p2: 'openai',
    model: env.TILEGRID_MODEL || DEFAULT_MODEL,
    maxAttempts: env.TILEGRID_MAX_ATTEMPTS
      ? parsePositiveInt('TILEGRID_MAX_ATTEMPTS', env.TILEGRID_MAX_ATTEMPTS)
      : DEFAULT_MAX_ATTEMPTS,
    help: false,
  };

  const args = [...argv];
  if (args[0] === 'play') args.shift();

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    if (flag === '-h' || flag === '--help') {
      options.help = true;
      continue;
    }

    const value = args[i + 1];
    const needsValue = ['--rows', '--cols', '--p1', '--p2', '--model', '--max-attempts'];
    if (!needsValue.includes(flag)) {
      throw new GameError('INVALID_CONFIG', `Unknown option: ${flag}`);
    }
    if (value === undefined || value.startsWith('--')) {
      throw new GameError('INVALID_CONFIG', `Missing value for ${flag}`);
    }
    i++;

    switch (flag) {
      case '--rows':
        options.rows = parsePositiveInt(flag, value);
        break;
      case '--cols':
        options.cols = parsePositiveInt(flag, value);
        break;
      case '--p1':
        options.p1 = parseSeat(flag, value);
        break;
      case '--p2':
        options.p2 = parseSeat(flag, value);
        break;
      case '--model':
        options.model = value;
        break;
      case '--max-attempts':
        options.maxAttempts = parsePositiveInt(flag, value);
        break;
    }
  }

  return options;
}
