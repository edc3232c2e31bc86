import type { Position } from '../board/index.js';
import { GameError } from '../errors/index.js';

const MAX_QUOTED_LENGTH = 40;
const BARE_MOVE = /^(\d+)\s*,\s*(\d+)$/;

function quote(input: string): string {
  const flat = input.trim().replace(/\s+/g, ' ');
  return flat.length > MAX_QUOTED_LENGTH ? `${flat.slice(0, MAX_QUOTED_LENGTH)}...` : flat;
}

function unwrap(line: string): string {
  let text = line.trim();
  if (text.startsWith('`') && text.endsWith('`')) {
    text = text.replace(/^`+|`+$/g, '').trim();
  }
  if ((text.startsWith('(') && text.endsWith(')')) || (text.startsWith('[') && text.endsWith(']'))) {
    text = text.slice(1, -1).trim();
  }
  return text;
}

/**
 * Parse a move written as `row,col`, `(row, col)` or `[row, col]`, optionally in backticks.
 * Multi-line input is scanned line by line and the first line holding a move wins.
 *
 * @throws GameError INVALID_MOVE_FORMAT when no line holds a move
 */
export function parseMove(input: string): Position {
  for (const line of input.split(/\r?\n/)) {
    const match = BARE_MOVE.exec(unwrap(line));
    if (match) {
      return { row: Number.parseInt(match[1], 10), col: Number.parseInt(match[2], 10) };
    }
  }
  throw new GameError('INVALID_MOVE_FORMAT', `Could not parse move "${quote(input)}". Expected row,col such as 0,3.`, {
    input,
  });
}
