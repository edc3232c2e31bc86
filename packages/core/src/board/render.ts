import type { Board } from './board.js';
import type { PlayerId, Position } from './types.js';

/** Maps an owner (or null for empty) to the single character drawn in its cell */
export type SymbolFor = (owner: PlayerId | null) => string;

export const EMPTY_SYMBOL = ' ';
export const OWN_SYMBOL = 'o';
export const OPPONENT_SYMBOL = '*';

/**
 * Draw the board as a text grid:
 *
 * ```
 * +-+-+
 * | |o|
 * |*| |
 * +-+-+
 * ```
 */
export function renderBoard(board: Board, symbolFor: SymbolFor): string {
  const border = `${'+-'.repeat(board.cols)}+`;
  const lines = [border];
  const { cells } = board.snapshot();
  for (const row of cells) {
    lines.push(`|${row.map((owner) => symbolFor(owner)).join('|')}|`);
  }
  lines.push(border);
  return lines.join('\n');
}

/** Symbol lookup from a fixed id -> symbol table */
export function symbolsFromTable(table: Record<PlayerId, string>): SymbolFor {
  return (owner) => (owner === null ? EMPTY_SYMBOL : (table[owner] ?? '?'));
}

/** What one player sees: its own cells as `o`, everyone else's as `*` */
export function perspectiveSymbols(viewer: PlayerId): SymbolFor {
  return (owner) => {
    if (owner === null) return EMPTY_SYMBOL;
    return owner === viewer ? OWN_SYMBOL : OPPONENT_SYMBOL;
  };
}

export function formatPosition(pos: Position): string {
  return `${pos.row},${pos.col}`;
}

export function formatPositions(positions: readonly Position[]): string {
  return positions.map(formatPosition).join('; ');
}
