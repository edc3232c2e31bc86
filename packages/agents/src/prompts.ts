import {
  type Board,
  OPPONENT_SYMBOL,
  OWN_SYMBOL,
  type PlayerId,
  formatPositions,
  perspectiveSymbols,
  renderBoard,
} from 'tilegrid-core';

export interface GameContextOptions {
  rows: number;
  cols: number;
  /** Total seats at the table, including the agent */
  players?: number;
}

/**
 * Standing rules given to an agent as its first system message.
 */
export function buildGameContext({ rows, cols, players = 2 }: GameContextOptions): string {
  const opponents = players > 2 ? 'your opponents' : 'your opponent';
  return [
    `You are playing a ${players} player game where the objective is to form the largest connected component on a ${rows}x${cols} grid.`,
    "The game is turn based and you will be prompted when it's your turn.",
    'You will be provided the current state of the game board when prompted.',
    '* Empty cells are represented by whitespace',
    `* Cells you own contain an \`${OWN_SYMBOL}\` character`,
    `* Cells owned by ${opponents} contain a \`${OPPONENT_SYMBOL}\` character`,
    '* Two cells are connected to each other if there is a path of cells of the same symbol connecting the two cells. Cells diagonal to each other are not connected.',
    '* Your score is the size of your largest connected component',
    '* The game ends when all cells are taken',
  ].join('\n');
}

/**
 * Per-turn prompt: the board as the agent sees it, the open cells and the answer format.
 */
export function buildTurnPrompt(board: Board, viewer: PlayerId): string {
  return [
    "It's your turn. The current board is:",
    renderBoard(board, perspectiveSymbols(viewer)),
    `The open positions are: ${formatPositions(board.openPositions())}`,
    'Please enter a position formatted as `row,col` where row and column indexing starts at zero.',
    "Here's an example: 0,3 is the cell located at row 0 and column 3.",
    'Please enter your move BUT ONLY INPUT A TUPLE, NO EXTRA FORMATTING.',
  ].join('\n');
}

export function buildFeedbackMessage(reason: string): string {
  return `Previous move failed due to: ${reason}`;
}
