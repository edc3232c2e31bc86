import { describe, expect, it } from 'vitest';
import { Board } from './board.js';
import { formatPositions, perspectiveSymbols, renderBoard, symbolsFromTable } from './render.js';

describe('renderBoard', () => {
  it('should draw an empty board with borders', () => {
    const board = new Board(2, 3);
    expect(renderBoard(board, symbolsFromTable({}))).toBe('+-+-+-+\n| | | |\n| | | |\n+-+-+-+');
  });

  it('should draw each owner with its symbol', () => {
    const board = new Board(2, 2);
    board.claim({ row: 0, col: 1 }, 'agent');
    board.claim({ row: 1, col: 0 }, 'human');
    const symbols = symbolsFromTable({ human: '*', agent: 'o' });
    expect(renderBoard(board, symbols)).toBe('+-+-+\n| |o|\n|*| |\n+-+-+');
  });

  it('should draw from a player perspective', () => {
    const board = new Board(1, 3);
    board.claim({ row: 0, col: 0 }, 'a');
    board.claim({ row: 0, col: 2 }, 'b');
    expect(renderBoard(board, perspectiveSymbols('b'))).toBe('+-+-+-+\n|*| |o|\n+-+-+-+');
  });
});

describe('formatPositions', () => {
  it('should join row,col pairs', () => {
    expect(
      formatPositions([
        { row: 0, col: 3 },
        { row: 4, col: 1 },
      ]),
    ).toBe('0,3; 4,1');
  });

  it('should return an empty string for no positions', () => {
    expect(formatPositions([])).toBe('');
  });
});
