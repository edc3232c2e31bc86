import { describe, expect, it } from 'vitest';
import { Board } from '../board/index.js';
import { decideResult, scoreBoard } from './scoring.js';

describe('scoreBoard', () => {
  it('should score the largest component, component count and tiles', () => {
    const board = new Board(3, 3);
    board.claim({ row: 0, col: 0 }, 'a');
    board.claim({ row: 0, col: 1 }, 'a');
    board.claim({ row: 1, col: 1 }, 'a');
    board.claim({ row: 2, col: 0 }, 'b');
    board.claim({ row: 2, col: 2 }, 'b');

    expect(scoreBoard(board, ['a', 'b'])).toEqual([
      { playerId: 'a', largest: 3, components: 1, tiles: 3 },
      { playerId: 'b', largest: 1, components: 2, tiles: 2 },
    ]);
  });

  it('should give zero to players without tiles', () => {
    const board = new Board(2, 2);
    board.claim({ row: 0, col: 0 }, 'a');
    expect(scoreBoard(board, ['a', 'b'])[1]).toEqual({ playerId: 'b', largest: 0, components: 0, tiles: 0 });
  });

  it('should keep the order of the player list', () => {
    const board = new Board(1, 2);
    board.claim({ row: 0, col: 0 }, 'a');
    board.claim({ row: 0, col: 1 }, 'b');
    expect(scoreBoard(board, ['b', 'a']).map((s) => s.playerId)).toEqual(['b', 'a']);
  });
});

describe('decideResult', () => {
  const score = (playerId: string, largest: number) => ({ playerId, largest, components: 1, tiles: largest });

  it('should pick the strictly largest component', () => {
    expect(decideResult([score('a', 3), score('b', 1)]).winner).toBe('a');
    expect(decideResult([score('a', 2), score('b', 5)]).winner).toBe('b');
  });

  it('should call a shared maximum a draw', () => {
    expect(decideResult([score('a', 4), score('b', 4)]).winner).toBe('draw');
  });

  it('should ignore ties below the maximum', () => {
    expect(decideResult([score('a', 1), score('b', 1), score('c', 2)]).winner).toBe('c');
  });

  it('should call a tie among the leaders a draw with more than two players', () => {
    expect(decideResult([score('a', 1), score('b', 3), score('c', 3)]).winner).toBe('draw');
  });

  it('should call an empty score list a draw', () => {
    expect(decideResult([]).winner).toBe('draw');
  });

  it('should copy the scores', () => {
    const scores = [score('a', 1)];
    const result = decideResult(scores);
    result.scores[0].largest = 9;
    expect(scores[0].largest).toBe(1);
  });
});
