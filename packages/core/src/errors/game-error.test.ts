import { describe, expect, it } from 'vitest';
import { GameError, errorMessage, isGameError } from './game-error.js';
import type { GameErrorCode } from './game-error.js';

describe('GameError', () => {
  it('extends Error', () => {
    const error = new GameError('OUT_OF_BOUNDS', 'off the board');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(GameError);
  });

  it('has correct name, code, and message', () => {
    const error = new GameError('CELL_OCCUPIED', 'Cell is already owned by player human.');
    expect(error.name).toBe('GameError');
    expect(error.code).toBe('CELL_OCCUPIED');
    expect(error.message).toBe('Cell is already owned by player human.');
  });

  it('supports optional context', () => {
    const error = new GameError('OUT_OF_BOUNDS', 'bad cell', { row: 7, col: 1 });
    expect(error.context).toEqual({ row: 7, col: 1 });
  });

  it('context is undefined when not provided', () => {
    const error = new GameError('TIMEOUT', 'too slow');
    expect(error.context).toBeUndefined();
  });

  it('supports all error codes', () => {
    const codes: GameErrorCode[] = [
      'INVALID_DIMENSIONS',
      'OUT_OF_BOUNDS',
      'CELL_OCCUPIED',
      'INVALID_MOVE_FORMAT',
      'INVALID_CONFIG',
      'GAME_OVER',
      'GAME_IN_PROGRESS',
      'AGENT_FAILED',
      'INVALID_PAYLOAD',
      'TIMEOUT',
    ];
    for (const code of codes) {
      const error = new GameError(code, 'test');
      expect(error.code).toBe(code);
    }
  });
});

describe('isGameError', () => {
  it('matches any GameError without a code', () => {
    expect(isGameError(new GameError('TIMEOUT', 'x'))).toBe(true);
    expect(isGameError(new Error('x'))).toBe(false);
    expect(isGameError('x')).toBe(false);
  });

  it('matches only the requested code', () => {
    const error = new GameError('CELL_OCCUPIED', 'x');
    expect(isGameError(error, 'CELL_OCCUPIED')).toBe(true);
    expect(isGameError(error, 'OUT_OF_BOUNDS')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('returns the message of an Error', () => {
    expect(errorMessage(new GameError('TIMEOUT', 'Turn timed out'))).toBe('Turn timed out');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
