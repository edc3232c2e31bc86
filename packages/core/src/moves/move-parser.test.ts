import { describe, expect, it } from 'vitest';
import { parseMove } from './move-parser.js';

describe('parseMove', () => {
  it('should parse row,col', () => {
    expect(parseMove('0,3')).toEqual({ row: 0, col: 3 });
  });

  it('should tolerate whitespace', () => {
    expect(parseMove('  2 ,  4 \n')).toEqual({ row: 2, col: 4 });
  });

  it('should parse tuple and list forms', () => {
    expect(parseMove('(1, 2)')).toEqual({ row: 1, col: 2 });
    expect(parseMove('[3,0]')).toEqual({ row: 3, col: 0 });
  });

  it('should strip backticks', () => {
    expect(parseMove('`(4, 4)`')).toEqual({ row: 4, col: 4 });
    expect(parseMove('```\n1,1\n```')).toEqual({ row: 1, col: 1 });
  });

  it('should take the first line holding a move', () => {
    expect(parseMove('My move:\n2,3\nbecause it joins my tiles. 4,4')).toEqual({ row: 2, col: 3 });
  });

  it('should parse multi-digit coordinates', () => {
    expect(parseMove('12,105')).toEqual({ row: 12, col: 105 });
  });

  it('should reject negative coordinates', () => {
    expect(() => parseMove('-1,2')).toThrow('Could not parse move "-1,2". Expected row,col such as 0,3.');
  });

  it('should reject prose without a move', () => {
    expect(() => parseMove('I would like the centre')).toThrow(
      'Could not parse move "I would like the centre". Expected row,col such as 0,3.',
    );
  });

  it('should reject fractional and partial input', () => {
    expect(() => parseMove('1.5,2')).toThrow('Could not parse move');
    expect(() => parseMove('3')).toThrow('Could not parse move');
    expect(() => parseMove('')).toThrow('Could not parse move "". Expected row,col such as 0,3.');
  });

  it('should truncate long input in the message', () => {
    const input = 'x'.repeat(60);
    expect(() => parseMove(input)).toThrow(`Could not parse move "${'x'.repeat(40)}...".`);
  });

  it('should carry the INVALID_MOVE_FORMAT code', () => {
    try {
      parseMove('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ name: 'GameError', code: 'INVALID_MOVE_FORMAT' });
    }
  });
});
