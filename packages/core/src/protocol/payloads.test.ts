import { describe, expect, it } from 'vitest';
import {
  isArenaPayload,
  isErrorPayload,
  isGameEnd,
  isGameStart,
  isGameState,
  isJoin,
  isMove,
  isMoveRejected,
  isTurnRequest,
  isWaiting,
} from './payloads.js';

const board = { rows: 1, cols: 2, cells: [['a', null]] };

describe('isArenaPayload', () => {
  it('should accept known message types', () => {
    expect(isArenaPayload({ type: 'join', name: 'x' })).toBe(true);
    expect(isArenaPayload({ type: 'game-end' })).toBe(true);
  });

  it('should reject unknown types and non-objects', () => {
    expect(isArenaPayload({ type: 'game-invite' })).toBe(false);
    expect(isArenaPayload(null)).toBe(false);
    expect(isArenaPayload('join')).toBe(false);
    expect(isArenaPayload([{ type: 'join' }])).toBe(false);
  });
});

describe('client payload guards', () => {
  it('should validate join', () => {
    expect(isJoin({ type: 'join', name: 'agent-1' })).toBe(true);
    expect(isJoin({ type: 'join', name: '' })).toBe(false);
    expect(isJoin({ type: 'join' })).toBe(false);
  });

  it('should validate move coordinates', () => {
    const move = { type: 'move', gameId: 'g1', turn: 1, attempt: 1 };
    expect(isMove({ ...move, row: 0, col: 3 })).toBe(true);
    expect(isMove({ ...move, row: -1, col: 3 })).toBe(false);
    expect(isMove({ ...move, row: 1.5, col: 3 })).toBe(false);
    expect(isMove({ ...move, row: '1', col: 3 })).toBe(false);
    expect(isMove({ ...move, gameId: '', row: 1, col: 3 })).toBe(false);
  });

  it('should require the turn and attempt being answered', () => {
    expect(isMove({ type: 'move', gameId: 'g1', row: 0, col: 3 })).toBe(false);
    expect(isMove({ type: 'move', gameId: 'g1', turn: 1, row: 0, col: 3 })).toBe(false);
    expect(isMove({ type: 'move', gameId: 'g1', turn: '1', attempt: 1, row: 0, col: 3 })).toBe(false);
  });
});

describe('server payload guards', () => {
  it('should validate waiting', () => {
    expect(isWaiting({ type: 'waiting' })).toBe(true);
    expect(isWaiting({ type: 'join' })).toBe(false);
  });

  it('should validate game-start', () => {
    const start = {
      type: 'game-start',
      gameId: 'g1',
      you: 'p1',
      symbol: '*',
      opponent: { name: 'bob', symbol: 'o' },
      rows: 5,
      cols: 5,
    };
    expect(isGameStart(start)).toBe(true);
    expect(isGameStart({ ...start, opponent: { name: 'bob' } })).toBe(false);
  });

  it('should validate turn-request', () => {
    const request = {
      type: 'turn-request',
      gameId: 'g1',
      turn: 2,
      attempt: 1,
      board,
      rendered: '+-+-+\n|*| |\n+-+-+',
      openPositions: [{ row: 0, col: 1 }],
      feedback: [],
    };
    expect(isTurnRequest(request)).toBe(true);
    expect(isTurnRequest({ ...request, board: { rows: 1, cols: 2, cells: [[1, null]] } })).toBe(false);
    expect(isTurnRequest({ ...request, openPositions: [{ row: 0 }] })).toBe(false);
    expect(isTurnRequest({ ...request, feedback: [3] })).toBe(false);
  });

  it('should validate move-rejected and error', () => {
    expect(isMoveRejected({ type: 'move-rejected', gameId: 'g1', reason: 'not your turn' })).toBe(true);
    expect(isMoveRejected({ type: 'move-rejected', gameId: 'g1' })).toBe(false);
    expect(isErrorPayload({ type: 'error', error: 'invalid JSON' })).toBe(true);
    expect(isErrorPayload({ type: 'error' })).toBe(false);
  });

  it('should validate game-state', () => {
    const state = { type: 'game-state', gameId: 'g1', board, lastMove: { playerId: 'a', row: 0, col: 0 } };
    expect(isGameState(state)).toBe(true);
    expect(isGameState({ ...state, lastMove: undefined })).toBe(false);
  });

  it('should validate game-end', () => {
    const end = {
      type: 'game-end',
      gameId: 'g1',
      winner: 'a',
      reason: 'board-full',
      scores: [{ playerId: 'a', largest: 2, components: 1, tiles: 2 }],
    };
    expect(isGameEnd(end)).toBe(true);
    expect(isGameEnd({ ...end, winner: null, reason: 'disconnect' })).toBe(true);
    expect(isGameEnd({ ...end, reason: 'collision' })).toBe(false);
    expect(isGameEnd({ ...end, scores: [{ playerId: 'a' }] })).toBe(false);
  });
});
