import { Board, type MoveContext, type ServerPayload } from 'tilegrid-core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemotePlayer } from './remote-player.js';

const answer = (gameId: string, row: number, col: number, attempt = 1) =>
  ({ type: 'move', gameId, turn: 2, attempt, row, col }) as const;

function contextFor(board: Board, controller = new AbortController()): MoveContext {
  return {
    board,
    playerId: 'p2',
    opponentIds: ['p1'],
    turn: 2,
    attempt: 1,
    feedback: [],
    signal: controller.signal,
  };
}

describe('RemotePlayer', () => {
  let sent: ServerPayload[];
  let player: RemotePlayer;

  beforeEach(() => {
    vi.useFakeTimers();
    sent = [];
    player = new RemotePlayer('p2', 'bob', 'o', 'game-1', (payload) => sent.push(payload), 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should send a turn request drawn from its own perspective', () => {
    const board = new Board(1, 3);
    board.claim({ row: 0, col: 0 }, 'p1');
    void player.proposeMove(contextFor(board)).catch(() => {});

    expect(sent).toEqual([
      {
        type: 'turn-request',
        gameId: 'game-1',
        turn: 2,
        attempt: 1,
        board: { rows: 1, cols: 3, cells: [['p1', null, null]] },
        rendered: '+-+-+-+\n|*| | |\n+-+-+-+',
        openPositions: [
          { row: 0, col: 1 },
          { row: 0, col: 2 },
        ],
        feedback: [],
      },
    ]);
    expect(player.isAwaitingMove()).toBe(true);
    player.disconnect();
  });

  it('should resolve with the received move', async () => {
    const move = player.proposeMove(contextFor(new Board(2, 2)));
    expect(player.receiveMove(answer('game-1', 1, 0))).toBe(true);
    await expect(move).resolves.toEqual({ row: 1, col: 0 });
    expect(player.isAwaitingMove()).toBe(false);
  });

  it('should ignore moves when nothing is pending or the game differs', async () => {
    expect(player.receiveMove(answer('game-1', 0, 0))).toBe(false);

    const move = player.proposeMove(contextFor(new Board(2, 2)));
    expect(player.receiveMove(answer('game-2', 0, 0))).toBe(false);
    player.receiveMove(answer('game-1', 0, 1));
    await expect(move).resolves.toEqual({ row: 0, col: 1 });
  });

  it('should not let a late answer settle the next attempt', async () => {
    const first = player.proposeMove(contextFor(new Board(2, 2)));
    const timedOut = expect(first).rejects.toThrow('No move received within 1000ms');
    vi.advanceTimersByTime(1000);
    await timedOut;

    const retry = player.proposeMove({ ...contextFor(new Board(2, 2)), attempt: 2 });
    expect(player.receiveMove(answer('game-1', 0, 0, 1))).toBe(false);
    expect(player.isAwaitingMove()).toBe(true);
    expect(player.receiveMove(answer('game-1', 1, 1, 2))).toBe(true);
    await expect(retry).resolves.toEqual({ row: 1, col: 1 });
  });

  it('should time out a silent client', async () => {
    const move = player.proposeMove(contextFor(new Board(2, 2)));
    const assertion = expect(move).rejects.toThrow('No move received within 1000ms');
    vi.advanceTimersByTime(1000);
    await assertion;
    expect(player.isAwaitingMove()).toBe(false);
  });

  it('should reject when the game is aborted', async () => {
    const controller = new AbortController();
    const move = player.proposeMove(contextFor(new Board(2, 2), controller));
    controller.abort();
    await expect(move).rejects.toThrow('Game stopped');
  });

  it('should reject pending and later requests after disconnect', async () => {
    const move = player.proposeMove(contextFor(new Board(2, 2)));
    player.disconnect();
    await expect(move).rejects.toThrow('bob disconnected');
    await expect(player.proposeMove(contextFor(new Board(2, 2)))).rejects.toThrow('bob is disconnected');
    expect(sent).toHaveLength(1);
  });
});
