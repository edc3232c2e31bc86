import { Board, GameError, type MoveContext } from 'tilegrid-core';
import { describe, expect, it, vi } from 'vitest';
import { type CompletionFn, LlmPlayer } from './llm-player.js';

function contextFor(board: Board, feedback: string[] = []): MoveContext {
  return {
    board,
    playerId: 'agent',
    opponentIds: ['human'],
    turn: 2,
    attempt: feedback.length + 1,
    feedback,
    signal: new AbortController().signal,
  };
}

describe('LlmPlayer', () => {
  it('should be an agent with the default symbol', () => {
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete: vi.fn() });
    expect(player.kind).toBe('agent');
    expect(player.symbol).toBe('o');
  });

  it('should send rules and board as system messages', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('1,1');
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete });
    const ctx = contextFor(new Board(2, 2));

    await player.proposeMove(ctx);

    const [messages, signal] = complete.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages.map((m) => m.role)).toEqual(['system', 'system']);
    expect(messages[0].content).toContain('on a 2x2 grid');
    expect(messages[1].content).toContain('The open positions are: 0,0; 0,1; 1,0; 1,1');
    expect(signal).toBe(ctx.signal);
  });

  it('should append one message per earlier failure', () => {
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete: vi.fn() });
    const messages = player.buildMessages(contextFor(new Board(2, 2), ['bad format', 'Cell is already owned by player human.']));

    expect(messages.slice(2)).toEqual([
      { role: 'system', content: 'Previous move failed due to: bad format' },
      { role: 'system', content: 'Previous move failed due to: Cell is already owned by player human.' },
    ]);
  });

  it('should parse the model reply into a position', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('(0, 1)');
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete });

    await expect(player.proposeMove(contextFor(new Board(2, 2)))).resolves.toEqual({ row: 0, col: 1 });
    expect(player.getLastReply()).toBe('(0, 1)');
  });

  it('should fail on an empty reply', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue(null);
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete });

    await expect(player.proposeMove(contextFor(new Board(2, 2)))).rejects.toThrow('gpt returned an empty reply');
    await expect(player.proposeMove(contextFor(new Board(2, 2)))).rejects.toBeInstanceOf(GameError);
  });

  it('should surface parse errors for the turn loop', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('the middle one');
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete });

    await expect(player.proposeMove(contextFor(new Board(2, 2)))).rejects.toThrow(
      'Could not parse move "the middle one". Expected row,col such as 0,3.',
    );
  });

  it('should propagate completion failures', async () => {
    const complete = vi.fn<CompletionFn>().mockRejectedValue(new Error('429 rate limited'));
    const player = new LlmPlayer({ id: 'agent', name: 'gpt', complete });

    await expect(player.proposeMove(contextFor(new Board(2, 2)))).rejects.toThrow('429 rate limited');
  });
});
