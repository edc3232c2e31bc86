import { GameError, type MoveContext, type Player, type Position, parseMove } from 'tilegrid-core';
import { buildFeedbackMessage, buildGameContext, buildTurnPrompt } from './prompts.js';

export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * One chat completion round trip. Resolves with the reply text, or null when
 * the model returned no content.
 */
export type CompletionFn = (messages: ChatMessage[], signal: AbortSignal) => Promise<string | null>;

export interface LlmPlayerOptions {
  id: string;
  name: string;
  symbol?: string;
  complete: CompletionFn;
}

/**
 * Seat driven by a chat model. Each attempt sends the rules, the current board
 * and every error from earlier attempts this turn, then parses the reply as a move.
 */
export class LlmPlayer implements Player {
  readonly id: string;
  readonly name: string;
  readonly symbol: string;
  readonly kind = 'agent';
  private readonly complete: CompletionFn;
  private lastReply: string | null = null;

  constructor(options: LlmPlayerOptions) {
    this.id = options.id;
    this.name = options.name;
    this.symbol = options.symbol ?? 'o';
    this.complete = options.complete;
  }

  buildMessages(context: MoveContext): ChatMessage[] {
    const { board } = context;
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: buildGameContext({ rows: board.rows, cols: board.cols, players: context.opponentIds.length + 1 }),
      },
      { role: 'system', content: buildTurnPrompt(board, context.playerId) },
    ];
    for (const reason of context.feedback) {
      messages.push({ role: 'system', content: buildFeedbackMessage(reason) });
    }
    return messages;
  }

  async proposeMove(context: MoveContext): Promise<Position> {
    const reply = await this.complete(this.buildMessages(context), context.signal);
    this.lastReply = reply;
    if (reply === null || reply.trim().length === 0) {
      throw new GameError('AGENT_FAILED', `${this.name} returned an empty reply`);
    }
    return parseMove(reply);
  }

  /** Raw text of the most recent model reply */
  getLastReply(): string | null {
    return this.lastReply;
  }
}
