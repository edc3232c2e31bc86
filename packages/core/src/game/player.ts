import type { Board, PlayerId, Position } from '../board/index.js';

/**
 * Who is behind a seat. Humans retry bad moves without limit;
 * agents and bots are held to the game's attempt budget.
 */
export type PlayerKind = 'human' | 'agent' | 'bot';

/** Everything a player is shown when asked for a move */
export interface MoveContext {
  /** Private copy of the board; changing it has no effect on the game */
  board: Board;
  playerId: PlayerId;
  opponentIds: readonly PlayerId[];
  /** 1-based turn number across the whole game */
  turn: number;
  /** 1-based attempt number within this turn */
  attempt: number;
  /** Error messages from earlier failed attempts this turn, oldest first */
  feedback: readonly string[];
  /** Aborted when the game is stopped while the move is pending */
  signal: AbortSignal;
}

export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  /** Single character drawn for this player's cells */
  readonly symbol: string;
  readonly kind: PlayerKind;
  proposeMove(context: MoveContext): Promise<Position>;
}
