/**
 * Connected Components turn loop.
 *
 * Players claim one empty cell per turn in round-robin order until the board
 * is full. A player's score is the size of its largest orthogonally connected
 * group of cells; the strictly highest score wins.
 */

import { randomUUID } from 'node:crypto';
import { Board, type BoardSnapshot, type PlayerId, type Position } from '../board/index.js';
import { GameError, errorMessage } from '../errors/index.js';
import { type GameWinner, type PlayerScore, decideResult, scoreBoard } from '../rules/index.js';
import type { Player } from './player.js';

export const DEFAULT_ROWS = 5;
export const DEFAULT_COLS = 5;
/** Failed attempts a non-human player gets per turn before forfeiting */
export const DEFAULT_MAX_ATTEMPTS = 4;

export interface GameConfig {
  rows: number;
  cols: number;
  maxAttempts: number;
}

export type GameEndReason = 'board-full' | 'forfeit' | 'aborted';

export interface MoveRecord {
  turn: number;
  playerId: PlayerId;
  position: Position;
}

export interface GameResult {
  /** null when the game was aborted */
  winner: GameWinner | null;
  reason: GameEndReason;
  forfeitedBy?: PlayerId;
  abortReason?: string;
  scores: PlayerScore[];
  turns: number;
  moves: MoveRecord[];
}

/** Game state snapshot */
export interface GameState {
  gameId: string;
  board: BoardSnapshot;
  currentPlayer: PlayerId | null;
  turn: number;
  moves: MoveRecord[];
  isOver: boolean;
  result: GameResult | null;
}

/** Game event callbacks */
export interface GameEvents {
  onGameStart?: (players: readonly Player[], board: Board) => void;
  onTurnStart?: (player: Player, turn: number, board: Board) => void;
  onMoveAccepted?: (player: Player, position: Position, board: Board) => void;
  onMoveRejected?: (player: Player, error: Error, attempt: number) => void;
  onGameEnd?: (result: GameResult) => void;
}

type TurnOutcome = 'accepted' | 'forfeit' | 'aborted';

export function createGameId(): string {
  return `game-${randomUUID()}`;
}

export class TileGridGame {
  readonly gameId: string;
  private readonly players: readonly Player[];
  private readonly config: GameConfig;
  private readonly events: GameEvents;
  private readonly board: Board;
  private readonly abortController = new AbortController();
  private status: 'ready' | 'playing' | 'over' = 'ready';
  private turn = 0;
  private currentPlayer: Player | null = null;
  private moves: MoveRecord[] = [];
  private abortReason: string | null = null;
  private result: GameResult | null = null;

  constructor(
    players: readonly Player[],
    config: Partial<GameConfig> = {},
    events: GameEvents = {},
    gameId: string = createGameId(),
  ) {
    this.config = {
      rows: config.rows ?? DEFAULT_ROWS,
      cols: config.cols ?? DEFAULT_COLS,
      maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    };
    TileGridGame.validatePlayers(players);
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new GameError('INVALID_CONFIG', `maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
    this.players = [...players];
    this.events = events;
    this.gameId = gameId;
    this.board = new Board(this.config.rows, this.config.cols);
  }

  private static validatePlayers(players: readonly Player[]): void {
    if (players.length < 2) {
      throw new GameError('INVALID_CONFIG', 'A game needs at least 2 players');
    }
    const ids = new Set<PlayerId>();
    const symbols = new Set<string>();
    for (const player of players) {
      if (ids.has(player.id)) {
        throw new GameError('INVALID_CONFIG', `Duplicate player id "${player.id}"`);
      }
      if ([...player.symbol].length !== 1 || player.symbol === ' ') {
        throw new GameError('INVALID_CONFIG', `Player ${player.name} needs a single visible symbol`);
      }
      if (symbols.has(player.symbol)) {
        throw new GameError('INVALID_CONFIG', `Duplicate player symbol "${player.symbol}"`);
      }
      ids.add(player.id);
      symbols.add(player.symbol);
    }
  }

  /**
   * Run the game to completion.
   *
   * @throws GameError GAME_IN_PROGRESS or GAME_OVER when called more than once
   */
  async play(): Promise<GameResult> {
    if (this.status === 'playing') {
      throw new GameError('GAME_IN_PROGRESS', 'Game is already being played');
    }
    if (this.status === 'over') {
      throw new GameError('GAME_OVER', 'Game has already ended');
    }
    this.status = 'playing';
    this.events.onGameStart?.(this.players, this.board.clone());

    let seat = 0;
    while (!this.board.isFull()) {
      if (this.abortReason !== null) return this.finish('aborted');

      const player = this.players[seat % this.players.length];
      this.turn++;
      this.currentPlayer = player;
      this.events.onTurnStart?.(player, this.turn, this.board.clone());

      const outcome = await this.takeTurn(player);
      if (outcome === 'aborted') return this.finish('aborted');
      if (outcome === 'forfeit') {
        console.warn(
          `[TileGridGame] ${player.name} forfeits after ${this.config.maxAttempts} failed attempts on turn ${this.turn}`,
        );
        return this.finish('forfeit', player.id);
      }
      seat++;
    }
    return this.finish('board-full');
  }

  /**
   * Stop the game before the next move is applied. A pending move request
   * sees its context signal abort.
   */
  abort(reason = 'aborted'): void {
    if (this.status === 'over' || this.abortReason !== null) return;
    this.abortReason = reason;
    this.abortController.abort(new GameError('GAME_OVER', reason));
    if (this.status === 'ready') {
      this.status = 'playing';
      this.finish('aborted');
    }
  }

  private async takeTurn(player: Player): Promise<TurnOutcome> {
    const feedback: string[] = [];
    const opponentIds = this.players.filter((p) => p.id !== player.id).map((p) => p.id);

    for (let attempt = 1; ; attempt++) {
      try {
        const position = await player.proposeMove({
          board: this.board.clone(),
          playerId: player.id,
          opponentIds,
          turn: this.turn,
          attempt,
          feedback: [...feedback],
          signal: this.abortController.signal,
        });
        if (this.abortReason !== null) return 'aborted';

        this.board.claim(position, player.id, (id) => this.nameOf(id));
        const claimed = { row: position.row, col: position.col };
        this.moves.push({ turn: this.turn, playerId: player.id, position: claimed });
        this.events.onMoveAccepted?.(player, claimed, this.board.clone());
        return 'accepted';
      } catch (error) {
        if (this.abortReason !== null) return 'aborted';
        feedback.push(errorMessage(error));
        this.events.onMoveRejected?.(player, error instanceof Error ? error : new Error(String(error)), attempt);
        if (player.kind !== 'human' && attempt >= this.config.maxAttempts) {
          return 'forfeit';
        }
      }
    }
  }

  private finish(reason: GameEndReason, forfeitedBy?: PlayerId): GameResult {
    const scores = scoreBoard(
      this.board,
      this.players.map((p) => p.id),
    );

    let winner: GameWinner | null;
    if (reason === 'aborted') {
      winner = null;
    } else if (forfeitedBy !== undefined) {
      winner = decideResult(scores.filter((s) => s.playerId !== forfeitedBy)).winner;
    } else {
      winner = decideResult(scores).winner;
    }

    const result: GameResult = {
      winner,
      reason,
      scores,
      turns: this.turn,
      moves: this.moves.map((m) => ({ ...m, position: { ...m.position } })),
    };
    if (forfeitedBy !== undefined) result.forfeitedBy = forfeitedBy;
    if (reason === 'aborted' && this.abortReason !== null) result.abortReason = this.abortReason;

    this.result = TileGridGame.copyResult(result);
    this.status = 'over';
    this.currentPlayer = null;
    this.events.onGameEnd?.(result);
    return result;
  }

  nameOf(playerId: PlayerId): string {
    return this.players.find((p) => p.id === playerId)?.name ?? playerId;
  }

  getPlayers(): readonly Player[] {
    return this.players;
  }

  getConfig(): GameConfig {
    return { ...this.config };
  }

  /** Read-only copy of the live board */
  getBoard(): Board {
    return this.board.clone();
  }

  /**
   * Get current game state (immutable copy)
   */
  getState(): GameState {
    return {
      gameId: this.gameId,
      board: this.board.snapshot(),
      currentPlayer: this.currentPlayer?.id ?? null,
      turn: this.turn,
      moves: this.moves.map((m) => ({ ...m, position: { ...m.position } })),
      isOver: this.status === 'over',
      result: this.result && TileGridGame.copyResult(this.result),
    };
  }

  private static copyResult(result: GameResult): GameResult {
    return {
      ...result,
      scores: result.scores.map((s) => ({ ...s })),
      moves: result.moves.map((m) => ({ ...m, position: { ...m.position } })),
    };
  }

  isGameOver(): boolean {
    return this.status === 'over';
  }
}
