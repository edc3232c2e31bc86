import {
  GameError,
  type MoveContext,
  type MovePayload,
  type Player,
  type Position,
  type ServerPayload,
  perspectiveSymbols,
  renderBoard,
} from 'tilegrid-core';

export const DEFAULT_TURN_TIMEOUT_MS = 30_000;

/** Outbound half of a client connection */
export type SendPayload = (payload: ServerPayload) => void;

interface PendingMove {
  turn: number;
  attempt: number;
  resolve: (position: Position) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  cleanup: () => void;
}

/**
 * Seat played by a client over the wire. Each move request becomes a
 * `turn-request`; the client's `move` answer settles it.
 */
export class RemotePlayer implements Player {
  readonly kind = 'agent';
  private pending: PendingMove | null = null;
  private disconnected = false;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly symbol: string,
    private readonly gameId: string,
    private readonly send: SendPayload,
    private readonly turnTimeoutMs: number = DEFAULT_TURN_TIMEOUT_MS,
  ) {}

  proposeMove(context: MoveContext): Promise<Position> {
    if (this.disconnected) {
      return Promise.reject(new GameError('AGENT_FAILED', `${this.name} is disconnected`));
    }

    return new Promise<Position>((resolve, reject) => {
      const onAbort = () => this.settle((p) => p.reject(new GameError('GAME_OVER', 'Game stopped')));
      const timer = setTimeout(() => {
        this.settle((p) => p.reject(new GameError('TIMEOUT', `No move received within ${this.turnTimeoutMs}ms`)));
      }, this.turnTimeoutMs);

      context.signal.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        turn: context.turn,
        attempt: context.attempt,
        resolve,
        reject,
        timer,
        cleanup: () => context.signal.removeEventListener('abort', onAbort),
      };

      this.send({
        type: 'turn-request',
        gameId: this.gameId,
        turn: context.turn,
        attempt: context.attempt,
        board: context.board.snapshot(),
        rendered: renderBoard(context.board, perspectiveSymbols(this.id)),
        openPositions: context.board.openPositions(),
        feedback: [...context.feedback],
      });
    });
  }

  /**
   * Settle the pending request with the client's answer.
   *
   * @returns false when no request is pending, or the answer names another game, turn or attempt
   */
  receiveMove(payload: MovePayload): boolean {
    const pending = this.pending;
    if (!pending || payload.gameId !== this.gameId) return false;
    if (payload.turn !== pending.turn || payload.attempt !== pending.attempt) return false;
    this.settle((p) => p.resolve({ row: payload.row, col: payload.col }));
    return true;
  }

  /** Fail the pending request and every later one */
  disconnect(): void {
    this.disconnected = true;
    this.settle((p) => p.reject(new GameError('AGENT_FAILED', `${this.name} disconnected`)));
  }

  isAwaitingMove(): boolean {
    return this.pending !== null;
  }

  private settle(action: (pending: PendingMove) => void): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.cleanup();
    action(pending);
  }
}
